/**
 * Viewer error taxonomy.
 *
 * InitError subclasses are fatal and propagate out of `Viewer.create`.
 * DecodeError and FlattenError are absorbed by `Viewer.load` and show up in its report.
 * LoadError is what `load` itself rejects with.
 */

export type ViewerErrorCode =
    | 'CONTEXT_UNAVAILABLE'
    | 'SHADER_COMPILE'
    | 'PROGRAM_LINK'
    | 'MISSING_UNIFORM'
    | 'TOO_SMALL'
    | 'MALFORMED_ASSET'
    | 'FLATTEN'
    | 'TOO_MANY_VERTICES'
    | 'LOAD';

export class ViewerError extends Error {
    readonly code: ViewerErrorCode;

    constructor(code: ViewerErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.code = code;
    }
}

export class InitError extends ViewerError {}

export class ContextError extends InitError {
    constructor(detail: string) {
        super('CONTEXT_UNAVAILABLE', detail);
    }
}

export type ShaderStage = 'vertex' | 'fragment';

export class ShaderCompileError extends InitError {
    readonly stage: ShaderStage;
    readonly log: string;

    constructor(stage: ShaderStage, log: string) {
        super('SHADER_COMPILE', `Failed to compile ${stage} shader: ${log}`);
        this.stage = stage;
        this.log = log;
    }
}

export class ProgramLinkError extends InitError {
    readonly log: string;

    constructor(log: string) {
        super('PROGRAM_LINK', `Failed to link program: ${log}`);
        this.log = log;
    }
}

export class MissingUniformError extends InitError {
    readonly uniform: string;

    constructor(uniform: string) {
        super('MISSING_UNIFORM', `Failed to get ${uniform} uniform location`);
        this.uniform = uniform;
    }
}

export class DecodeError extends ViewerError {}

export class TooSmallError extends DecodeError {
    readonly byteLength: number;

    constructor(byteLength: number) {
        super('TOO_SMALL', `glTF data too small: ${byteLength} bytes`);
        this.byteLength = byteLength;
    }
}

export class MalformedAssetError extends DecodeError {
    readonly detail: string;

    constructor(detail: string, cause?: unknown) {
        super('MALFORMED_ASSET', `Failed to import glTF file: ${detail}`, { cause });
        this.detail = detail;
    }
}

export class FlattenError extends ViewerError {
    constructor(message: string, code: ViewerErrorCode = 'FLATTEN') {
        super(code, message);
    }
}

export class TooManyVerticesError extends FlattenError {
    readonly vertexCount: number;

    constructor(vertexCount: number, limit: number) {
        super(`Scene would need ${vertexCount} vertices, 16-bit indices address ${limit}`, 'TOO_MANY_VERTICES');
        this.vertexCount = vertexCount;
    }
}

export class LoadError extends ViewerError {
    constructor(message: string, cause?: unknown) {
        super('LOAD', message, { cause });
    }
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
