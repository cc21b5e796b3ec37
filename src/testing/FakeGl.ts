import { GL, type GlContext, type RenderSurface } from "../types/gl";

export interface GlCall {
    name: string;
    args: unknown[];
}

export interface FakeGlOptions {
    /** Report a compile failure for this stage */
    failCompile?: 'vertex' | 'fragment';
    failLink?: boolean;
    /** Uniform names getUniformLocation returns null for */
    missingUniforms?: string[];
    infoLog?: string;
}

interface FakeHandle {
    readonly id: number;
}

/**
 * Recording stand-in for a WebGL2 context. Every call is appended to `calls`;
 * buffer uploads are kept per buffer so tests can read back what was sent.
 */
export class FakeGl implements GlContext {
    readonly calls: GlCall[] = [];
    readonly bufferContents = new Map<WebGLBuffer, Float32Array | Uint16Array>();
    readonly deletedShaders: WebGLShader[] = [];
    readonly deletedPrograms: WebGLProgram[] = [];
    readonly deletedBuffers: WebGLBuffer[] = [];

    private options: FakeGlOptions;
    private nextId = 1;
    private shaderTypes = new Map<WebGLShader, number>();
    private bound = new Map<number, WebGLBuffer | null>();

    constructor(options: FakeGlOptions = {}) {
        this.options = options;
    }

    callsTo(name: string): GlCall[] {
        return this.calls.filter((call) => call.name === name);
    }

    private record(name: string, ...args: unknown[]): void {
        this.calls.push({ name, args });
    }

    private handle(): FakeHandle {
        return { id: this.nextId++ };
    }

    createShader(type: number): WebGLShader | null {
        this.record('createShader', type);
        const shader = this.handle();
        this.shaderTypes.set(shader, type);
        return shader;
    }

    shaderSource(shader: WebGLShader, source: string): void {
        this.record('shaderSource', shader, source);
    }

    compileShader(shader: WebGLShader): void {
        this.record('compileShader', shader);
    }

    getShaderParameter(shader: WebGLShader, pname: number): unknown {
        this.record('getShaderParameter', shader, pname);
        const failing = this.options.failCompile === 'vertex' ? GL.VERTEX_SHADER
            : this.options.failCompile === 'fragment' ? GL.FRAGMENT_SHADER
            : undefined;
        return this.shaderTypes.get(shader) !== failing;
    }

    getShaderInfoLog(shader: WebGLShader): string | null {
        this.record('getShaderInfoLog', shader);
        return this.options.infoLog ?? null;
    }

    deleteShader(shader: WebGLShader | null): void {
        this.record('deleteShader', shader);
        if (shader) this.deletedShaders.push(shader);
    }

    createProgram(): WebGLProgram | null {
        this.record('createProgram');
        return this.handle();
    }

    attachShader(program: WebGLProgram, shader: WebGLShader): void {
        this.record('attachShader', program, shader);
    }

    linkProgram(program: WebGLProgram): void {
        this.record('linkProgram', program);
    }

    getProgramParameter(program: WebGLProgram, pname: number): unknown {
        this.record('getProgramParameter', program, pname);
        return this.options.failLink !== true;
    }

    getProgramInfoLog(program: WebGLProgram): string | null {
        this.record('getProgramInfoLog', program);
        return this.options.infoLog ?? null;
    }

    deleteProgram(program: WebGLProgram | null): void {
        this.record('deleteProgram', program);
        if (program) this.deletedPrograms.push(program);
    }

    useProgram(program: WebGLProgram | null): void {
        this.record('useProgram', program);
    }

    getUniformLocation(program: WebGLProgram, name: string): WebGLUniformLocation | null {
        this.record('getUniformLocation', program, name);
        if (this.options.missingUniforms?.includes(name)) return null;
        return this.handle();
    }

    uniformMatrix4fv(location: WebGLUniformLocation | null, transpose: boolean, data: Float32Array): void {
        this.record('uniformMatrix4fv', location, transpose, data);
    }

    uniform3f(location: WebGLUniformLocation | null, x: number, y: number, z: number): void {
        this.record('uniform3f', location, x, y, z);
    }

    createBuffer(): WebGLBuffer | null {
        this.record('createBuffer');
        return this.handle();
    }

    bindBuffer(target: number, buffer: WebGLBuffer | null): void {
        this.record('bindBuffer', target, buffer);
        this.bound.set(target, buffer);
    }

    bufferData(target: number, data: Float32Array | Uint16Array, usage: number): void {
        this.record('bufferData', target, data, usage);
        const buffer = this.bound.get(target);
        if (buffer) this.bufferContents.set(buffer, data);
    }

    deleteBuffer(buffer: WebGLBuffer | null): void {
        this.record('deleteBuffer', buffer);
        if (buffer) this.deletedBuffers.push(buffer);
    }

    vertexAttribPointer(index: number, size: number, type: number, normalized: boolean, stride: number, offset: number): void {
        this.record('vertexAttribPointer', index, size, type, normalized, stride, offset);
    }

    enableVertexAttribArray(index: number): void {
        this.record('enableVertexAttribArray', index);
    }

    enable(cap: number): void {
        this.record('enable', cap);
    }

    clearColor(red: number, green: number, blue: number, alpha: number): void {
        this.record('clearColor', red, green, blue, alpha);
    }

    clear(mask: number): void {
        this.record('clear', mask);
    }

    viewport(x: number, y: number, width: number, height: number): void {
        this.record('viewport', x, y, width, height);
    }

    drawElements(mode: number, count: number, type: number, offset: number): void {
        this.record('drawElements', mode, count, type, offset);
    }
}

/**
 * Surface handing out a FakeGl, or nothing when `gl` is null
 */
export function fakeSurface(gl: FakeGl | null, width = 800, height = 600): RenderSurface {
    return {
        width,
        height,
        getContext: () => gl
    };
}
