/**
 * The slice of WebGL2 the viewer talks to. A `WebGL2RenderingContext`
 * satisfies it, and tests hand in a recording fake.
 */
export interface GlContext {
    createShader(type: number): WebGLShader | null;
    shaderSource(shader: WebGLShader, source: string): void;
    compileShader(shader: WebGLShader): void;
    getShaderParameter(shader: WebGLShader, pname: number): unknown;
    getShaderInfoLog(shader: WebGLShader): string | null;
    deleteShader(shader: WebGLShader | null): void;

    createProgram(): WebGLProgram | null;
    attachShader(program: WebGLProgram, shader: WebGLShader): void;
    linkProgram(program: WebGLProgram): void;
    getProgramParameter(program: WebGLProgram, pname: number): unknown;
    getProgramInfoLog(program: WebGLProgram): string | null;
    deleteProgram(program: WebGLProgram | null): void;
    useProgram(program: WebGLProgram | null): void;
    getUniformLocation(program: WebGLProgram, name: string): WebGLUniformLocation | null;
    uniformMatrix4fv(location: WebGLUniformLocation | null, transpose: boolean, data: Float32Array): void;
    uniform3f(location: WebGLUniformLocation | null, x: number, y: number, z: number): void;

    createBuffer(): WebGLBuffer | null;
    bindBuffer(target: number, buffer: WebGLBuffer | null): void;
    bufferData(target: number, data: Float32Array | Uint16Array, usage: number): void;
    deleteBuffer(buffer: WebGLBuffer | null): void;
    vertexAttribPointer(index: number, size: number, type: number, normalized: boolean, stride: number, offset: number): void;
    enableVertexAttribArray(index: number): void;

    enable(cap: number): void;
    clearColor(red: number, green: number, blue: number, alpha: number): void;
    clear(mask: number): void;
    viewport(x: number, y: number, width: number, height: number): void;
    drawElements(mode: number, count: number, type: number, offset: number): void;
}

/**
 * Anything that can hand out a WebGL2 context, an `HTMLCanvasElement` included
 */
export interface RenderSurface {
    readonly width: number;
    readonly height: number;
    getContext(contextId: "webgl2"): GlContext | null;
}

export const GL = {
    DEPTH_BUFFER_BIT: 0x0100,
    COLOR_BUFFER_BIT: 0x4000,
    TRIANGLES: 0x0004,
    DEPTH_TEST: 0x0B71,
    UNSIGNED_SHORT: 0x1403,
    FLOAT: 0x1406,
    ARRAY_BUFFER: 0x8892,
    ELEMENT_ARRAY_BUFFER: 0x8893,
    STATIC_DRAW: 0x88E4,
    FRAGMENT_SHADER: 0x8B30,
    VERTEX_SHADER: 0x8B31,
    COMPILE_STATUS: 0x8B81,
    LINK_STATUS: 0x8B82
} as const;
