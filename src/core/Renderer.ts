import { mat4, type ReadonlyMat4 } from "gl-matrix";
import vertexShaderSource from "../view/flat.vert.glsl?raw";
import fragmentShaderSource from "../view/flat.frag.glsl?raw";
import { Logger } from "../services/logger";
import {
    ContextError,
    MissingUniformError,
    ProgramLinkError,
    ShaderCompileError,
    type ShaderStage
} from "./errors";
import {
    type MeshData,
    POSITION_LAYOUT,
    clearMeshData,
    createMeshData,
    destroyMeshData,
    uploadMeshData
} from "./MeshData";
import { GL, type GlContext } from "../types/gl";

export const UNIFORM_MVP_MATRIX = "u_mvp_matrix";
export const UNIFORM_COLOR = "u_color";

export interface RendererOptions {
    clearColor?: [number, number, number, number];
    logger?: Logger;
    /** Override the built-in flat shaders */
    shaders?: { vertex: string; fragment: string };
}

function compileShader(gl: GlContext, stage: ShaderStage, source: string): WebGLShader {
    const shader = gl.createShader(stage === 'vertex' ? GL.VERTEX_SHADER : GL.FRAGMENT_SHADER);
    if (!shader) {
        throw new ShaderCompileError(stage, "Failed to create shader");
    }

    gl.shaderSource(shader, source);
    gl.compileShader(shader);

    if (gl.getShaderParameter(shader, GL.COMPILE_STATUS) !== true) {
        const log = gl.getShaderInfoLog(shader) || "Unknown error";
        gl.deleteShader(shader);
        throw new ShaderCompileError(stage, log);
    }
    return shader;
}

function createProgram(gl: GlContext, vertexSource: string, fragmentSource: string): WebGLProgram {
    const vertexShader = compileShader(gl, 'vertex', vertexSource);
    let fragmentShader: WebGLShader;
    try {
        fragmentShader = compileShader(gl, 'fragment', fragmentSource);
    } catch (error) {
        gl.deleteShader(vertexShader);
        throw error;
    }

    const program = gl.createProgram();
    if (!program) {
        gl.deleteShader(vertexShader);
        gl.deleteShader(fragmentShader);
        throw new ContextError("Failed to create program");
    }

    gl.attachShader(program, vertexShader);
    gl.attachShader(program, fragmentShader);
    gl.linkProgram(program);

    // The program keeps the compiled stages alive
    gl.deleteShader(vertexShader);
    gl.deleteShader(fragmentShader);

    if (gl.getProgramParameter(program, GL.LINK_STATUS) !== true) {
        const log = gl.getProgramInfoLog(program) || "Unknown error";
        gl.deleteProgram(program);
        throw new ProgramLinkError(log);
    }
    return program;
}

/**
 * Renderer - WebGL2 flat-color renderer for a single indexed mesh
 *
 * Owns the shader program, the uniform locations and the vertex/index buffers.
 * Everything is created once in `create`; a failure there is fatal.
 *
 * Usage:
 *   const renderer = Renderer.create(gl, { logger });
 *   renderer.upload(vertices, indices);
 *   renderer.render(view, projection, [0.8, 0.4, 0.2]);
 */
export default class Renderer {
    readonly gl: GlContext;
    readonly program: WebGLProgram;
    readonly mesh: MeshData;

    private uMvpMatrix: WebGLUniformLocation;
    private uColor: WebGLUniformLocation;
    private logger: Logger;

    private modelMatrix: mat4 = mat4.create();
    private mvpMatrix: mat4 = mat4.create();

    private constructor(
        gl: GlContext,
        program: WebGLProgram,
        uniforms: { mvpMatrix: WebGLUniformLocation; color: WebGLUniformLocation },
        mesh: MeshData,
        logger: Logger
    ) {
        this.gl = gl;
        this.program = program;
        this.uMvpMatrix = uniforms.mvpMatrix;
        this.uColor = uniforms.color;
        this.mesh = mesh;
        this.logger = logger;
    }

    /**
     * @throws ShaderCompileError, ProgramLinkError, MissingUniformError, ContextError
     */
    static create(gl: GlContext, options: RendererOptions = {}): Renderer {
        const logger = options.logger ?? new Logger();
        const shaders = options.shaders ?? { vertex: vertexShaderSource, fragment: fragmentShaderSource };
        const [r, g, b, a] = options.clearColor ?? [0.1, 0.1, 0.1, 1.0];

        const program = createProgram(gl, shaders.vertex, shaders.fragment);

        const mvpMatrix = gl.getUniformLocation(program, UNIFORM_MVP_MATRIX);
        if (!mvpMatrix) {
            gl.deleteProgram(program);
            throw new MissingUniformError(UNIFORM_MVP_MATRIX);
        }
        const color = gl.getUniformLocation(program, UNIFORM_COLOR);
        if (!color) {
            gl.deleteProgram(program);
            throw new MissingUniformError(UNIFORM_COLOR);
        }

        let mesh: MeshData;
        try {
            mesh = createMeshData(gl);
        } catch (error) {
            gl.deleteProgram(program);
            throw error;
        }

        gl.enable(GL.DEPTH_TEST);
        gl.clearColor(r, g, b, a);

        logger.debug("Renderer: program linked, uniforms resolved, buffers created");
        return new Renderer(gl, program, { mvpMatrix, color }, mesh, logger);
    }

    get indexCount(): number {
        return this.mesh.indexCount;
    }

    get vertexCount(): number {
        return this.mesh.vertexCount;
    }

    /**
     * Rewrite both buffers with new geometry
     */
    upload(vertices: Float32Array, indices: Uint16Array): void {
        uploadMeshData(this.gl, this.mesh, vertices, indices);
        this.logger.info(`Uploaded geometry: ${vertices.length / 3} vertices, ${indices.length} indices`);
    }

    /**
     * Upload empty contents, discarding the previous geometry
     */
    clear(): void {
        clearMeshData(this.gl, this.mesh);
    }

    setViewport(width: number, height: number): void {
        this.gl.viewport(0, 0, width, height);
    }

    /**
     * Draw the mesh with `projection * view * identity`. Does nothing without geometry.
     */
    render(view: ReadonlyMat4, projection: ReadonlyMat4, color: readonly [number, number, number]): void {
        if (this.mesh.indexCount === 0) {
            return;
        }

        const gl = this.gl;
        gl.clear(GL.COLOR_BUFFER_BIT | GL.DEPTH_BUFFER_BIT);
        gl.useProgram(this.program);

        mat4.multiply(this.mvpMatrix, projection, view);
        mat4.multiply(this.mvpMatrix, this.mvpMatrix, this.modelMatrix);

        gl.uniformMatrix4fv(this.uMvpMatrix, false, new Float32Array(this.mvpMatrix));
        gl.uniform3f(this.uColor, color[0], color[1], color[2]);

        gl.bindBuffer(GL.ARRAY_BUFFER, this.mesh.vertexBuffer);
        gl.vertexAttribPointer(
            POSITION_LAYOUT.location,
            POSITION_LAYOUT.size,
            POSITION_LAYOUT.type,
            false,
            POSITION_LAYOUT.stride,
            POSITION_LAYOUT.offset
        );
        gl.enableVertexAttribArray(POSITION_LAYOUT.location);

        gl.bindBuffer(GL.ELEMENT_ARRAY_BUFFER, this.mesh.indexBuffer);
        gl.drawElements(GL.TRIANGLES, this.mesh.indexCount, GL.UNSIGNED_SHORT, 0);
    }

    /**
     * Cleanup GPU resources
     */
    destroy(): void {
        destroyMeshData(this.gl, this.mesh);
        this.gl.deleteProgram(this.program);
    }
}
