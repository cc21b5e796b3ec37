import { ContextError } from "./errors";
import { GL, type GlContext } from "../types/gl";

/**
 * MeshData - the GPU-side vertex/index buffer pair the viewer draws from
 */
export interface MeshData {
    vertexBuffer: WebGLBuffer;
    indexBuffer: WebGLBuffer;
    vertexCount: number;
    indexCount: number;
}

/**
 * Position-only layout: one vec3 at attribute location 0
 */
export const POSITION_LAYOUT = {
    location: 0,
    size: 3,
    type: GL.FLOAT,
    stride: 3 * Float32Array.BYTES_PER_ELEMENT,
    offset: 0
} as const;

/**
 * Create an empty buffer pair
 */
export function createMeshData(gl: GlContext): MeshData {
    const vertexBuffer = gl.createBuffer();
    if (!vertexBuffer) {
        throw new ContextError("Failed to create vertex buffer");
    }

    const indexBuffer = gl.createBuffer();
    if (!indexBuffer) {
        gl.deleteBuffer(vertexBuffer);
        throw new ContextError("Failed to create index buffer");
    }

    return { vertexBuffer, indexBuffer, vertexCount: 0, indexCount: 0 };
}

/**
 * Replace the full contents of both buffers
 */
export function uploadMeshData(gl: GlContext, mesh: MeshData, vertices: Float32Array, indices: Uint16Array): void {
    gl.bindBuffer(GL.ARRAY_BUFFER, mesh.vertexBuffer);
    gl.bufferData(GL.ARRAY_BUFFER, vertices, GL.STATIC_DRAW);

    gl.bindBuffer(GL.ELEMENT_ARRAY_BUFFER, mesh.indexBuffer);
    gl.bufferData(GL.ELEMENT_ARRAY_BUFFER, indices, GL.STATIC_DRAW);

    mesh.vertexCount = vertices.length / 3;
    mesh.indexCount = indices.length;
}

/**
 * Discard the current geometry by uploading zero-length contents
 */
export function clearMeshData(gl: GlContext, mesh: MeshData): void {
    uploadMeshData(gl, mesh, new Float32Array(0), new Uint16Array(0));
}

/**
 * Destroy mesh data and free GPU resources
 */
export function destroyMeshData(gl: GlContext, mesh: MeshData): void {
    gl.deleteBuffer(mesh.vertexBuffer);
    gl.deleteBuffer(mesh.indexBuffer);
    mesh.vertexCount = 0;
    mesh.indexCount = 0;
}
