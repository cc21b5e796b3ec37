import type { Accessor } from "@gltf-transform/core";

/**
 * 📦 Scene data types shared by the decoder, flattener and accumulator
 */

export enum ContainerKind {
    Binary = 'binary',
    Text = 'text'
}

/**
 * glTF primitive topology (`mesh.primitives[].mode`)
 */
export enum PrimitiveMode {
    Points = 0,
    Lines = 1,
    LineLoop = 2,
    LineStrip = 3,
    Triangles = 4,
    TriangleStrip = 5,
    TriangleFan = 6
}

/**
 * Accessor component types allowed for primitive indices
 */
export const IndexComponentType = {
    UNSIGNED_BYTE: 5121,
    UNSIGNED_SHORT: 5123,
    UNSIGNED_INT: 5125
} as const;

/**
 * External buffers of a JSON document, keyed by the buffer URI
 */
export type ExternalResources = Record<string, Uint8Array>;

export interface ScenePrimitive {
    /** Position in the owning mesh's primitive list */
    index: number;
    mode: number;
    positions: Accessor | null;
    indices: Accessor | null;
}

export interface SceneMesh {
    index: number;
    name: string | null;
    primitives: ScenePrimitive[];
}

export interface SceneStats {
    scenes: number;
    meshes: number;
    buffers: number;
    nodes: number;
}

export interface DecodedScene {
    kind: ContainerKind;
    meshes: SceneMesh[];
    stats: SceneStats;
}

export interface FlattenedPrimitive {
    /** xyz triples */
    vertices: Float32Array;
    indices: Uint16Array;
}

export interface SceneBuffers {
    vertices: Float32Array;
    indices: Uint16Array;
    vertexCount: number;
    indexCount: number;
}

/**
 * What to do when the accumulated vertex count leaves the 16-bit index space
 */
export type IndexOverflowPolicy = 'fail' | 'clamp';

export type PrimitiveOutcome =
    | { status: 'added'; mesh: number; primitive: number; vertexCount: number; indexCount: number }
    | { status: 'skipped'; mesh: number; primitive: number }
    | { status: 'failed'; mesh: number; primitive: number; error: Error };

export interface AccumulatedScene extends SceneBuffers {
    outcomes: PrimitiveOutcome[];
}
