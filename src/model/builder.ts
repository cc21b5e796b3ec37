import { TooManyVerticesError } from "../core/errors";
import { MAX_INDEX_VALUE, narrowIndex } from "../core/PrimitiveFlattener";
import type { FlattenedPrimitive, IndexOverflowPolicy, SceneBuffers } from "../types/scene";

/** Vertices addressable by a 16-bit index */
export const MAX_VERTEX_COUNT = MAX_INDEX_VALUE + 1;

/**
 * Builder - concatenates flattened primitives into one vertex/index buffer pair
 *
 * Each primitive's indices are rebased by the number of vertices already added.
 * The running count is a plain number; it is narrowed to 16 bits only when a
 * rebased index is written.
 */
export default class Builder {
    vertices: number[];
    indices: number[];
    vertexCount: number;
    readonly overflow: IndexOverflowPolicy;

    constructor(overflow: IndexOverflowPolicy = 'fail') {
        this.vertices = [];
        this.indices = [];
        this.vertexCount = 0;
        this.overflow = overflow;
    }

    get indexCount(): number {
        return this.indices.length;
    }

    get isEmpty(): boolean {
        return this.vertices.length === 0;
    }

    /**
     * Append a primitive, rebasing its indices by the current vertex count.
     * Indices past the primitive's last whole triangle are dropped; the
     * return value is how many.
     * Under the "fail" policy a primitive that would leave the 16-bit index
     * space is rejected and nothing is appended.
     *
     * @throws TooManyVerticesError
     */
    addPrimitive(primitive: FlattenedPrimitive): number {
        const offset = this.vertexCount;
        const primitiveVertexCount = primitive.vertices.length / 3;
        const total = offset + primitiveVertexCount;

        if (total > MAX_VERTEX_COUNT && this.overflow === 'fail') {
            throw new TooManyVerticesError(total, MAX_VERTEX_COUNT);
        }

        for (let i = 0; i < primitive.vertices.length; i++) {
            this.vertices.push(primitive.vertices[i]);
        }
        const dropped = primitive.indices.length % 3;
        const usable = primitive.indices.length - dropped;
        for (let i = 0; i < usable; i++) {
            this.indices.push(narrowIndex(primitive.indices[i] + offset));
        }

        this.vertexCount = total;
        return dropped;
    }

    getFlattenedVertices(): Float32Array {
        return new Float32Array(this.vertices);
    }

    getIndexArray(): Uint16Array {
        return new Uint16Array(this.indices);
    }

    build(): SceneBuffers {
        return {
            vertices: this.getFlattenedVertices(),
            indices: this.getIndexArray(),
            vertexCount: this.vertexCount,
            indexCount: this.indexCount
        };
    }
}
