import type { Accessor } from "@gltf-transform/core";
import { Logger } from "../services/logger";
import { FlattenError } from "./errors";
import {
    IndexComponentType,
    PrimitiveMode,
    type FlattenedPrimitive,
    type ScenePrimitive
} from "../types/scene";

export const MAX_INDEX_VALUE = 0xFFFF;

/**
 * Narrow an index to 16 bits. Values past 65535 clamp, they never wrap.
 */
export function narrowIndex(value: number): number {
    return value > MAX_INDEX_VALUE ? MAX_INDEX_VALUE : value;
}

export function sequentialIndices(count: number): Uint16Array {
    const indices = new Uint16Array(count);
    for (let i = 0; i < count; i++) {
        indices[i] = narrowIndex(i);
    }
    return indices;
}

function modeName(mode: number): string {
    return PrimitiveMode[mode] ?? `Unknown(${mode})`;
}

function readPositions(accessor: Accessor): Float32Array {
    if (accessor.getElementSize() !== 3) {
        throw new FlattenError(`POSITION accessor must be VEC3, got ${accessor.getType()}`);
    }

    const count = accessor.getCount();
    const vertices = new Float32Array(count * 3);
    const element = [0, 0, 0];
    for (let i = 0; i < count; i++) {
        accessor.getElement(i, element);
        vertices[i * 3 + 0] = element[0];
        vertices[i * 3 + 1] = element[1];
        vertices[i * 3 + 2] = element[2];
    }
    return vertices;
}

function readIndices(accessor: Accessor, vertexCount: number, logger: Logger): Uint16Array {
    const componentType = accessor.getComponentType();
    const count = accessor.getCount();
    const indices = new Uint16Array(count);

    switch (componentType) {
        case IndexComponentType.UNSIGNED_BYTE:
            logger.debug('    Using U8 indices');
            break;
        case IndexComponentType.UNSIGNED_SHORT:
            logger.debug('    Using U16 indices');
            break;
        case IndexComponentType.UNSIGNED_INT:
            logger.debug('    Using U32 indices (converting to U16)');
            break;
        default:
            throw new FlattenError(`Unsupported index component type: ${componentType}`);
    }

    let clamped = 0;
    for (let i = 0; i < count; i++) {
        const value = accessor.getScalar(i);
        if (value >= vertexCount) {
            throw new FlattenError(`Index ${value} at position ${i} is out of range for ${vertexCount} vertices`);
        }
        if (value > MAX_INDEX_VALUE) {
            clamped++;
        }
        indices[i] = narrowIndex(value);
    }

    if (clamped > 0) {
        logger.warn(`    ${clamped} indices exceed ${MAX_INDEX_VALUE}, clamped`);
    }
    return indices;
}

/**
 * Flatten one primitive into xyz vertices and 16-bit indices.
 *
 * Returns null when the primitive has nothing to draw (no POSITION attribute,
 * no vertices, no indices) so the caller can skip it and move on.
 *
 * @throws FlattenError when the primitive's data is inconsistent
 */
export function flattenPrimitive(primitive: ScenePrimitive, logger: Logger = new Logger()): FlattenedPrimitive | null {
    logger.debug(`    Processing primitive with mode: ${modeName(primitive.mode)}`);

    if (!primitive.positions) {
        logger.info('    No position data found in primitive');
        return null;
    }

    const vertices = readPositions(primitive.positions);
    const vertexCount = vertices.length / 3;
    logger.debug(`    Found ${vertexCount} positions in primitive`);

    if (vertexCount === 0) {
        logger.warn('    Empty vertices array');
        return null;
    }

    if (primitive.mode !== PrimitiveMode.Triangles) {
        logger.warn(`    Non-triangle primitive mode: ${modeName(primitive.mode)}, drawing as triangles`);
    }

    let indices: Uint16Array;
    if (primitive.indices) {
        indices = readIndices(primitive.indices, vertexCount, logger);
    } else {
        logger.debug('    No indices found, generating sequential indices');
        indices = sequentialIndices(vertexCount);
    }

    if (indices.length === 0) {
        logger.warn('    Empty indices array');
        return null;
    }

    return { vertices, indices };
}
