import Builder from "../model/builder";
import { Logger } from "../services/logger";
import { iteratePrimitives } from "./AssetDecoder";
import { flattenPrimitive } from "./PrimitiveFlattener";
import type {
    AccumulatedScene,
    DecodedScene,
    IndexOverflowPolicy,
    PrimitiveOutcome,
    SceneBuffers
} from "../types/scene";

export interface AccumulateOptions {
    overflow?: IndexOverflowPolicy;
    logger?: Logger;
}

type Attempt<T> =
    | { ok: true; value: T }
    | { ok: false; error: Error };

function attempt<T>(run: () => T): Attempt<T> {
    try {
        return { ok: true, value: run() };
    } catch (error) {
        return { ok: false, error: error instanceof Error ? error : new Error(String(error)) };
    }
}

/**
 * MeshFactory - builds the CPU-side buffers the renderer uploads
 *
 * Usage:
 *   const buffers = MeshFactory.fromScene(scene, { overflow: 'fail', logger });
 *   const cube = MeshFactory.placeholderCube();
 */
export default class MeshFactory {

    /**
     * Axis-aligned cube spanning -1..1, substituted when an asset yields no geometry
     */
    static placeholderCube(): SceneBuffers {
        const vertices = new Float32Array([
            // front
            -1.0, -1.0, 1.0,
            1.0, -1.0, 1.0,
            1.0, 1.0, 1.0,
            -1.0, 1.0, 1.0,
            // back
            -1.0, -1.0, -1.0,
            -1.0, 1.0, -1.0,
            1.0, 1.0, -1.0,
            1.0, -1.0, -1.0,
        ]);

        const indices = new Uint16Array([
            0, 1, 2, 0, 2, 3,    // front
            4, 5, 6, 4, 6, 7,    // back
            4, 0, 3, 4, 3, 5,    // left
            1, 7, 6, 1, 6, 2,    // right
            3, 2, 6, 3, 6, 5,    // top
            4, 7, 1, 4, 1, 0,    // bottom
        ]);

        return {
            vertices,
            indices,
            vertexCount: vertices.length / 3,
            indexCount: indices.length
        };
    }

    /**
     * Flatten every primitive of every mesh, in file order, into one buffer pair.
     * A primitive that fails is logged and recorded, and the walk goes on.
     */
    static fromScene(scene: DecodedScene, options: AccumulateOptions = {}): AccumulatedScene {
        const logger = options.logger ?? new Logger();
        const builder = new Builder(options.overflow ?? 'fail');
        const outcomes: PrimitiveOutcome[] = [];

        let currentMesh = -1;
        for (const { mesh, primitive } of iteratePrimitives(scene)) {
            if (mesh.index !== currentMesh) {
                currentMesh = mesh.index;
                logger.info(`Processing mesh ${mesh.index}: ${mesh.name ?? 'unnamed'}`);
            }
            const where = { mesh: mesh.index, primitive: primitive.index };

            const result = attempt(() => flattenPrimitive(primitive, logger));
            if (!result.ok) {
                logger.error(`    Error processing primitive ${primitive.index}: ${result.error.message}`);
                outcomes.push({ status: 'failed', ...where, error: result.error });
                continue;
            }

            const flattened = result.value;
            if (!flattened || flattened.indices.length < 3) {
                logger.info(`    Primitive ${primitive.index} skipped (no geometry)`);
                outcomes.push({ status: 'skipped', ...where });
                continue;
            }

            const added = attempt(() => builder.addPrimitive(flattened));
            if (!added.ok) {
                logger.error(`    Error processing primitive ${primitive.index}: ${added.error.message}`);
                outcomes.push({ status: 'failed', ...where, error: added.error });
                continue;
            }
            if (added.value > 0) {
                logger.warn(`    Dropped ${added.value} trailing indices that do not form a triangle`);
            }

            const vertexCount = flattened.vertices.length / 3;
            const indexCount = flattened.indices.length - added.value;
            logger.info(`    Added ${vertexCount} vertices, ${indexCount} indices`);
            outcomes.push({ status: 'added', ...where, vertexCount, indexCount });
        }

        const buffers = builder.build();
        if (buffers.vertexCount > 0) {
            logger.info(`Total vertices: ${buffers.vertexCount}, Total indices: ${buffers.indexCount}`);
        }
        return { ...buffers, outcomes };
    }
}
