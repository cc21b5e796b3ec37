import { WebIO, type Document, type GLTF } from "@gltf-transform/core";
import { Logger } from "../services/logger";
import { MalformedAssetError, TooSmallError, describeError } from "./errors";
import {
    ContainerKind,
    type DecodedScene,
    type ExternalResources,
    type SceneMesh,
    type ScenePrimitive
} from "../types/scene";

/** ASCII "glTF" */
const GLB_MAGIC = [0x67, 0x6C, 0x54, 0x46];

export const MIN_ASSET_BYTES = 4;

/**
 * Compare the first four bytes against the GLB signature.
 * Only a hint: text payloads that turn out not to be UTF-8 still go to the GLB reader.
 */
export function detectContainerKind(bytes: Uint8Array): ContainerKind {
    if (bytes.byteLength < GLB_MAGIC.length) {
        return ContainerKind.Text;
    }
    const isGlb = GLB_MAGIC.every((value, i) => bytes[i] === value);
    return isGlb ? ContainerKind.Binary : ContainerKind.Text;
}

function isGltfJson(value: unknown): value is GLTF.IGLTF {
    return typeof value === 'object'
        && value !== null
        && 'asset' in value
        && typeof value.asset === 'object'
        && value.asset !== null;
}

/**
 * Walk meshes, then primitives, in file order
 */
export function* iteratePrimitives(scene: DecodedScene): Generator<{ mesh: SceneMesh; primitive: ScenePrimitive }> {
    for (const mesh of scene.meshes) {
        for (const primitive of mesh.primitives) {
            yield { mesh, primitive };
        }
    }
}

/**
 * Snapshot a parsed document's meshes and primitives in file order
 */
export function toScene(document: Document, kind: ContainerKind): DecodedScene {
    const root = document.getRoot();

    const meshes: SceneMesh[] = root.listMeshes().map((mesh, meshIndex) => ({
        index: meshIndex,
        name: mesh.getName() || null,
        primitives: mesh.listPrimitives().map((primitive, primitiveIndex) => ({
            index: primitiveIndex,
            mode: primitive.getMode(),
            positions: primitive.getAttribute('POSITION'),
            indices: primitive.getIndices()
        }))
    }));

    return {
        kind,
        meshes,
        stats: {
            scenes: root.listScenes().length,
            meshes: meshes.length,
            buffers: root.listBuffers().length,
            nodes: root.listNodes().length
        }
    };
}

/**
 * AssetDecoder - turns raw .glb / .gltf bytes into a DecodedScene
 *
 * Usage:
 *   const decoder = new AssetDecoder(logger);
 *   const scene = await decoder.decode(bytes, { "scene.bin": binBytes });
 */
export default class AssetDecoder {
    private io: WebIO;
    private logger: Logger;

    constructor(logger: Logger = new Logger()) {
        this.logger = logger;
        this.io = new WebIO().setLogger(logger);
    }

    /**
     * @param resources - bytes for buffers a JSON document references by URI
     * @throws TooSmallError when fewer than four bytes are given
     * @throws MalformedAssetError when the parser rejects the data
     */
    async decode(bytes: Uint8Array, resources: ExternalResources = {}): Promise<DecodedScene> {
        this.logger.info(`Loading glTF data... ${bytes.byteLength} bytes`);

        if (bytes.byteLength < MIN_ASSET_BYTES) {
            throw new TooSmallError(bytes.byteLength);
        }

        const kind = detectContainerKind(bytes);
        this.logger.info(`File type: ${kind === ContainerKind.Binary ? 'GLB (binary)' : 'glTF (JSON)'}`);

        let document: Document;
        try {
            document = await this.parse(bytes, kind, resources);
        } catch (error) {
            this.logger.error(`glTF import error: ${describeError(error)}`);
            throw new MalformedAssetError(describeError(error), error);
        }

        const scene = toScene(document, kind);
        this.logger.success(
            `glTF imported: ${scene.stats.scenes} scenes, ${scene.stats.meshes} meshes, ` +
            `${scene.stats.buffers} buffers, ${scene.stats.nodes} nodes`
        );
        return scene;
    }

    private async parse(bytes: Uint8Array, kind: ContainerKind, resources: ExternalResources): Promise<Document> {
        if (kind === ContainerKind.Binary) {
            return this.io.readBinary(bytes);
        }

        let text: string;
        try {
            text = new TextDecoder('utf-8', { fatal: true }).decode(bytes);
        } catch (error) {
            this.logger.warn(`Not valid UTF-8, treating as binary: ${describeError(error)}`);
            return this.io.readBinary(bytes);
        }

        this.logger.debug(`Parsing as JSON glTF, ${text.length} characters`);
        const json: unknown = JSON.parse(text);
        if (!isGltfJson(json)) {
            throw new Error('JSON document has no "asset" object');
        }

        // data: URIs are resolved by the reader; other buffers must be in `resources`
        return this.io.readJSON({ json, resources });
    }
}
