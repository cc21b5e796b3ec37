import { Accessor, Document, Primitive, WebIO, type GLTF } from "@gltf-transform/core";
import { toScene } from "../core/AssetDecoder";
import { ContainerKind, type DecodedScene, type ScenePrimitive } from "../types/scene";

/**
 * In-process glTF assets for tests
 */

export const TRIANGLE_POSITIONS = [
    0, 0, 0,
    1, 0, 0,
    0, 1, 0
];

export const QUAD_POSITIONS = [
    0, 0, 0,
    1, 0, 0,
    1, 1, 0,
    0, 1, 0
];

export const QUAD_INDICES = [0, 1, 2, 0, 2, 3];

export interface PrimitiveSpec {
    positions?: number[];
    indices?: Uint8Array | Uint16Array | Uint32Array;
    mode?: GLTF.MeshPrimitiveMode;
}

export interface MeshSpec {
    name?: string;
    primitives: PrimitiveSpec[];
}

/**
 * Build a document with one buffer and the given meshes
 */
export function createDocument(meshes: MeshSpec[]): Document {
    const document = new Document();
    const buffer = document.createBuffer();
    const scene = document.createScene();

    for (const spec of meshes) {
        const mesh = document.createMesh(spec.name);
        for (const primitiveSpec of spec.primitives) {
            const primitive = document.createPrimitive();
            if (primitiveSpec.positions) {
                primitive.setAttribute('POSITION', document.createAccessor()
                    .setType(Accessor.Type.VEC3)
                    .setArray(new Float32Array(primitiveSpec.positions))
                    .setBuffer(buffer));
            }
            if (primitiveSpec.indices) {
                primitive.setIndices(document.createAccessor()
                    .setType(Accessor.Type.SCALAR)
                    .setArray(primitiveSpec.indices)
                    .setBuffer(buffer));
            }
            primitive.setMode(primitiveSpec.mode ?? Primitive.Mode.TRIANGLES);
            mesh.addPrimitive(primitive);
        }
        scene.addChild(document.createNode(spec.name).setMesh(mesh));
    }
    return document;
}

export async function toGlb(document: Document): Promise<Uint8Array> {
    return new WebIO().writeBinary(document);
}

export function encodeJson(json: unknown): Uint8Array {
    return new TextEncoder().encode(JSON.stringify(json));
}

/**
 * A .gltf with one un-indexed triangle, its buffer embedded as a data URI
 */
export function triangleGltfJson(): Uint8Array {
    const data = Buffer.from(new Float32Array(TRIANGLE_POSITIONS).buffer).toString('base64');
    return encodeJson({
        asset: { version: '2.0' },
        scenes: [{ nodes: [0] }],
        nodes: [{ mesh: 0 }],
        buffers: [{ byteLength: 36, uri: `data:application/octet-stream;base64,${data}` }],
        bufferViews: [{ buffer: 0, byteOffset: 0, byteLength: 36 }],
        accessors: [{
            bufferView: 0,
            componentType: 5126,
            count: 3,
            type: 'VEC3',
            min: [0, 0, 0],
            max: [1, 1, 0]
        }],
        meshes: [{ name: 'triangle', primitives: [{ attributes: { POSITION: 0 } }] }]
    });
}

export const EMPTY_SCENE_JSON = { asset: { version: '2.0' }, scenes: [{ nodes: [] }] };

export function decodedScene(document: Document): DecodedScene {
    return toScene(document, ContainerKind.Binary);
}

export function scenePrimitive(document: Document, meshIndex = 0, primitiveIndex = 0): ScenePrimitive {
    return decodedScene(document).meshes[meshIndex].primitives[primitiveIndex];
}
