/**
 * Core module - glTF ingestion and flat-color WebGL2 rendering
 *
 * Usage:
 * ```typescript
 * import { Viewer } from './core';
 *
 * // Initialize
 * const viewer = Viewer.create(canvas, { onStatus: (msg, level) => panel.log(msg, level) });
 *
 * // Load a .glb or .gltf (external buffers go in the second argument)
 * const report = await viewer.load(bytes);
 * console.log(report.outcome, report.indexCount);
 *
 * // Render loop
 * function render() {
 *   viewer.render();
 *   requestAnimationFrame(render);
 * }
 * render();
 * ```
 */

export { default as Viewer, ViewerState, type LoadReport, type LoadOutcome, type ViewerCreateOptions } from './Viewer';
export { default as Renderer, type RendererOptions, UNIFORM_COLOR, UNIFORM_MVP_MATRIX } from './Renderer';
export { default as AssetDecoder, detectContainerKind, iteratePrimitives, toScene } from './AssetDecoder';
export { flattenPrimitive, narrowIndex, sequentialIndices, MAX_INDEX_VALUE } from './PrimitiveFlattener';
export { default as MeshFactory, type AccumulateOptions } from './MeshFactory';
export {
    type MeshData,
    createMeshData,
    uploadMeshData,
    clearMeshData,
    destroyMeshData,
    POSITION_LAYOUT
} from './MeshData';
export * from './errors';
export { default as Camera } from '../model/camera';
export { default as Builder, MAX_VERTEX_COUNT } from '../model/builder';
export { Logger, type LogLevel, type StatusLogCallback } from '../services/logger';
export { defaultConfig, resolveConfig, type ViewerConfig, type ViewerOptions, type CameraConfig } from '../services/config';
export * from '../types/scene';
export type { GlContext, RenderSurface } from '../types/gl';
export { GL } from '../types/gl';
