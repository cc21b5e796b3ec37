import Camera from "../model/camera";
import { Logger, type StatusLogCallback } from "../services/logger";
import { resolveConfig, type ViewerConfig, type ViewerOptions } from "../services/config";
import AssetDecoder, { MIN_ASSET_BYTES } from "./AssetDecoder";
import MeshFactory from "./MeshFactory";
import Renderer from "./Renderer";
import {
    ContextError,
    DecodeError,
    LoadError,
    TooSmallError,
    describeError
} from "./errors";
import type { RenderSurface } from "../types/gl";
import type { DecodedScene, ExternalResources, PrimitiveOutcome, SceneBuffers } from "../types/scene";

export enum ViewerState {
    Empty = 'empty',
    Loading = 'loading',
    Ready = 'ready'
}

const TRANSITIONS: Record<ViewerState, readonly ViewerState[]> = {
    [ViewerState.Empty]: [ViewerState.Loading],
    [ViewerState.Loading]: [ViewerState.Ready, ViewerState.Empty],
    [ViewerState.Ready]: [ViewerState.Loading]
};

export type LoadOutcome = 'loaded' | 'placeholder' | 'retained';

export interface LoadReport {
    outcome: LoadOutcome;
    vertexCount: number;
    indexCount: number;
    /** Per-primitive results; empty when the asset never decoded */
    primitives: PrimitiveOutcome[];
    /** Whole-asset decode failure that led to a placeholder or retained geometry */
    error?: DecodeError;
}

export interface ViewerCreateOptions extends ViewerOptions {
    onStatus?: StatusLogCallback;
    logger?: Logger;
}

/**
 * Viewer - glTF ingestion + orbit-camera rendering on one WebGL2 surface
 *
 * Usage:
 *   const viewer = Viewer.create(canvas);
 *   await viewer.load(new Uint8Array(await file.arrayBuffer()));
 *   function frame() { viewer.render(); requestAnimationFrame(frame); }
 *   canvas.addEventListener('pointermove', (e) => viewer.orbit(e.movementX, e.movementY));
 */
export default class Viewer {
    readonly config: ViewerConfig;
    readonly camera: Camera;
    readonly logger: Logger;

    readonly renderer: Renderer;
    private decoder: AssetDecoder;
    private _state: ViewerState = ViewerState.Empty;
    private destroyed = false;

    private constructor(renderer: Renderer, camera: Camera, config: ViewerConfig, logger: Logger) {
        this.renderer = renderer;
        this.camera = camera;
        this.config = config;
        this.logger = logger;
        this.decoder = new AssetDecoder(logger);
    }

    /**
     * Bind to a surface and build every GPU resource up front.
     *
     * @throws InitError when no WebGL2 context is available or the program cannot be built
     */
    static create(surface: RenderSurface, options: ViewerCreateOptions = {}): Viewer {
        const { onStatus, logger: givenLogger, ...viewerOptions } = options;
        const config = resolveConfig(viewerOptions);
        const logger = givenLogger ?? new Logger(config.logLevel, onStatus);

        logger.info("Initializing glTF Viewer...");

        const gl = surface.getContext("webgl2");
        if (!gl) {
            throw new ContextError("WebGL2 is not supported on this surface");
        }

        const renderer = Renderer.create(gl, { clearColor: config.clearColor, logger });
        const aspect = surface.height > 0 ? surface.width / surface.height : 1;
        const camera = new Camera(config.camera, aspect);

        logger.success("glTF Viewer initialized successfully");
        return new Viewer(renderer, camera, config, logger);
    }

    get state(): ViewerState {
        return this._state;
    }

    get indexCount(): number {
        return this.renderer.indexCount;
    }

    get vertexCount(): number {
        return this.renderer.vertexCount;
    }

    /**
     * Decode, flatten and upload an asset.
     *
     * Resolves with a report for every asset that reached the parser, including
     * ones that fell back to the placeholder or kept the previous geometry.
     *
     * @param resources - external buffers a .gltf document references by URI
     * @throws LoadError for empty/too-small input, while another load is running or once destroyed
     */
    async load(bytes: Uint8Array, resources: ExternalResources = {}): Promise<LoadReport> {
        this.ensureAlive();
        if (this._state === ViewerState.Loading) {
            throw new LoadError("A load is already in progress");
        }
        if (bytes.byteLength < MIN_ASSET_BYTES) {
            const cause = new TooSmallError(bytes.byteLength);
            this.logger.error(cause.message);
            throw new LoadError(bytes.byteLength === 0 ? "No glTF data given" : "glTF file too small", cause);
        }

        const previous = this._state;
        this.transition(ViewerState.Loading);

        let scene: DecodedScene;
        try {
            scene = await this.decoder.decode(bytes, resources);
        } catch (error) {
            this.ensureStillLoading();
            if (!(error instanceof DecodeError)) {
                this.transition(previous === ViewerState.Ready ? ViewerState.Ready : ViewerState.Empty);
                throw new LoadError(`Unexpected failure while decoding: ${describeError(error)}`, error);
            }
            return this.recoverFromDecodeError(previous, error);
        }
        this.ensureStillLoading();

        if (scene.meshes.length === 0) {
            this.logger.warn("No meshes found in glTF file, creating fallback box");
            return this.commitPlaceholder([]);
        }

        const accumulated = MeshFactory.fromScene(scene, {
            overflow: this.config.indexOverflow,
            logger: this.logger
        });

        if (accumulated.vertexCount === 0) {
            this.logger.warn("No geometry extracted from glTF, creating fallback box");
            return this.commitPlaceholder(accumulated.outcomes);
        }

        this.commit(accumulated);
        this.logger.success("glTF loading completed successfully");
        return {
            outcome: 'loaded',
            vertexCount: accumulated.vertexCount,
            indexCount: accumulated.indexCount,
            primitives: accumulated.outcomes
        };
    }

    /**
     * Replace the current geometry with the placeholder cube
     */
    loadPlaceholder(): LoadReport {
        this.ensureAlive();
        if (this._state === ViewerState.Loading) {
            throw new LoadError("A load is already in progress");
        }
        this.transition(ViewerState.Loading);
        return this.commitPlaceholder([]);
    }

    render(): void {
        this.renderer.render(this.camera.view, this.camera.projection, this.config.meshColor);
    }

    orbit(deltaX: number, deltaY: number): void {
        this.camera.orbit(deltaX, deltaY);
    }

    resize(width: number, height: number): void {
        if (width === 0 || height === 0) {
            this.logger.warn(`Ignoring resize to ${width}x${height}`);
            return;
        }
        this.renderer.setViewport(width, height);
        this.camera.setAspect(width / height);
    }

    destroy(): void {
        if (this.destroyed) return;
        this.destroyed = true;
        this.renderer.destroy();
        this._state = ViewerState.Empty;
    }

    private ensureAlive(): void {
        if (this.destroyed) {
            throw new LoadError("Viewer has been destroyed");
        }
    }

    /**
     * A load that outlived destroy() must not touch the released buffers
     */
    private ensureStillLoading(): void {
        if (this.destroyed || this._state !== ViewerState.Loading) {
            throw new LoadError("Viewer was destroyed while loading");
        }
    }

    private recoverFromDecodeError(previous: ViewerState, error: DecodeError): LoadReport {
        if (previous === ViewerState.Ready) {
            this.logger.warn(`Keeping previous geometry: ${error.message}`);
            this.transition(ViewerState.Ready);
            return {
                outcome: 'retained',
                vertexCount: this.renderer.vertexCount,
                indexCount: this.renderer.indexCount,
                primitives: [],
                error
            };
        }

        this.logger.warn(`Falling back to placeholder: ${error.message}`);
        return { ...this.commitPlaceholder([]), error };
    }

    private commitPlaceholder(primitives: PrimitiveOutcome[]): LoadReport {
        const cube = MeshFactory.placeholderCube();
        this.commit(cube);
        this.logger.info("Test box created");
        return {
            outcome: 'placeholder',
            vertexCount: cube.vertexCount,
            indexCount: cube.indexCount,
            primitives
        };
    }

    /**
     * Clear, then upload, in one synchronous step
     */
    private commit(buffers: SceneBuffers): void {
        this.ensureStillLoading();
        this.renderer.clear();
        this.renderer.upload(buffers.vertices, buffers.indices);
        this.transition(ViewerState.Ready);
    }

    private transition(next: ViewerState): void {
        if (!TRANSITIONS[this._state].includes(next)) {
            throw new Error(`Invalid viewer state transition: ${this._state} -> ${next}`);
        }
        this._state = next;
    }
}
