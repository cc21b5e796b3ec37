import { vec3 } from "gl-matrix";
import { Deg2Rad } from "../utils";
import { isLogLevel, type LogLevel } from "./logger";
import type { IndexOverflowPolicy } from "../types/scene";

export interface CameraConfig {
    position: vec3;
    target: vec3;
    /** Vertical field of view, radians */
    fov: number;
    near: number;
    far: number;
    /** Radians per input unit */
    sensitivity: number;
    /** Keeps theta inside [epsilon, PI - epsilon] */
    epsilon: number;
}

export interface ViewerConfig {
    camera: CameraConfig;
    clearColor: [number, number, number, number];
    meshColor: [number, number, number];
    indexOverflow: IndexOverflowPolicy;
    logLevel: LogLevel | 'silent';
}

export type ViewerOptions = Partial<Omit<ViewerConfig, 'camera'>> & {
    camera?: Partial<CameraConfig>;
};

/**
 * Process-wide defaults, read from the Vite environment once
 */
class ViewerEnvConfig {
    private static instance: ViewerEnvConfig;
    readonly logLevel: LogLevel | 'silent';
    readonly indexOverflow: IndexOverflowPolicy;

    private constructor() {
        const level = import.meta.env.VITE_VIEWER_LOG_LEVEL;
        this.logLevel = level && isLogLevel(level) ? level : 'info';

        const overflow = import.meta.env.VITE_VIEWER_INDEX_OVERFLOW;
        this.indexOverflow = overflow === 'clamp' ? 'clamp' : 'fail';
    }

    public static getInstance(): ViewerEnvConfig {
        if (!ViewerEnvConfig.instance) {
            ViewerEnvConfig.instance = new ViewerEnvConfig();
        }
        return ViewerEnvConfig.instance;
    }
}

export function defaultConfig(): ViewerConfig {
    const env = ViewerEnvConfig.getInstance();
    return {
        camera: {
            position: vec3.fromValues(3.0, 3.0, 5.0),
            target: vec3.fromValues(0.0, 0.0, 0.0),
            fov: Deg2Rad(45),
            near: 0.1,
            far: 100.0,
            sensitivity: 0.01,
            epsilon: 0.1
        },
        clearColor: [0.1, 0.1, 0.1, 1.0],
        meshColor: [0.8, 0.4, 0.2],
        indexOverflow: env.indexOverflow,
        logLevel: env.logLevel
    };
}

export function resolveConfig(options: ViewerOptions = {}): ViewerConfig {
    const defaults = defaultConfig();
    const { camera, ...rest } = options;
    return {
        ...defaults,
        ...rest,
        camera: { ...defaults.camera, ...camera }
    };
}
