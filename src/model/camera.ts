import { mat4, vec3, type ReadonlyVec3 } from "gl-matrix";
import { clamp, fromSpherical, toSpherical, type Spherical } from "../utils";
import type { CameraConfig } from "../services/config";

const WORLD_UP: ReadonlyVec3 = vec3.fromValues(0.0, 1.0, 0.0);

/**
 * Camera orbiting a fixed target.
 *
 * The spherical coordinates are the source of truth; position and the view
 * matrix are derived from them, so orbiting never changes the distance.
 */
export default class Camera {
    readonly target: vec3;
    readonly position: vec3;
    readonly view: mat4;
    readonly projection: mat4;

    private spherical: Spherical;
    private fov: number;
    private near: number;
    private far: number;
    private sensitivity: number;
    private epsilon: number;
    private _aspect: number;

    constructor(config: CameraConfig, aspect: number) {
        this.target = vec3.clone(config.target);
        this.position = vec3.clone(config.position);
        this.view = mat4.create();
        this.projection = mat4.create();

        this.fov = config.fov;
        this.near = config.near;
        this.far = config.far;
        this.sensitivity = config.sensitivity;
        this.epsilon = config.epsilon;
        this._aspect = aspect;

        this.spherical = toSpherical(this.position, this.target);
        mat4.lookAt(this.view, this.position, this.target, WORLD_UP);
        this.updateProjection();
    }

    get distance(): number {
        return this.spherical.distance;
    }

    get theta(): number {
        return this.spherical.theta;
    }

    get phi(): number {
        return this.spherical.phi;
    }

    get aspect(): number {
        return this._aspect;
    }

    /**
     * Rotate around the target. Deltas are input-device units scaled by the sensitivity.
     */
    orbit(deltaX: number, deltaY: number): void {
        const phi = this.spherical.phi + deltaX * this.sensitivity;
        const theta = clamp(
            this.spherical.theta + deltaY * this.sensitivity,
            this.epsilon,
            Math.PI - this.epsilon
        );

        this.spherical = { distance: this.spherical.distance, theta, phi };
        fromSpherical(this.position, this.spherical, this.target);
        mat4.lookAt(this.view, this.position, this.target, WORLD_UP);
    }

    setAspect(aspect: number): void {
        this._aspect = aspect;
        this.updateProjection();
    }

    private updateProjection(): void {
        mat4.perspective(this.projection, this.fov, this._aspect, this.near, this.far);
    }
}
