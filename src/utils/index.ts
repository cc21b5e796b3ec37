import { vec3, type ReadonlyVec3 } from "gl-matrix";

export function Deg2Rad(theta: number): number {
    return theta * Math.PI / 180;
}

export function clamp(value: number, min: number, max: number): number {
    return Math.max(min, Math.min(max, value));
}

/**
 * Spherical coordinates of a point around a center.
 * theta is the polar angle measured from +Y, phi the azimuth in the XZ plane.
 */
export interface Spherical {
    distance: number;
    theta: number;
    phi: number;
}

export function toSpherical(point: ReadonlyVec3, center: ReadonlyVec3): Spherical {
    const offset = vec3.subtract(vec3.create(), point, center);
    const distance = vec3.length(offset);
    if (distance === 0) {
        return { distance: 0, theta: Math.PI / 2, phi: 0 };
    }

    return {
        distance,
        theta: Math.acos(clamp(offset[1] / distance, -1, 1)),
        phi: Math.atan2(offset[2], offset[0])
    };
}

export function fromSpherical(out: vec3, spherical: Spherical, center: ReadonlyVec3): vec3 {
    const { distance, theta, phi } = spherical;
    return vec3.set(
        out,
        center[0] + distance * Math.sin(theta) * Math.cos(phi),
        center[1] + distance * Math.cos(theta),
        center[2] + distance * Math.sin(theta) * Math.sin(phi)
    );
}
