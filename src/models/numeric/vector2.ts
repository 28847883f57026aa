/**
 * @module numeric/vector2
 * @description 2D vector value type and arithmetic
 *
 * Vectors are plain immutable `{ x, y }` records; every operation returns a new value.
 */

/**
 * 2D vector
 */
export interface Vector2 {
    readonly x: number;
    readonly y: number;
}

/**
 * Create a vector
 */
export function vec2(x = 0, y = 0): Vector2 {
    return { x, y };
}

export const ZERO_VECTOR: Vector2 = Object.freeze({ x: 0, y: 0 });

/**
 * Vector addition
 */
export function addVec2(a: Vector2, b: Vector2): Vector2 {
    return { x: a.x + b.x, y: a.y + b.y };
}

/**
 * Vector subtraction
 */
export function subVec2(a: Vector2, b: Vector2): Vector2 {
    return { x: a.x - b.x, y: a.y - b.y };
}

/**
 * Scalar multiplication
 */
export function scaleVec2(v: Vector2, s: number): Vector2 {
    return { x: v.x * s, y: v.y * s };
}

/**
 * Vector magnitude
 */
export function lengthVec2(v: Vector2): number {
    return Math.sqrt(v.x * v.x + v.y * v.y);
}

/**
 * Unit vector in the direction of `v`; the zero vector maps to zero.
 */
export function normalizeVec2(v: Vector2): Vector2 {
    const len = lengthVec2(v);
    if (len === 0) {
        return vec2(0, 0);
    }
    return { x: v.x / len, y: v.y / len };
}

/**
 * Rescale `v` to magnitude `limit` when it is longer than `limit`
 */
export function clampLengthVec2(v: Vector2, limit: number): Vector2 {
    const len = lengthVec2(v);
    if (len <= limit || len === 0) {
        return v;
    }
    return scaleVec2(v, limit / len);
}
