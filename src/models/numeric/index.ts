/**
 * @module src/models/numeric
 * @description Numerical primitives
 *
 * Contains:
 * - Vector2: immutable 2D vector arithmetic
 */

export * from './vector2';
