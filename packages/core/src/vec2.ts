/**
 * 2D vector helpers
 *
 * Vectors are plain readonly records; every helper returns a new value.
 */

import type { Vec2 } from './types';

export const ZERO: Vec2 = Object.freeze({ x: 0, y: 0 });

export function vec2(x: number, y: number): Vec2 {
  return { x, y };
}

export function add(a: Vec2, b: Vec2): Vec2 {
  return { x: a.x + b.x, y: a.y + b.y };
}

export function sub(a: Vec2, b: Vec2): Vec2 {
  return { x: a.x - b.x, y: a.y - b.y };
}

export function scale(v: Vec2, s: number): Vec2 {
  return { x: v.x * s, y: v.y * s };
}

export function lengthSq(v: Vec2): number {
  return v.x * v.x + v.y * v.y;
}

export function length(v: Vec2): number {
  return Math.sqrt(lengthSq(v));
}

export function distanceSq(a: Vec2, b: Vec2): number {
  const dx = a.x - b.x;
  const dy = a.y - b.y;
  return dx * dx + dy * dy;
}

/**
 * Unit vector in the direction of `v`, or ZERO when `v` has no length.
 */
export function normalizeOrZero(v: Vec2): Vec2 {
  const len = length(v);
  if (len === 0 || !Number.isFinite(len)) {
    return ZERO;
  }
  return { x: v.x / len, y: v.y / len };
}

export function isZero(v: Vec2): boolean {
  return v.x === 0 && v.y === 0;
}

export function equals(a: Vec2, b: Vec2, epsilon = 0): boolean {
  return Math.abs(a.x - b.x) <= epsilon && Math.abs(a.y - b.y) <= epsilon;
}

export function clone(v: Vec2): Vec2 {
  return { x: v.x, y: v.y };
}
