import * as THREE from "three";
import { CELL_EPSILON } from "../constants";

/** Euclidean remainder: wraps any integer into [0, n). */
export function wrapIndex(i: number, n: number): number {
  return THREE.MathUtils.euclideanModulo(i, n);
}

/**
 * Cell index for a fraction of a span divided into `count` cells.
 * `fraction` 0 is the start of cell 0; results are clamped into [0, count).
 */
export function cellAt(fraction: number, count: number): number {
  const cell = Math.floor(fraction * count + CELL_EPSILON);
  return THREE.MathUtils.clamp(cell, 0, count - 1);
}

/**
 * Validates a grid dimension. Sizes are fixed for a grid's lifetime, so a bad
 * one is rejected where the topology is built.
 */
export function assertGridSize(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`Grid ${name} must be a positive integer, got ${value}`);
  }
}
