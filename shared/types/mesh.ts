/**
 * Immutable triangle mesh types
 * All types are readonly to ensure immutability
 */

export interface Vec3 {
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

/**
 * Triangle as three 1-based vertex indices (OBJ convention)
 */
export type Face = readonly [number, number, number];

export interface Mesh {
  readonly vertices: readonly Vec3[];
  readonly faces: readonly Face[];
}

/**
 * Pure functions for creating immutable structures
 */
export const createVec3 = (x: number, y: number, z: number): Vec3 =>
  Object.freeze({
    x,
    y,
    z,
  });

export const createFace = (a: number, b: number, c: number): Face =>
  Object.freeze([a, b, c] as const);

export const createMesh = (
  vertices: readonly Vec3[],
  faces: readonly Face[]
): Mesh => ({
  vertices: Object.freeze([...vertices]),
  faces: Object.freeze([...faces]),
});
