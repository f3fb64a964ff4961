/**
 * Shared grid connectivity for torus, plane and saddle.
 *
 * Rows and columns are vertex counts, not cell counts: a grid of
 * `rows x cols` vertices has `(rows - 1) x (cols - 1)` cells.
 */

import type { Face, Vec3 } from '../types/mesh';
import { createFace, createVec3 } from '../types/mesh';

/**
 * 1-based index of the vertex at (row, col) in a row-major grid
 */
export const gridIndex = (row: number, col: number, cols: number): number =>
  row * cols + col + 1;

/**
 * Two triangles per cell: (a, b, d) and (b, c, d)
 */
export const gridFaces = (rows: number, cols: number): Face[] => {
  const faces: Face[] = [];
  for (let i = 0; i < rows - 1; i++) {
    for (let j = 0; j < cols - 1; j++) {
      const a = gridIndex(i, j, cols);
      const b = gridIndex(i + 1, j, cols);
      const c = gridIndex(i + 1, j + 1, cols);
      const d = gridIndex(i, j + 1, cols);
      faces.push(createFace(a, b, d));
      faces.push(createFace(b, c, d));
    }
  }
  return faces;
};

/**
 * Square grid over [-size, size] in x and y; rows advance along y
 */
export const squareGridVertices = (
  size: number,
  divisions: number,
  heightAt: (x: number, y: number) => number
): Vec3[] => {
  const vertices: Vec3[] = [];
  const step = (size * 2.0) / divisions;
  for (let i = 0; i <= divisions; i++) {
    const y = -size + i * step;
    for (let j = 0; j <= divisions; j++) {
      const x = -size + j * step;
      vertices.push(createVec3(x, y, heightAt(x, y)));
    }
  }
  return vertices;
};
