/**
 * Mesh compaction: drop vertices no face references and renumber the rest.
 */

import type { Face, Mesh, Vec3 } from '../types/mesh';
import { createFace, createMesh } from '../types/mesh';
import type { Result } from '../utils/result';
import { andThen, Ok } from '../utils/result';
import type { MeshError } from '../validators/validators';
import { validateFaceIndices } from '../validators/validators';

const referencedIndices = (faces: readonly Face[]): Set<number> => {
  const used = new Set<number>();
  for (const face of faces) {
    for (const index of face) {
      used.add(index);
    }
  }
  return used;
};

/**
 * 1-based indices of vertices that no face references, in ascending order.
 * With no faces every vertex is unreferenced.
 */
export const findUnreferencedVertices = (mesh: Mesh): number[] => {
  const used = referencedIndices(mesh.faces);
  const unreferenced: number[] = [];
  for (let index = 1; index <= mesh.vertices.length; index++) {
    if (!used.has(index)) {
      unreferenced.push(index);
    }
  }
  return unreferenced;
};

/**
 * Validate face indices, then remove unreferenced vertices and remap faces
 * to the contiguous vertex list. Relative vertex order is preserved.
 *
 * A mesh without faces is returned unchanged.
 */
export const compactMesh = (mesh: Mesh): Result<Mesh, MeshError> =>
  andThen(validateFaceIndices(mesh.faces, mesh.vertices.length), (faces) => {
    if (faces.length === 0) {
      return Ok(mesh);
    }

    const used = referencedIndices(faces);
    // remap[old] = new, both 1-based; 0 marks a dropped vertex
    const remap: number[] = new Array<number>(mesh.vertices.length + 1).fill(0);
    const vertices: Vec3[] = [];

    mesh.vertices.forEach((vertex, i) => {
      if (used.has(i + 1)) {
        vertices.push(vertex);
        remap[i + 1] = vertices.length;
      }
    });

    const remapped = faces.map(([a, b, c]) => createFace(remap[a], remap[b], remap[c]));

    return Ok(createMesh(vertices, remapped));
  });
