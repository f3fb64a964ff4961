import type { Face, Mesh, Vec3 } from '../types/mesh';
import { createFace, createMesh, createVec3 } from '../types/mesh';
import type { Result } from '../utils/result';
import { all, map } from '../utils/result';
import type { MeshError } from '../validators/validators';
import { validateMinInteger, validatePositive } from '../validators/validators';

export type SphereParams = {
  readonly radius: number;
  readonly slices: number;
  readonly stacks: number;
};

/**
 * 1-based index of vertex `j` on latitude ring `ring` (0..stacks-2).
 * Vertex 1 is the top pole, so rings start at 2; `j` wraps around the ring.
 */
export const ringIndex = (ring: number, j: number, slices: number): number =>
  2 + ring * slices + (j % slices);

/**
 * UV sphere with a single vertex per pole and no seam duplicates.
 *
 * Layout: top pole, `stacks - 1` rings of `slices` vertices, bottom pole.
 * Faces: a fan at each pole plus two triangles per quad between rings.
 */
export const sphereUV = ({ radius, slices, stacks }: SphereParams): Result<Mesh, MeshError> =>
  map(
    all([
      validateMinInteger('slices', 3)(slices),
      validateMinInteger('stacks', 2)(stacks),
      validatePositive('radius')(radius),
    ]),
    () => {
      const vertices: Vec3[] = [createVec3(0.0, 0.0, radius)];

      for (let i = 1; i < stacks; i++) {
        const phi = (i / stacks) * Math.PI;
        const sinPhi = Math.sin(phi);
        const cosPhi = Math.cos(phi);
        for (let j = 0; j < slices; j++) {
          const theta = (j / slices) * 2.0 * Math.PI;
          vertices.push(
            createVec3(
              radius * sinPhi * Math.cos(theta),
              radius * sinPhi * Math.sin(theta),
              radius * cosPhi
            )
          );
        }
      }

      vertices.push(createVec3(0.0, 0.0, -radius));

      const top = 1;
      const bottom = vertices.length;
      const ringCount = stacks - 1;
      const lastRing = ringCount - 1;
      const faces: Face[] = [];

      for (let j = 0; j < slices; j++) {
        faces.push(createFace(top, ringIndex(0, j, slices), ringIndex(0, j + 1, slices)));
      }

      for (let ring = 0; ring < lastRing; ring++) {
        for (let j = 0; j < slices; j++) {
          const a = ringIndex(ring, j, slices);
          const b = ringIndex(ring + 1, j, slices);
          const c = ringIndex(ring + 1, j + 1, slices);
          const d = ringIndex(ring, j + 1, slices);
          faces.push(createFace(a, b, d));
          faces.push(createFace(b, c, d));
        }
      }

      for (let j = 0; j < slices; j++) {
        faces.push(
          createFace(ringIndex(lastRing, j, slices), bottom, ringIndex(lastRing, j + 1, slices))
        );
      }

      return createMesh(vertices, faces);
    }
  );
