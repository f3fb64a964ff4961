import type { Mesh, Vec3 } from '../types/mesh';
import { createMesh, createVec3 } from '../types/mesh';
import type { Result } from '../utils/result';
import { all, map } from '../utils/result';
import type { MeshError } from '../validators/validators';
import { validateMinInteger, validatePositive } from '../validators/validators';
import { gridFaces } from './grid';

export type TorusParams = {
  readonly majorRadius: number;
  readonly minorRadius: number;
  readonly segmentsMajor: number;
  readonly segmentsMinor: number;
};

/**
 * Torus around the z axis.
 *
 * The last row and column repeat the first ones instead of wrapping the
 * indices, so the seam carries duplicated positions.
 */
export const torus = ({
  majorRadius,
  minorRadius,
  segmentsMajor,
  segmentsMinor,
}: TorusParams): Result<Mesh, MeshError> =>
  map(
    all([
      validatePositive('majorRadius')(majorRadius),
      validatePositive('minorRadius')(minorRadius),
      validateMinInteger('segmentsMajor', 1)(segmentsMajor),
      validateMinInteger('segmentsMinor', 1)(segmentsMinor),
    ]),
    () => {
      const vertices: Vec3[] = [];

      for (let i = 0; i <= segmentsMajor; i++) {
        const theta = (i / segmentsMajor) * 2.0 * Math.PI;
        const cosT = Math.cos(theta);
        const sinT = Math.sin(theta);
        for (let j = 0; j <= segmentsMinor; j++) {
          const phi = (j / segmentsMinor) * 2.0 * Math.PI;
          const ring = majorRadius + minorRadius * Math.cos(phi);
          vertices.push(createVec3(ring * cosT, ring * sinT, minorRadius * Math.sin(phi)));
        }
      }

      const faces = gridFaces(segmentsMajor + 1, segmentsMinor + 1);
      return createMesh(vertices, faces);
    }
  );
