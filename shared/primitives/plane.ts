import type { Mesh } from '../types/mesh';
import { createMesh } from '../types/mesh';
import type { Result } from '../utils/result';
import { all, map } from '../utils/result';
import type { MeshError } from '../validators/validators';
import { validateMinInteger, validatePositive } from '../validators/validators';
import { gridFaces, squareGridVertices } from './grid';

export type PlaneParams = {
  readonly size: number;
  readonly divisions: number;
};

/**
 * Triangulated square grid in the XY plane (z = 0)
 */
export const planeGrid = ({ size, divisions }: PlaneParams): Result<Mesh, MeshError> =>
  map(
    all([validatePositive('size')(size), validateMinInteger('divisions', 1)(divisions)]),
    () => {
      const vertices = squareGridVertices(size, divisions, () => 0.0);
      const faces = gridFaces(divisions + 1, divisions + 1);
      return createMesh(vertices, faces);
    }
  );
