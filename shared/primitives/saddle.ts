import type { Mesh } from '../types/mesh';
import { createMesh } from '../types/mesh';
import type { Result } from '../utils/result';
import { all, map } from '../utils/result';
import type { MeshError } from '../validators/validators';
import { validateFinite, validateMinInteger, validatePositive } from '../validators/validators';
import { gridFaces, squareGridVertices } from './grid';

export type SaddleParams = {
  readonly size: number;
  readonly divisions: number;
  readonly height?: number;
};

/**
 * Hyperbolic paraboloid z = height * (x^2 - y^2) on the plane grid topology
 */
export const saddleGrid = ({
  size,
  divisions,
  height = 1.0,
}: SaddleParams): Result<Mesh, MeshError> =>
  map(
    all([
      validatePositive('size')(size),
      validateMinInteger('divisions', 1)(divisions),
      validateFinite('height')(height),
    ]),
    () => {
      const vertices = squareGridVertices(size, divisions, (x, y) => height * (x * x - y * y));
      const faces = gridFaces(divisions + 1, divisions + 1);
      return createMesh(vertices, faces);
    }
  );
