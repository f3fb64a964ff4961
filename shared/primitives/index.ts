/**
 * Primitive registry shared by the CLI and the HTTP API
 */

import type { Mesh } from '../types/mesh';
import type { Result } from '../utils/result';
import { Err, map } from '../utils/result';
import type { MeshError } from '../validators/validators';
import { parameterError } from '../validators/validators';
import { PLANE_DEFAULTS, SADDLE_DEFAULTS, SPHERE_DEFAULTS, TORUS_DEFAULTS } from './defaults';
import { planeGrid } from './plane';
import type { SaddleParams } from './saddle';
import { saddleGrid } from './saddle';
import { sphereUV } from './sphere';
import { torus } from './torus';

export { gridFaces, gridIndex } from './grid';
export { planeGrid, type PlaneParams } from './plane';
export { saddleGrid, type SaddleParams } from './saddle';
export { ringIndex, sphereUV, type SphereParams } from './sphere';
export { torus, type TorusParams } from './torus';
export * from './defaults';

export type PrimitiveName = 'sphere' | 'torus' | 'plane' | 'saddle';

export type ParameterOverrides = Readonly<Record<string, number>>;

export interface GeneratedPrimitive {
  readonly mesh: Mesh;
  /** `name=value` lines in default-key order, for the OBJ header */
  readonly parameterLines: readonly string[];
}

export interface Primitive {
  readonly name: PrimitiveName;
  readonly title: string;
  readonly defaults: ParameterOverrides;
  /** Vertex count `build` would produce; unknown keys are ignored */
  readonly vertexCount: (overrides?: ParameterOverrides) => number;
  readonly build: (overrides?: ParameterOverrides) => Result<GeneratedPrimitive, MeshError>;
}

type PrimitiveDefinition<P extends ParameterOverrides> = {
  readonly name: PrimitiveName;
  readonly title: string;
  readonly defaults: P;
  readonly generate: (params: P) => Result<Mesh, MeshError>;
  readonly countVertices: (params: P) => number;
  /** Header label per parameter where it differs from the key */
  readonly labels?: Readonly<Record<string, string>>;
};

const definePrimitive = <P extends ParameterOverrides>({
  name,
  title,
  defaults,
  generate,
  countVertices,
  labels = {},
}: PrimitiveDefinition<P>): Primitive => {
  const keys = Object.keys(defaults);
  const label = (key: string): string => labels[key] ?? key;

  return {
    name,
    title,
    defaults,
    vertexCount: (overrides = {}) => {
      const params: P = { ...defaults, ...overrides };
      return countVertices(params);
    },
    build: (overrides = {}) => {
      const unknown = Object.keys(overrides).find((key) => !keys.includes(key));
      if (unknown !== undefined) {
        return Err(parameterError(unknown, `is not a parameter of ${name}`));
      }

      const params: P = { ...defaults, ...overrides };
      return map(generate(params), (mesh) => ({
        mesh,
        parameterLines: keys.map((key) => `${label(key)}=${params[key]}`),
      }));
    },
  };
};

export const PRIMITIVES: Readonly<Record<PrimitiveName, Primitive>> = {
  sphere: definePrimitive({
    name: 'sphere',
    title: 'Generated sphere (UV)',
    defaults: SPHERE_DEFAULTS,
    generate: sphereUV,
    countVertices: ({ slices, stacks }) => 2 + (stacks - 1) * slices,
  }),
  torus: definePrimitive({
    name: 'torus',
    title: 'Generated torus',
    defaults: TORUS_DEFAULTS,
    generate: torus,
    countVertices: ({ segmentsMajor, segmentsMinor }) => (segmentsMajor + 1) * (segmentsMinor + 1),
    labels: {
      majorRadius: 'major_radius',
      minorRadius: 'minor_radius',
      segmentsMajor: 'segments_major',
      segmentsMinor: 'segments_minor',
    },
  }),
  plane: definePrimitive({
    name: 'plane',
    title: 'Generated plane grid (Z=0)',
    defaults: PLANE_DEFAULTS,
    generate: planeGrid,
    countVertices: ({ divisions }) => (divisions + 1) ** 2,
  }),
  saddle: definePrimitive<Required<SaddleParams>>({
    name: 'saddle',
    title: 'Generated saddle z = h*(x^2 - y^2)',
    defaults: SADDLE_DEFAULTS,
    generate: saddleGrid,
    countVertices: ({ divisions }) => (divisions + 1) ** 2,
  }),
};

export const isPrimitiveName = (name: string): name is PrimitiveName =>
  Object.prototype.hasOwnProperty.call(PRIMITIVES, name);
