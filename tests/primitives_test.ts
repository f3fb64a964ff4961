import { describe, it, expect } from 'vitest';
import type { Mesh } from '../shared/types/mesh';
import {
  PRIMITIVES,
  gridFaces,
  gridIndex,
  isPrimitiveName,
  planeGrid,
  ringIndex,
  saddleGrid,
  sphereUV,
  torus,
} from '../shared/primitives';
import { unwrap } from '../shared/utils/result';

const referencedSet = (mesh: Mesh): Set<number> => new Set(mesh.faces.flat());

const expectIndicesInRange = (mesh: Mesh) => {
  for (const face of mesh.faces) {
    for (const index of face) {
      expect(Number.isInteger(index)).toBe(true);
      expect(index).toBeGreaterThanOrEqual(1);
      expect(index).toBeLessThanOrEqual(mesh.vertices.length);
    }
  }
};

describe('gridIndex / gridFaces', () => {
  it('maps row and column to a 1-based row-major index', () => {
    expect(gridIndex(0, 0, 4)).toBe(1);
    expect(gridIndex(0, 3, 4)).toBe(4);
    expect(gridIndex(2, 1, 4)).toBe(10);
  });

  it('splits each cell into (a, b, d) and (b, c, d)', () => {
    expect(gridFaces(2, 2)).toEqual([
      [1, 3, 2],
      [3, 4, 2],
    ]);
    expect(gridFaces(3, 4)).toHaveLength(2 * 2 * 3);
  });
});

describe('sphereUV', () => {
  it('builds 6 vertices and 8 faces for radius 2, 4 slices, 2 stacks', () => {
    const mesh = unwrap(sphereUV({ radius: 2.0, slices: 4, stacks: 2 }));

    expect(mesh.vertices).toHaveLength(6);
    expect(mesh.faces).toEqual([
      [1, 2, 3],
      [1, 3, 4],
      [1, 4, 5],
      [1, 5, 2],
      [2, 6, 3],
      [3, 6, 4],
      [4, 6, 5],
      [5, 6, 2],
    ]);
    expect(referencedSet(mesh).size).toBe(6);
  });

  it('places single poles and rings on the sphere', () => {
    const mesh = unwrap(sphereUV({ radius: 2.0, slices: 4, stacks: 2 }));

    expect(mesh.vertices[0]).toEqual({ x: 0, y: 0, z: 2 });
    expect(mesh.vertices[5]).toEqual({ x: 0, y: 0, z: -2 });
    expect(mesh.vertices[1].x).toBeCloseTo(2, 12);
    expect(mesh.vertices[2].y).toBeCloseTo(2, 12);
    expect(mesh.vertices[3].x).toBeCloseTo(-2, 12);
    expect(mesh.vertices[4].y).toBeCloseTo(-2, 12);
    for (const v of mesh.vertices) {
      expect(Math.hypot(v.x, v.y, v.z)).toBeCloseTo(2, 12);
    }
  });

  it.each([
    [3, 2],
    [5, 4],
    [64, 32],
    [12, 6],
  ])('matches the vertex and face count formulas for %i slices, %i stacks', (slices, stacks) => {
    const mesh = unwrap(sphereUV({ radius: 1, slices, stacks }));

    expect(mesh.vertices).toHaveLength(2 + (stacks - 1) * slices);
    expect(mesh.faces).toHaveLength(2 * slices + 2 * slices * (stacks - 2));
    expectIndicesInRange(mesh);
    expect(referencedSet(mesh).size).toBe(mesh.vertices.length);
  });

  it('produces a closed, consistently wound surface', () => {
    const mesh = unwrap(sphereUV({ radius: 1, slices: 5, stacks: 4 }));
    const directed = new Set<string>();

    for (const [a, b, c] of mesh.faces) {
      for (const [from, to] of [[a, b], [b, c], [c, a]]) {
        const key = `${from}>${to}`;
        expect(directed.has(key)).toBe(false);
        directed.add(key);
      }
    }
    for (const key of directed) {
      const [from, to] = key.split('>');
      expect(directed.has(`${to}>${from}`)).toBe(true);
    }
  });

  it('wraps ring indices around the seam', () => {
    expect(ringIndex(0, 0, 4)).toBe(2);
    expect(ringIndex(0, 4, 4)).toBe(2);
    expect(ringIndex(1, 3, 4)).toBe(9);
  });

  it('rejects fewer than 3 slices', () => {
    const result = sphereUV({ radius: 1, slices: 2, stacks: 4 });

    expect(result).toEqual({
      ok: false,
      error: {
        message: 'slices must be >= 3, got 2',
        code: 'PARAMETER_VALIDATION',
        path: 'slices',
      },
    });
  });

  it('rejects fewer than 2 stacks, fractional counts and a non-positive radius', () => {
    const stacks = sphereUV({ radius: 1, slices: 8, stacks: 1 });
    const fractional = sphereUV({ radius: 1, slices: 8.5, stacks: 4 });
    const radius = sphereUV({ radius: 0, slices: 8, stacks: 4 });

    expect(!stacks.ok && stacks.error.path).toBe('stacks');
    expect(!fractional.ok && fractional.error.message).toBe('slices must be an integer, got 8.5');
    expect(!radius.ok && radius.error.message).toBe('radius must be > 0, got 0');
  });
});

describe('torus', () => {
  const params = { majorRadius: 1.4, minorRadius: 0.45, segmentsMajor: 6, segmentsMinor: 4 };

  it('builds a closed (segments + 1)^2 grid without merging the seam', () => {
    const mesh = unwrap(torus(params));

    expect(mesh.vertices).toHaveLength(7 * 5);
    expect(mesh.faces).toHaveLength(2 * 6 * 4);
    expectIndicesInRange(mesh);
    expect(referencedSet(mesh).size).toBe(35);

    const first = mesh.vertices[gridIndex(0, 0, 5) - 1];
    const lastRow = mesh.vertices[gridIndex(6, 0, 5) - 1];
    const lastCol = mesh.vertices[gridIndex(0, 4, 5) - 1];
    expect(first).toEqual({ x: 1.4 + 0.45, y: 0, z: 0 });
    expect(lastRow.x).toBeCloseTo(first.x, 12);
    expect(lastRow.y).toBeCloseTo(first.y, 12);
    expect(lastCol.x).toBeCloseTo(first.x, 12);
    expect(lastCol.z).toBeCloseTo(first.z, 12);
  });

  it('keeps every vertex at minor radius distance from the core circle', () => {
    const mesh = unwrap(torus(params));
    for (const v of mesh.vertices) {
      const fromAxis = Math.hypot(v.x, v.y) - 1.4;
      expect(Math.hypot(fromAxis, v.z)).toBeCloseTo(0.45, 12);
    }
  });

  it('rejects zero segments and a negative radius', () => {
    const segments = torus({ ...params, segmentsMinor: 0 });
    const radius = torus({ ...params, minorRadius: -1 });

    expect(!segments.ok && segments.error.path).toBe('segmentsMinor');
    expect(!radius.ok && radius.error.path).toBe('minorRadius');
  });
});

describe('planeGrid', () => {
  it('lays out rows along y and columns along x over [-size, size]', () => {
    const mesh = unwrap(planeGrid({ size: 1, divisions: 2 }));

    expect(mesh.vertices).toHaveLength(9);
    expect(mesh.vertices[0]).toEqual({ x: -1, y: -1, z: 0 });
    expect(mesh.vertices[1]).toEqual({ x: 0, y: -1, z: 0 });
    expect(mesh.vertices[3]).toEqual({ x: -1, y: 0, z: 0 });
    expect(mesh.vertices[8]).toEqual({ x: 1, y: 1, z: 0 });
    expect(mesh.faces.slice(0, 2)).toEqual([
      [1, 4, 2],
      [4, 5, 2],
    ]);
  });

  it('keeps z exactly 0 and matches the grid count formulas', () => {
    const mesh = unwrap(planeGrid({ size: 1.4, divisions: 64 }));

    expect(mesh.vertices).toHaveLength(65 * 65);
    expect(mesh.faces).toHaveLength(2 * 64 * 64);
    expect(mesh.vertices.every((v) => v.z === 0.0)).toBe(true);
    expectIndicesInRange(mesh);
  });

  it('rejects zero divisions', () => {
    const result = planeGrid({ size: 1, divisions: 0 });

    expect(result.ok).toBe(false);
    expect(!result.ok && result.error).toEqual({
      message: 'divisions must be >= 1, got 0',
      code: 'PARAMETER_VALIDATION',
      path: 'divisions',
    });
  });
});

describe('saddleGrid', () => {
  it('follows z = height * (x^2 - y^2)', () => {
    const mesh = unwrap(saddleGrid({ size: 1.2, divisions: 60, height: 0.6 }));

    expect(mesh.vertices).toHaveLength(61 * 61);
    expect(mesh.faces).toHaveLength(2 * 60 * 60);
    for (const { x, y, z } of mesh.vertices) {
      expect(Math.abs(z - 0.6 * (x * x - y * y))).toBeLessThan(1e-9);
    }
  });

  it('defaults height to 1', () => {
    const mesh = unwrap(saddleGrid({ size: 1, divisions: 1 }));

    expect(mesh.vertices).toEqual([
      { x: -1, y: -1, z: 0 },
      { x: 1, y: -1, z: 0 },
      { x: -1, y: 1, z: 0 },
      { x: 1, y: 1, z: 0 },
    ]);
    expect(mesh.faces).toEqual([
      [1, 3, 2],
      [3, 4, 2],
    ]);
  });

  it('rejects a non-finite height', () => {
    const result = saddleGrid({ size: 1, divisions: 4, height: Number.NaN });

    expect(!result.ok && result.error.message).toBe('height must be a finite number, got NaN');
  });
});

describe('PRIMITIVES registry', () => {
  it('recognises the four primitive names', () => {
    expect(['sphere', 'torus', 'plane', 'saddle'].every(isPrimitiveName)).toBe(true);
    expect(isPrimitiveName('cube')).toBe(false);
    expect(isPrimitiveName('toString')).toBe(false);
  });

  it('builds with defaults and lists parameters in header order', () => {
    const generated = unwrap(PRIMITIVES.saddle.build());

    expect(generated.parameterLines).toEqual(['size=1.2', 'divisions=60', 'height=0.6']);
    expect(generated.mesh.vertices).toHaveLength(61 * 61);
  });

  it('applies overrides on top of the defaults', () => {
    const generated = unwrap(PRIMITIVES.sphere.build({ slices: 4, stacks: 2, radius: 2 }));

    expect(generated.parameterLines).toEqual(['slices=4', 'stacks=2', 'radius=2']);
    expect(generated.mesh.vertices).toHaveLength(6);
  });

  it('labels torus parameters with snake_case header names', () => {
    const generated = unwrap(PRIMITIVES.torus.build({ segmentsMajor: 3, segmentsMinor: 3 }));

    expect(generated.parameterLines).toEqual([
      'major_radius=1.4',
      'minor_radius=0.45',
      'segments_major=3',
      'segments_minor=3',
    ]);
  });

  it.each([
    ['sphere', { slices: 5, stacks: 4 }],
    ['torus', { segmentsMajor: 6, segmentsMinor: 4 }],
    ['plane', { divisions: 3 }],
    ['saddle', { divisions: 7 }],
  ] as const)('predicts the %s vertex count before building', (name, overrides) => {
    const primitive = PRIMITIVES[name];

    expect(primitive.vertexCount(overrides)).toBe(
      unwrap(primitive.build(overrides)).mesh.vertices.length
    );
  });

  it('counts vertices from the defaults when nothing is overridden', () => {
    expect(PRIMITIVES.sphere.vertexCount()).toBe(2 + 31 * 64);
    expect(PRIMITIVES.torus.vertexCount({ segmentsMinor: 1 })).toBe(81 * 2);
  });

  it('rejects parameters the primitive does not take', () => {
    const result = PRIMITIVES.plane.build({ height: 2 });

    expect(!result.ok && result.error).toEqual({
      message: 'height is not a parameter of plane',
      code: 'PARAMETER_VALIDATION',
      path: 'height',
    });
  });
});
