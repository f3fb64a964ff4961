/**
 * Route logic for the primitives API, kept free of express so it can be
 * exercised directly.
 */

import { PRIMITIVES, isPrimitiveName } from '../../shared/primitives';
import type { ParameterOverrides } from '../../shared/primitives';
import { toOBJ } from '../../shared/converters/obj';
import { compactMesh, findUnreferencedVertices } from '../../shared/transforms/compact';
import { parseOBJ } from '../../shared/parsers/obj';
import type { Result } from '../../shared/utils/result';
import { Ok, Err, andThen, map } from '../../shared/utils/result';
import type { MeshError } from '../../shared/validators/validators';
import { parameterError } from '../../shared/validators/validators';

export type HandlerResponse =
  | {
      readonly status: number;
      readonly kind: 'json';
      readonly body: unknown;
    }
  | {
      readonly status: number;
      readonly kind: 'text';
      readonly body: string;
      readonly headers?: Readonly<Record<string, string>>;
    };

/** Largest mesh one request may generate */
export const MAX_VERTICES_PER_REQUEST = 1_000_000;

const OBJ_HEADERS = { 'Content-Type': 'text/plain; charset=utf-8' };

const errorResponse = (status: number, error: MeshError): HandlerResponse => ({
  status,
  kind: 'json',
  body: { success: false, error },
});

export const handleHealth = (): HandlerResponse => ({
  status: 200,
  kind: 'json',
  body: { status: 'ok', message: 'Mesh primitives API is running' },
});

export const handleListPrimitives = (): HandlerResponse => ({
  status: 200,
  kind: 'json',
  body: {
    success: true,
    data: Object.values(PRIMITIVES).map(({ name, title, defaults }) => ({ name, title, defaults })),
  },
});

/**
 * Query values arrive as strings; anything that is not a plain number
 * (or a repeated key) is a parameter error.
 */
export const parseQueryParameters = (
  query: Readonly<Record<string, unknown>>
): Result<ParameterOverrides, MeshError> => {
  const overrides: Record<string, number> = {};
  for (const [key, raw] of Object.entries(query)) {
    if (typeof raw !== 'string' || raw.trim() === '') {
      return Err(parameterError(key, 'must be given once as a number'));
    }
    const value = Number(raw);
    if (!Number.isFinite(value)) {
      return Err(parameterError(key, `must be a finite number, got ${raw}`));
    }
    overrides[key] = value;
  }
  return Ok(overrides);
};

export const handleGetPrimitive = (
  name: string,
  query: Readonly<Record<string, unknown>>
): HandlerResponse => {
  if (!isPrimitiveName(name)) {
    return errorResponse(404, {
      message: `Unknown primitive: ${name}`,
      code: 'PARAMETER_VALIDATION',
      path: 'name',
    });
  }

  const primitive = PRIMITIVES[name];
  const withinLimit = (overrides: ParameterOverrides): Result<ParameterOverrides, MeshError> => {
    const count = primitive.vertexCount(overrides);
    return count > MAX_VERTICES_PER_REQUEST
      ? Err(parameterError('vertexCount', `of ${count} exceeds the limit of ${MAX_VERTICES_PER_REQUEST}`))
      : Ok(overrides);
  };

  const result = andThen(
    andThen(andThen(parseQueryParameters(query), withinLimit), (overrides) => primitive.build(overrides)),
    (generated) =>
      map(compactMesh(generated.mesh), (mesh) =>
        toOBJ(mesh, { header: [primitive.title, ...generated.parameterLines] })
      )
  );

  if (!result.ok) {
    return errorResponse(result.error.code === 'PARAMETER_VALIDATION' ? 400 : 500, result.error);
  }

  return { status: 200, kind: 'text', body: result.value, headers: OBJ_HEADERS };
};

/**
 * Compact an uploaded OBJ file; comments and non-geometry records are not kept
 */
export const handleCompact = (content: string | undefined): HandlerResponse => {
  if (content === undefined) {
    return { status: 400, kind: 'json', body: { error: 'No file uploaded' } };
  }

  const result = andThen(parseOBJ(content), (mesh) =>
    map(compactMesh(mesh), (compacted) => ({
      removed: mesh.faces.length === 0 ? 0 : findUnreferencedVertices(mesh).length,
      text: toOBJ(compacted),
    }))
  );

  if (!result.ok) {
    return errorResponse(400, result.error);
  }

  return {
    status: 200,
    kind: 'text',
    body: result.value.text,
    headers: { ...OBJ_HEADERS, 'X-Removed-Vertices': String(result.value.removed) },
  };
};
