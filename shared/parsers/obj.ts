/**
 * Pure OBJ reader using functional programming with proper composition
 * Returns Result<Mesh, MeshError> for monadic error handling
 *
 * Only `v` and triangular `f` records are read; comments, blank lines and
 * every other record type are skipped.
 */

import type { Face, Mesh, Vec3 } from '../types/mesh';
import { createFace, createMesh, createVec3 } from '../types/mesh';
import type { Result } from '../utils/result';
import { Ok, Err, map, mapErr, andThen, all, traverse } from '../utils/result';
import type { MeshError } from '../validators/validators';
import { validateFaceIndices } from '../validators/validators';

type ParsedLine = {
  readonly type: string;
  readonly data: readonly string[];
  readonly lineNum: number;
};

type OBJRecord =
  | { readonly kind: 'vertex'; readonly vertex: Vec3 }
  | { readonly kind: 'face'; readonly face: Face }
  | { readonly kind: 'skip' };

const parseError = (message: string, lineNum: number): MeshError => ({
  message: `Line ${lineNum}: ${message}`,
  code: 'PARSE_ERROR',
  path: `line ${lineNum}`,
});

/**
 * Parse a line from OBJ file
 */
const parseLine = (line: string, lineNum: number): ParsedLine | null => {
  const trimmed = line.trim();

  // Skip empty lines and comments
  if (trimmed === '' || trimmed.startsWith('#')) {
    return null;
  }

  const parts = trimmed.split(/\s+/);
  return { type: parts[0], data: parts.slice(1), lineNum };
};

/**
 * Parse a vertex position (v x y z [w])
 */
const parseVertexPosition = (parts: readonly string[]): Result<Vec3, string> => {
  if (parts.length < 3) {
    return Err('Vertex position requires at least 3 components');
  }

  const [x, y, z] = parts.slice(0, 3).map(Number);

  if (!Number.isFinite(x) || !Number.isFinite(y) || !Number.isFinite(z)) {
    return Err('Invalid vertex position values');
  }

  return Ok(createVec3(x, y, z));
};

/**
 * Parse the position part of a face reference (v, v/vt, v/vt/vn or v//vn)
 */
const parseFaceIndex = (ref: string): Result<number, string> => {
  const position = ref.split('/')[0];

  if (!/^\d+$/.test(position)) {
    return Err(`Invalid face index: ${ref}`);
  }

  return Ok(parseInt(position, 10));
};

/**
 * Parse a triangle (f a b c)
 */
const parseFace = (parts: readonly string[]): Result<Face, string> => {
  if (parts.length !== 3) {
    return Err(`Face must have exactly 3 vertices, got ${parts.length}`);
  }

  return map(all(parts.map(parseFaceIndex)), ([a, b, c]) => createFace(a, b, c));
};

const processLine = (line: ParsedLine): Result<OBJRecord, MeshError> => {
  const { type, data: parts, lineNum } = line;

  switch (type) {
    case 'v':
      return map(
        mapErr(parseVertexPosition(parts), msg => parseError(msg, lineNum)),
        (vertex): OBJRecord => ({ kind: 'vertex', vertex })
      );

    case 'f':
      return map(
        mapErr(parseFace(parts), msg => parseError(msg, lineNum)),
        (face): OBJRecord => ({ kind: 'face', face })
      );

    default:
      // Ignore unsupported commands
      return Ok({ kind: 'skip' });
  }
};

const buildMesh = (records: readonly OBJRecord[]): Mesh => {
  const vertices: Vec3[] = [];
  const faces: Face[] = [];
  for (const record of records) {
    if (record.kind === 'vertex') vertices.push(record.vertex);
    if (record.kind === 'face') faces.push(record.face);
  }
  return createMesh(vertices, faces);
};

/**
 * Main OBJ reader
 */
export const parseOBJ = (content: string): Result<Mesh, MeshError> => {
  const parsedLines = content
    .split(/\r?\n/)
    .flatMap((line, i) => {
      const parsed = parseLine(line, i + 1);
      return parsed !== null ? [parsed] : [];
    });

  return andThen(
    map(traverse(processLine)(parsedLines), buildMesh),
    mesh => map(validateFaceIndices(mesh.faces, mesh.vertices.length), () => mesh)
  );
};
