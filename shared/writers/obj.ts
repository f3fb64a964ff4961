/**
 * OBJ file writer. The only module that touches the filesystem.
 */

import { writeFileSync } from 'fs';
import type { Face, Mesh, Vec3 } from '../types/mesh';
import { createMesh } from '../types/mesh';
import type { Result } from '../utils/result';
import { andThen, Ok, Err } from '../utils/result';
import type { MeshError } from '../validators/validators';
import { compactMesh } from '../transforms/compact';
import { toOBJ } from '../converters/obj';

export type WriteOptions = {
  /** Drop unreferenced vertices before writing (default true) */
  readonly compact?: boolean;
};

export type WriteSummary = {
  readonly path: string;
  readonly vertexCount: number;
  readonly faceCount: number;
};

const writeText = (path: string, content: string): Result<void, MeshError> => {
  try {
    writeFileSync(path, content, 'utf-8');
    return Ok(undefined);
  } catch (err) {
    return Err({
      message: `Cannot write ${path}: ${err instanceof Error ? err.message : String(err)}`,
      code: 'IO_ERROR',
      path,
    });
  }
};

/**
 * Write vertices and faces as an OBJ file, replacing any existing file.
 *
 * The full text is built before the destination is opened, so a mesh that
 * fails compaction leaves nothing on disk.
 */
export const writeOBJ = (
  path: string,
  vertices: readonly Vec3[],
  faces: readonly Face[],
  header?: readonly string[],
  { compact = true }: WriteOptions = {}
): Result<WriteSummary, MeshError> => {
  const mesh = createMesh(vertices, faces);
  const prepared: Result<Mesh, MeshError> = compact ? compactMesh(mesh) : Ok(mesh);

  return andThen(prepared, (out) =>
    andThen(writeText(path, toOBJ(out, { header })), () =>
      Ok({
        path,
        vertexCount: out.vertices.length,
        faceCount: out.faces.length,
      })
    )
  );
};
