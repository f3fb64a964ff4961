/**
 * Convert a Mesh -> OBJ formatted string
 * Follows the project's functional patterns; pure, no I/O
 */

import type { Mesh, Vec3 } from '../types/mesh';

export type OBJOptions = {
  /** Comment lines written before any geometry, without the leading `# ` */
  readonly header?: readonly string[];
};

/**
 * Fixed six-decimal representation used for every coordinate
 */
export const formatCoordinate = (n: number): string => n.toFixed(6);

const vertexLine = (v: Vec3): string =>
  `v ${formatCoordinate(v.x)} ${formatCoordinate(v.y)} ${formatCoordinate(v.z)}`;

/**
 * Build an OBJ string from a Mesh
 */
export const toOBJ = (mesh: Mesh, options: OBJOptions = {}): string => {
  const lines: string[] = [
    ...(options.header ?? []).map((line) => `# ${line}`),
    ...mesh.vertices.map(vertexLine),
    ...mesh.faces.map(([a, b, c]) => `f ${a} ${b} ${c}`),
  ];

  return lines.length === 0 ? '' : lines.join('\n') + '\n';
};

export default toOBJ;
