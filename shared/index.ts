/**
 * Public entry point: generators, compaction and OBJ I/O
 */

export * from './types/mesh';
export * from './primitives';
export { compactMesh, findUnreferencedVertices } from './transforms/compact';
export { toOBJ, formatCoordinate, type OBJOptions } from './converters/obj';
export { parseOBJ } from './parsers/obj';
export { writeOBJ, type WriteOptions, type WriteSummary } from './writers/obj';
export type { MeshError, MeshErrorCode } from './validators/validators';
export type { Result } from './utils/result';
