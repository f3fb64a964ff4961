/**
 * Writes every primitive into one output directory
 */

import { mkdirSync } from 'fs';
import path from 'path';
import type { ParameterOverrides, PrimitiveName } from '../../shared/primitives';
import { PRIMITIVES } from '../../shared/primitives';
import type { Result } from '../../shared/utils/result';
import { Ok, Err, andThen } from '../../shared/utils/result';
import type { MeshError } from '../../shared/validators/validators';
import type { WriteSummary } from '../../shared/writers/obj';
import { writeOBJ } from '../../shared/writers/obj';
import type { CliOptions } from './args';

export type OutputPlan = {
  readonly fileName: string;
  readonly primitive: PrimitiveName;
  readonly overrides: ParameterOverrides;
  readonly title?: string;
};

/**
 * Files written for the given options, in write order.
 *
 * `sphere_low.obj` is a coarse sphere (12 slices, 6 stacks) at the same
 * radius, where mesh-edge paths and great circles visibly disagree.
 */
export const planOutputs = (options: CliOptions): OutputPlan[] => {
  const { overrides } = options;
  const plans: OutputPlan[] = [
    { fileName: 'sphere.obj', primitive: 'sphere', overrides: overrides.sphere },
    {
      fileName: 'sphere_low.obj',
      primitive: 'sphere',
      overrides: { ...overrides.sphere, slices: 12, stacks: 6 },
      title: 'Generated sphere (UV) - low resolution',
    },
    { fileName: 'plane.obj', primitive: 'plane', overrides: overrides.plane },
    { fileName: 'donut.obj', primitive: 'torus', overrides: overrides.torus },
    { fileName: 'saddle.obj', primitive: 'saddle', overrides: overrides.saddle },
  ];
  return options.skipPlane ? plans.filter((plan) => plan.primitive !== 'plane') : plans;
};

const ensureDirectory = (dir: string): Result<string, MeshError> => {
  try {
    mkdirSync(dir, { recursive: true });
    return Ok(dir);
  } catch (err) {
    return Err({
      message: `Cannot create ${dir}: ${err instanceof Error ? err.message : String(err)}`,
      code: 'IO_ERROR',
      path: dir,
    });
  }
};

export const writePlan = (outDir: string, plan: OutputPlan): Result<WriteSummary, MeshError> => {
  const primitive = PRIMITIVES[plan.primitive];
  return andThen(primitive.build(plan.overrides), ({ mesh, parameterLines }) =>
    writeOBJ(path.join(outDir, plan.fileName), mesh.vertices, mesh.faces, [
      plan.title ?? primitive.title,
      ...parameterLines,
    ])
  );
};

/**
 * Generate and write sequentially; stops at the first failure
 */
export const generateAll = (
  options: CliOptions,
  onWritten: (summary: WriteSummary) => void = () => {}
): Result<WriteSummary[], MeshError> =>
  andThen(ensureDirectory(options.outDir), (outDir) => {
    const written: WriteSummary[] = [];
    for (const plan of planOutputs(options)) {
      const result = writePlan(outDir, plan);
      if (!result.ok) {
        return result;
      }
      onWritten(result.value);
      written.push(result.value);
    }
    return Ok(written);
  });
