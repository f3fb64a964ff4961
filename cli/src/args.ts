import path from 'path';
import type { ParameterOverrides, PrimitiveName } from '../../shared/primitives';
import type { Result } from '../../shared/utils/result';
import { Ok, Err } from '../../shared/utils/result';
import type { MeshError } from '../../shared/validators/validators';
import { parameterError } from '../../shared/validators/validators';

export type CliOptions = {
  readonly outDir: string;
  readonly skipPlane: boolean;
  readonly overrides: Readonly<Record<PrimitiveName, ParameterOverrides>>;
};

/**
 * Numeric flags and the primitive parameter each one sets
 */
export const PARAMETER_FLAGS: Readonly<Record<string, readonly [PrimitiveName, string]>> = {
  'sphere-slices': ['sphere', 'slices'],
  'sphere-stacks': ['sphere', 'stacks'],
  'sphere-radius': ['sphere', 'radius'],
  'torus-major': ['torus', 'majorRadius'],
  'torus-minor': ['torus', 'minorRadius'],
  'torus-seg-major': ['torus', 'segmentsMajor'],
  'torus-seg-minor': ['torus', 'segmentsMinor'],
  'saddle-size': ['saddle', 'size'],
  'saddle-divisions': ['saddle', 'divisions'],
  'saddle-height': ['saddle', 'height'],
  'plane-size': ['plane', 'size'],
  'plane-divisions': ['plane', 'divisions'],
};

export const usage = (): string =>
  [
    'Usage: objprims --out <dir> [options]',
    '',
    'Options:',
    ...Object.keys(PARAMETER_FLAGS).map((flag) => `  --${flag} <number>`),
    '  --skip-plane',
  ].join('\n');

/**
 * Parse `--flag value` and `--flag=value` tokens (argv without node and script)
 */
export const parseArgs = (argv: readonly string[]): Result<CliOptions, MeshError> => {
  let outDir: string | undefined;
  let skipPlane = false;
  const overrides: Record<PrimitiveName, Record<string, number>> = {
    sphere: {},
    torus: {},
    plane: {},
    saddle: {},
  };

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];
    if (!token.startsWith('--')) {
      return Err(parameterError(token, 'is not an option'));
    }

    // Only the first `=` separates key and value; paths may contain more
    const body = token.slice(2);
    const eq = body.indexOf('=');
    const key = eq === -1 ? body : body.slice(0, eq);
    const inline = eq === -1 ? undefined : body.slice(eq + 1);

    if (key === 'skip-plane') {
      if (inline !== undefined) {
        return Err(parameterError('--skip-plane', 'does not take a value'));
      }
      skipPlane = true;
      continue;
    }

    const val = inline ?? argv[i + 1];
    if (inline === undefined) i++;
    if (val === undefined) {
      return Err(parameterError(`--${key}`, 'requires a value'));
    }

    if (key === 'out') {
      outDir = path.resolve(val);
      continue;
    }

    const target = Object.prototype.hasOwnProperty.call(PARAMETER_FLAGS, key)
      ? PARAMETER_FLAGS[key]
      : undefined;
    if (target === undefined) {
      return Err(parameterError(`--${key}`, 'is not a known option'));
    }

    const value = Number(val);
    if (val.trim() === '' || !Number.isFinite(value)) {
      return Err(parameterError(`--${key}`, `must be a number, got ${val}`));
    }
    const [primitive, param] = target;
    overrides[primitive][param] = value;
  }

  if (outDir === undefined) {
    return Err(parameterError('--out', 'is required'));
  }

  return Ok({ outDir, skipPlane, overrides });
};
