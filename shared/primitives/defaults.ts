import type { PlaneParams } from './plane';
import type { SaddleParams } from './saddle';
import type { SphereParams } from './sphere';
import type { TorusParams } from './torus';

// Key order is the order parameters appear in OBJ headers.

export const SPHERE_DEFAULTS: SphereParams = {
  slices: 64,
  stacks: 32,
  radius: 1.0,
};

export const TORUS_DEFAULTS: TorusParams = {
  majorRadius: 1.4,
  minorRadius: 0.45,
  segmentsMajor: 80,
  segmentsMinor: 36,
};

export const SADDLE_DEFAULTS: Required<SaddleParams> = {
  size: 1.2,
  divisions: 60,
  height: 0.6,
};

export const PLANE_DEFAULTS: PlaneParams = {
  size: 1.4,
  divisions: 64,
};
