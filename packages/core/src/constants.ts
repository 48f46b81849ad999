// ---------------------------------------------------------------------------
// Tunables shared by the transforms. Exported so tests can pin them.
// ---------------------------------------------------------------------------

import type { RangeFilter, RotationAngles } from './types.js';

/** Values strictly above this binarize to white. */
export const DITHER_THRESHOLD = 127;

/** Floyd-Steinberg error shares for the four forward neighbours. */
export const FLOYD_STEINBERG_WEIGHTS = {
  right: 7 / 16,
  belowLeft: 3 / 16,
  below: 5 / 16,
  belowRight: 1 / 16,
} as const;

/** Orientation angles (radians) below which leveling is the identity. */
export const LEVEL_EPSILON = 0.001;

/** The unfiltered range. */
export const FULL_RANGE: Readonly<RangeFilter> = Object.freeze({ min: 0, max: 1 });

/** No rotation. */
export const NO_ROTATION: Readonly<RotationAngles> = Object.freeze({ x: 0, y: 0, z: 0 });

/** Decimal places written for each coordinate. */
export const COORDINATE_PRECISION = 6;
