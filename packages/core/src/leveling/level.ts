// ---------------------------------------------------------------------------
// Panorama leveling: undo camera pitch, roll and heading by resampling the
// equirectangular image along inverse-rotated view directions.
// ---------------------------------------------------------------------------

import { LEVEL_EPSILON } from '../constants.js';
import {
  assertRasterShape,
  assertSphericalShape,
  columnToAzimuth,
  rowToPolar,
  sphericalToDirection,
} from '../raster/index.js';
import type { Orientation, PixelArray, RasterImage, Vector3 } from '../types.js';

const TWO_PI = 2 * Math.PI;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** True when every angle is below {@link LEVEL_EPSILON}. */
export function isLevel(orientation: Orientation): boolean {
  return (
    Math.abs(orientation.pitch) < LEVEL_EPSILON &&
    Math.abs(orientation.roll) < LEVEL_EPSILON &&
    Math.abs(orientation.heading) < LEVEL_EPSILON
  );
}

/**
 * Bring a roll reading into [-π, π]. Capture metadata reports small
 * clockwise tilts as angles just under 2π.
 */
export function normalizeRoll(roll: number): number {
  return roll > Math.PI ? roll - TWO_PI : roll;
}

/**
 * Map a corrected (output) view direction to the direction it was captured
 * at in the tilted source.
 *
 * Heading is undone about Y, then pitch about Z, both with negated angles.
 * Roll about X uses the forward angle: the camera model stores roll with
 * the opposite handedness.
 */
export function sourceDirection(dir: Vector3, orientation: Orientation): Vector3 {
  const ch = Math.cos(-orientation.heading);
  const sh = Math.sin(-orientation.heading);
  const cp = Math.cos(-orientation.pitch);
  const sp = Math.sin(-orientation.pitch);
  const cr = Math.cos(orientation.roll);
  const sr = Math.sin(orientation.roll);

  // Heading (about Y): X toward Z
  const x1 = ch * dir.x + sh * dir.z;
  const y1 = dir.y;
  const z1 = -sh * dir.x + ch * dir.z;

  // Pitch (about Z): X toward Y
  const x2 = cp * x1 - sp * y1;
  const y2 = sp * x1 + cp * y1;
  const z2 = z1;

  // Roll (about X): Y toward Z
  return {
    x: x2,
    y: cr * y2 - sr * z2,
    z: sr * y2 + cr * z2,
  };
}

/**
 * Bilinearly sample one channel at fractional pixel coordinates.
 *
 * Columns wrap around (longitude is cyclic); rows clamp to the poles.
 *
 * @param v Fractional row.
 * @param u Fractional column.
 */
export function sampleBilinear(
  image: RasterImage,
  v: number,
  u: number,
  channel = 0,
): number {
  const { width, height, channels, data } = image;

  const vFloor = Math.floor(v);
  const uFloor = Math.floor(u);
  const wv = v - vFloor;
  const wu = u - uFloor;

  const v0 = Math.min(Math.max(vFloor, 0), height - 1);
  const v1 = Math.min(v0 + 1, height - 1);
  const u0 = ((uFloor % width) + width) % width;
  const u1 = (u0 + 1) % width;

  const at = (row: number, col: number): number =>
    data[(row * width + col) * channels + channel]!;

  return (
    at(v0, u0) * (1 - wu) * (1 - wv) +
    at(v0, u1) * wu * (1 - wv) +
    at(v1, u0) * (1 - wu) * wv +
    at(v1, u1) * wu * wv
  );
}

// ---------------------------------------------------------------------------
// level
// ---------------------------------------------------------------------------

/**
 * Correct the orientation of an equirectangular panorama.
 *
 * Each output pixel is mapped to a unit direction, carried back through
 * {@link sourceDirection}, converted to source pixel coordinates and sampled
 * bilinearly. Samples are stored in the input's element type, so integer
 * images truncate the interpolated value.
 *
 * When all three angles are below {@link LEVEL_EPSILON} the input object is
 * returned as-is, without resampling.
 *
 * @throws DegenerateImageError if the image has fewer than two rows or columns.
 */
export function level<T extends PixelArray>(
  image: RasterImage<T>,
  orientation: Orientation,
): RasterImage<T>;
export function level(image: RasterImage, orientation: Orientation): RasterImage {
  if (isLevel(orientation)) return image;

  assertRasterShape(image);
  assertSphericalShape(image);

  const { width, height, channels } = image;
  const out = image.data.slice();

  for (let v = 0; v < height; v++) {
    const theta = rowToPolar(v, height);
    for (let u = 0; u < width; u++) {
      const dir = sphericalToDirection(theta, columnToAzimuth(u, width));
      const src = sourceDirection(dir, orientation);

      const thetaIn = Math.acos(Math.min(Math.max(src.y, -1), 1));
      let phiIn = Math.atan2(src.z, src.x);
      if (phiIn < 0) phiIn += TWO_PI;

      const vIn = (thetaIn / Math.PI) * (height - 1);
      const uIn = (phiIn / TWO_PI) * (width - 1);

      const base = (v * width + u) * channels;
      for (let c = 0; c < channels; c++) {
        out[base + c] = sampleBilinear(image, vIn, uIn, c);
      }
    }
  }

  return { width, height, channels, data: out };
}
