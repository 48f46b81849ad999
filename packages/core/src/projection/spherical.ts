// ---------------------------------------------------------------------------
// Spherical projection: dither mask pixels to points on a sphere, with
// brightness selection, rotation and a height band.
// ---------------------------------------------------------------------------

import { FULL_RANGE, NO_ROTATION } from '../constants.js';
import { assertSameShape, assertSphericalShape, columnToAzimuth, rowToPolar } from '../raster/index.js';
import type { DitherMask, GrayscaleImage, PointCloud, RangeFilter, RotationAngles } from '../types.js';
import { isZeroRotation, rotatePositionsInPlace, rotationMatrix } from './rotation.js';

/** Options for {@link projectToSphere}. */
export interface SphericalProjectionOptions {
  /** Sphere radius in output units (mm for engraving). */
  radius: number;
  /** Select background (0) pixels instead of foreground (1) pixels. */
  invert?: boolean;
  /** Degrees per axis, applied X then Y then Z. */
  rotation?: RotationAngles;
  /** Band on the rotated Y axis, 0 = bottom of the sphere, 1 = top. */
  heightFilter?: RangeFilter;
  /** Band on the original pixel intensity, 0 = black, 1 = white. */
  brightnessFilter?: RangeFilter;
  /** Grayscale source of the mask; required for brightness filtering. */
  originalImage?: GrayscaleImage;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** True when a range excludes part of [0, 1]. */
export function isRestrictive(range: RangeFilter): boolean {
  return range.min > 0 || range.max < 1;
}

/** Sphere Y coordinate for a normalized height: 0 -> -radius, 1 -> +radius. */
export function heightToY(height: number, radius: number): number {
  return -radius + height * 2 * radius;
}

/**
 * Pixel indices selected from a mask, in row-major order.
 *
 * With `invert` the background pixels are taken instead. When a restrictive
 * brightness filter and an original image are given, pixels whose
 * `value / 255` lies outside the filter are dropped afterwards.
 */
export function selectPixels(
  mask: DitherMask,
  invert: boolean,
  brightnessFilter: RangeFilter = FULL_RANGE,
  originalImage?: GrayscaleImage,
): Uint32Array {
  const wanted = invert ? 0 : 1;
  const filterByBrightness = originalImage !== undefined && isRestrictive(brightnessFilter);
  if (originalImage) assertSameShape(mask, originalImage);

  const picked: number[] = [];
  const { data } = mask;
  for (let i = 0; i < data.length; i++) {
    if (data[i] !== wanted) continue;
    if (filterByBrightness) {
      const brightness = originalImage.data[i]! / 255;
      if (brightness < brightnessFilter.min || brightness > brightnessFilter.max) continue;
    }
    picked.push(i);
  }
  return Uint32Array.from(picked);
}

function assertRange(name: string, range: RangeFilter): void {
  if (!(range.min <= range.max)) {
    throw new RangeError(`${name} range is empty: [${range.min}, ${range.max}]`);
  }
}

// ---------------------------------------------------------------------------
// projectToSphere
// ---------------------------------------------------------------------------

/**
 * Map selected mask pixels onto a sphere.
 *
 * Row `r` and column `c` become θ = r/(h-1)·π and φ = c/(w-1)·2π, placed at
 * x = R·sinθ·cosφ, y = R·cosθ, z = R·sinθ·sinφ (Y up). The cloud is then
 * rotated and, if the height filter is restrictive, cut to the points whose
 * rotated Y falls inside the band (bounds inclusive).
 *
 * Points keep the scan order of their pixels; nothing is sorted or merged,
 * so every pixel on the top row lands on the same pole point.
 *
 * @throws DegenerateImageError if the mask has fewer than two rows or columns.
 */
export function projectToSphere(
  mask: DitherMask,
  options: SphericalProjectionOptions,
): PointCloud {
  assertSphericalShape(mask);

  const {
    radius,
    invert = false,
    rotation = NO_ROTATION,
    heightFilter = FULL_RANGE,
    brightnessFilter = FULL_RANGE,
    originalImage,
  } = options;
  assertRange('height', heightFilter);
  assertRange('brightness', brightnessFilter);

  const { width, height } = mask;
  const indices = selectPixels(mask, invert, brightnessFilter, originalImage);
  const count = indices.length;
  const positions = new Float64Array(count * 3);

  for (let i = 0; i < count; i++) {
    const idx = indices[i]!;
    const row = Math.floor(idx / width);
    const col = idx - row * width;
    const theta = rowToPolar(row, height);
    const phi = columnToAzimuth(col, width);
    const sinTheta = Math.sin(theta);

    const o = i * 3;
    positions[o] = radius * sinTheta * Math.cos(phi);
    positions[o + 1] = radius * Math.cos(theta);
    positions[o + 2] = radius * sinTheta * Math.sin(phi);
  }

  if (!isZeroRotation(rotation)) {
    rotatePositionsInPlace(positions, count, rotationMatrix(rotation));
  }

  if (!isRestrictive(heightFilter)) {
    return { positions, count };
  }
  return filterByHeight({ positions, count }, heightToY(heightFilter.min, radius), heightToY(heightFilter.max, radius));
}

/** Keep points whose Y lies in `[yMin, yMax]`, preserving order. */
export function filterByHeight(cloud: PointCloud, yMin: number, yMax: number): PointCloud {
  const src = cloud.positions;
  const out = new Float64Array(cloud.count * 3);
  let kept = 0;

  for (let i = 0; i < cloud.count; i++) {
    const o = i * 3;
    const y = src[o + 1]!;
    if (y < yMin || y > yMax) continue;
    const k = kept * 3;
    out[k] = src[o]!;
    out[k + 1] = y;
    out[k + 2] = src[o + 2]!;
    kept++;
  }

  return { positions: out.slice(0, kept * 3), count: kept };
}
