// ---------------------------------------------------------------------------
// Raster helpers: construction, shape checks and the pixel <-> sphere
// angle mapping shared by leveling and projection.
// ---------------------------------------------------------------------------

import { DegenerateImageError, InvalidRasterError } from '../errors.js';
import type { DitherMask, GrayscaleImage, PixelArray, RasterImage, Vector3 } from '../types.js';

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

/**
 * Wrap a typed array as a raster after checking its length.
 *
 * @throws InvalidRasterError if `data.length !== width * height * channels`.
 */
export function createRaster<T extends PixelArray>(
  width: number,
  height: number,
  channels: number,
  data: T,
): RasterImage<T> {
  const image = { width, height, channels, data };
  assertRasterShape(image);
  return image;
}

/** Build an 8-bit grayscale image from row-major intensities. */
export function createGrayscale(
  width: number,
  height: number,
  values: ArrayLike<number>,
): GrayscaleImage {
  const data = Uint8Array.from(values);
  const image: GrayscaleImage = { width, height, channels: 1, data };
  assertRasterShape(image);
  return image;
}

// ---------------------------------------------------------------------------
// Shape checks
// ---------------------------------------------------------------------------

/** Check dimensions are positive integers and the buffer has the right length. */
export function assertRasterShape(image: RasterImage): void {
  const { width, height, channels, data } = image;
  if (!Number.isInteger(width) || !Number.isInteger(height) || width < 1 || height < 1) {
    throw new InvalidRasterError(`dimensions must be positive integers, got ${width}x${height}`);
  }
  if (!Number.isInteger(channels) || channels < 1) {
    throw new InvalidRasterError(`channel count must be a positive integer, got ${channels}`);
  }
  const expected = width * height * channels;
  if (data.length !== expected) {
    throw new InvalidRasterError(
      `expected ${expected} samples for ${width}x${height}x${channels}, got ${data.length}`,
    );
  }
}

/**
 * Reject rasters with fewer than two rows or columns. The angle mapping
 * divides by `height - 1` and `width - 1`.
 */
export function assertSphericalShape(image: { width: number; height: number }): void {
  if (image.width < 2 || image.height < 2) {
    throw new DegenerateImageError(image.width, image.height);
  }
}

/** Check that a mask and an image describe the same pixel grid. */
export function assertSameShape(mask: DitherMask, image: RasterImage): void {
  if (mask.width !== image.width || mask.height !== image.height) {
    throw new InvalidRasterError(
      `mask is ${mask.width}x${mask.height} but image is ${image.width}x${image.height}`,
    );
  }
}

// ---------------------------------------------------------------------------
// Angle mapping
// ---------------------------------------------------------------------------

/** Polar angle θ ∈ [0, π] of a row; row 0 is the top pole. */
export function rowToPolar(row: number, height: number): number {
  return (row / (height - 1)) * Math.PI;
}

/** Azimuth φ ∈ [0, 2π] of a column; column 0 is φ = 0. */
export function columnToAzimuth(col: number, width: number): number {
  return (col / (width - 1)) * 2 * Math.PI;
}

/**
 * Unit direction for spherical angles, Y-up: x = sinθcosφ, y = cosθ,
 * z = sinθsinφ.
 */
export function sphericalToDirection(theta: number, phi: number): Vector3 {
  const sinTheta = Math.sin(theta);
  return {
    x: sinTheta * Math.cos(phi),
    y: Math.cos(theta),
    z: sinTheta * Math.sin(phi),
  };
}
