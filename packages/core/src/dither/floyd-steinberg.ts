// ---------------------------------------------------------------------------
// Floyd-Steinberg dithering: grayscale to binary foreground mask.
// ---------------------------------------------------------------------------

import { DITHER_THRESHOLD, FLOYD_STEINBERG_WEIGHTS } from '../constants.js';
import { InvalidRasterError } from '../errors.js';
import { assertRasterShape } from '../raster/index.js';
import type { DitherMask, GrayscaleImage, RasterImage } from '../types.js';

const WHITE = 255;
const BLACK = 0;

/**
 * Reduce a grayscale image to a binary mask by error diffusion.
 *
 * Pixels are visited row-major. Each one is binarized at
 * {@link DITHER_THRESHOLD} and its quantization error is pushed onto the
 * in-bounds neighbours that have not been visited yet: right 7/16,
 * below-left 3/16, below 5/16, below-right 1/16. Shares that would fall
 * outside the image are dropped.
 *
 * The pass runs over a Float32 copy of the input so accumulated error is
 * not truncated to 8 bits; the input itself is not modified. Because every
 * pixel depends on the error left by the ones before it, the loop is
 * strictly sequential.
 *
 * @returns A mask with 1 wherever the binarized value is white.
 * @throws InvalidRasterError for multi-channel input.
 */
export function dither(image: GrayscaleImage | RasterImage): DitherMask {
  assertRasterShape(image);
  if (image.channels !== 1) {
    throw new InvalidRasterError(`dithering needs a single-channel image, got ${image.channels} channels`);
  }

  const { width, height } = image;
  const buf = Float32Array.from(image.data);
  const mask = new Uint8Array(width * height);
  const { right, belowLeft, below, belowRight } = FLOYD_STEINBERG_WEIGHTS;

  for (let y = 0; y < height; y++) {
    const row = y * width;
    const hasBelow = y + 1 < height;

    for (let x = 0; x < width; x++) {
      const idx = row + x;
      const oldPixel = buf[idx]!;
      const newPixel = oldPixel > DITHER_THRESHOLD ? WHITE : BLACK;
      buf[idx] = newPixel;
      if (newPixel === WHITE) mask[idx] = 1;

      const error = oldPixel - newPixel;
      if (error === 0) continue;

      if (x + 1 < width) buf[idx + 1] = buf[idx + 1]! + error * right;
      if (hasBelow) {
        const next = idx + width;
        if (x > 0) buf[next - 1] = buf[next - 1]! + error * belowLeft;
        buf[next] = buf[next]! + error * below;
        if (x + 1 < width) buf[next + 1] = buf[next + 1]! + error * belowRight;
      }
    }
  }

  return { width, height, data: mask };
}

/** Number of foreground pixels in a mask. */
export function countForeground(mask: DitherMask): number {
  let n = 0;
  for (let i = 0; i < mask.data.length; i++) {
    n += mask.data[i]!;
  }
  return n;
}
