// ---------------------------------------------------------------------------
// Point cloud text encodings: ASCII PLY and plain XYZ.
// ---------------------------------------------------------------------------

import { COORDINATE_PRECISION } from '../constants.js';
import type { DitherMask, GrayscaleImage, PointCloud, PointCloudFormat } from '../types.js';

/** Lines emitted per chunk by {@link serializePointCloud}. */
const LINES_PER_CHUNK = 8192;

/**
 * One coordinate with {@link COORDINATE_PRECISION} decimals.
 *
 * Negative zero keeps its sign, and values lying exactly halfway between
 * two outputs round to the even last digit.
 */
export function formatCoordinate(value: number): string {
  const sign = value < 0 || Object.is(value, -0) ? '-' : '';
  const abs = Math.abs(value);
  let digits = abs.toFixed(COORDINATE_PRECISION);

  // Exact binary ties at the 7th decimal are the odd multiples of 2^-7.
  const scaled = abs * 128;
  if (Number.isInteger(scaled) && scaled % 2 === 1) {
    const truncated = abs.toFixed(COORDINATE_PRECISION + 1).slice(0, -1);
    if (Number(truncated.at(-1)) % 2 === 0) digits = truncated;
  }
  return sign + digits;
}

/** `x y z` with fixed precision. */
export function formatPoint(x: number, y: number, z: number): string {
  return `${formatCoordinate(x)} ${formatCoordinate(y)} ${formatCoordinate(z)}`;
}

/** ASCII PLY 1.0 header for `count` float x/y/z vertices. */
export function plyHeader(count: number): string {
  return [
    'ply',
    'format ascii 1.0',
    `element vertex ${count}`,
    'property float x',
    'property float y',
    'property float z',
    'end_header',
    '',
  ].join('\n');
}

/** Yield newline-terminated coordinate lines in batches. */
function* coordinateChunks(cloud: PointCloud): Generator<string> {
  const p = cloud.positions;
  let lines: string[] = [];
  for (let i = 0; i < cloud.count; i++) {
    const o = i * 3;
    lines.push(formatPoint(p[o]!, p[o + 1]!, p[o + 2]!));
    if (lines.length === LINES_PER_CHUNK) {
      yield lines.join('\n') + '\n';
      lines = [];
    }
  }
  if (lines.length > 0) yield lines.join('\n') + '\n';
}

/**
 * Encode a cloud as text, chunk by chunk, so large clouds can be streamed
 * to disk without building one string.
 */
export function* serializePointCloud(cloud: PointCloud, format: PointCloudFormat): Generator<string> {
  if (format === 'ply') yield plyHeader(cloud.count);
  yield* coordinateChunks(cloud);
}

/** Whole-cloud ASCII PLY document. */
export function formatPly(cloud: PointCloud): string {
  return Array.from(serializePointCloud(cloud, 'ply')).join('');
}

/** Whole-cloud XYZ document: one `x y z` line per point, no header. */
export function formatXyz(cloud: PointCloud): string {
  return Array.from(serializePointCloud(cloud, 'xyz')).join('');
}

/** `.xyz` (any case) selects XYZ; every other path gets PLY. */
export function selectPointCloudFormat(path: string): PointCloudFormat {
  return path.toLowerCase().endsWith('.xyz') ? 'xyz' : 'ply';
}

/** Render a mask as an 8-bit preview image: foreground 255, background 0. */
export function maskToGrayscale(mask: DitherMask): GrayscaleImage {
  const data = new Uint8Array(mask.data.length);
  for (let i = 0; i < data.length; i++) {
    data[i] = mask.data[i] ? 255 : 0;
  }
  return { width: mask.width, height: mask.height, channels: 1, data };
}
