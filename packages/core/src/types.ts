// ---------------------------------------------------------------------------
// @pano2points/core: Raster, mask and point-cloud types
// ---------------------------------------------------------------------------

// ---------------------------------------------------------------------------
// Raster images
// ---------------------------------------------------------------------------

/** Typed arrays a raster may store its samples in. */
export type PixelArray = Uint8Array | Uint16Array | Float32Array | Float64Array;

/**
 * Row-major, channel-interleaved raster.
 *
 * For an equirectangular panorama the row index maps to polar angle
 * θ ∈ [0, π] (0 = top) and the column index to azimuth φ ∈ [0, 2π)
 * (0 = left).
 */
export interface RasterImage<T extends PixelArray = PixelArray> {
  width: number;
  height: number;
  /** Samples per pixel: 1 for grayscale, 3 for RGB, 4 for RGBA. */
  channels: number;
  /** `width * height * channels` samples. */
  data: T;
}

/** 8-bit single-channel intensity image (0 = black, 255 = white). */
export interface GrayscaleImage extends RasterImage<Uint8Array> {
  channels: 1;
}

// ---------------------------------------------------------------------------
// Dither mask
// ---------------------------------------------------------------------------

/** Binary foreground mask. `data[i] === 1` marks a selected pixel. */
export interface DitherMask {
  width: number;
  height: number;
  data: Uint8Array;
}

// ---------------------------------------------------------------------------
// Orientation and rotation
// ---------------------------------------------------------------------------

/** Camera orientation of a captured panorama, in radians. */
export interface Orientation {
  /** Positive = looking up. */
  pitch: number;
  /** Positive = clockwise tilt when looking forward. */
  roll: number;
  /** Rotation about the vertical axis. */
  heading: number;
}

/** Rotation applied to projected points, in degrees per axis. */
export interface RotationAngles {
  x: number;
  y: number;
  z: number;
}

/** Closed interval in normalized [0, 1] space. */
export interface RangeFilter {
  min: number;
  max: number;
}

/** 3D vector. */
export interface Vector3 {
  x: number;
  y: number;
  z: number;
}

/** 3x3 matrix stored as a 9-element Float64Array in column-major order.
 *
 * Element at row r, col c is at index c*3 + r.
 */
export type Matrix3x3 = Float64Array;

// ---------------------------------------------------------------------------
// Point cloud
// ---------------------------------------------------------------------------

/** Ordered point sequence, packed as [x0,y0,z0, x1,y1,z1, ...]. */
export interface PointCloud {
  positions: Float64Array;
  /** Number of points. */
  count: number;
}

/** Output encodings for a point cloud. */
export type PointCloudFormat = 'ply' | 'xyz';
