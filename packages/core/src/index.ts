// ---------------------------------------------------------------------------
// @pano2points/core: panorama to spherical point cloud transforms
// ---------------------------------------------------------------------------
// Pure, synchronous stages. File and image I/O live in the CLI app.
// ---------------------------------------------------------------------------

export * from './types.js';
export * from './constants.js';
export * from './errors.js';

// Raster construction, shape checks, pixel <-> angle mapping
export * from './raster/index.js';

// Orientation correction (reprojection)
export * from './leveling/index.js';

// Floyd-Steinberg error diffusion
export * from './dither/index.js';

// Mask -> sphere points, rotation, height and brightness bands
export * from './projection/index.js';

// PLY / XYZ text and mask previews
export * from './serialization/index.js';
