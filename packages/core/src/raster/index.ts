export {
  createRaster,
  createGrayscale,
  assertRasterShape,
  assertSphericalShape,
  assertSameShape,
  rowToPolar,
  columnToAzimuth,
  sphericalToDirection,
} from './raster.js';
