export {
  formatCoordinate,
  formatPoint,
  plyHeader,
  serializePointCloud,
  formatPly,
  formatXyz,
  selectPointCloudFormat,
  maskToGrayscale,
} from './text.js';
