export {
  projectToSphere,
  selectPixels,
  filterByHeight,
  heightToY,
  isRestrictive,
  type SphericalProjectionOptions,
} from './spherical.js';
export {
  degToRad,
  rotationX,
  rotationY,
  rotationZ,
  mat3Multiply,
  rotationMatrix,
  isZeroRotation,
  rotatePositionsInPlace,
} from './rotation.js';
