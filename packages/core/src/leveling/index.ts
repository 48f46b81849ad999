export { level, isLevel, normalizeRoll, sourceDirection, sampleBilinear } from './level.js';
