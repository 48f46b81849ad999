export { dither, countForeground } from './floyd-steinberg.js';
