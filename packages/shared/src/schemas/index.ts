export { unitIntervalSchema, angleDegreesSchema } from './range.js'

export {
  convertOptionsSchema,
  type ConvertOptions,
} from './convert-options.js'

export {
  levelOptionsSchema,
  type LevelOptions,
} from './level-options.js'

export {
  panoramaMetadataSchema,
  type PanoramaMetadata,
} from './metadata.js'
