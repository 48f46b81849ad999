import { z } from 'zod'

/**
 * Sidecar JSON written next to a downloaded panorama.
 *
 * Angles are radians. Keys follow the on-disk format; unknown keys are kept
 * so rewriting the file does not drop them.
 */
export const panoramaMetadataSchema = z
  .object({
    id: z.string().min(1),
    date: z.string().nullable().optional(),
    lat: z.number().min(-90).max(90),
    lon: z.number().min(-180).max(180),
    pitch: z.number().finite(),
    roll: z.number().finite(),
    heading: z.number().finite(),
    elevation: z.number().nullable().optional(),
    auto_leveled: z.boolean().default(false),
  })
  .passthrough()

export type PanoramaMetadata = z.output<typeof panoramaMetadataSchema>
