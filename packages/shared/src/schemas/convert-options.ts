import { z } from 'zod'
import { angleDegreesSchema, unitIntervalSchema } from './range.js'

export const convertOptionsSchema = z
  .object({
    input: z.string().min(1, 'Input path is required'),
    output: z.string().min(1).optional(),
    radius: z.coerce.number().finite().positive('Radius must be positive'),
    maxSize: z.coerce.number().int('Max size must be an integer').min(2, 'Max size must be at least 2'),
    invert: z.boolean().default(false),
    rotateX: angleDegreesSchema.default(0),
    rotateY: angleDegreesSchema.default(0),
    rotateZ: angleDegreesSchema.default(0),
    heightMin: unitIntervalSchema.default(0),
    heightMax: unitIntervalSchema.default(1),
    brightnessMin: unitIntervalSchema.default(0),
    brightnessMax: unitIntervalSchema.default(1),
    preview: z.boolean().default(false),
    previewDither: z.string().min(1).optional(),
  })
  .refine((o) => o.heightMin <= o.heightMax, {
    message: 'Height min must not exceed height max',
    path: ['heightMax'],
  })
  .refine((o) => o.brightnessMin <= o.brightnessMax, {
    message: 'Brightness min must not exceed brightness max',
    path: ['brightnessMax'],
  })

export type ConvertOptions = z.output<typeof convertOptionsSchema>
