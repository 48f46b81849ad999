import { z } from 'zod'

export const levelOptionsSchema = z.object({
  input: z.string().min(1, 'Input path is required'),
  output: z.string().min(1).optional(),
  metadata: z.string().min(1).optional(),
  correctHeading: z.boolean().default(false),
  force: z.boolean().default(false),
})

export type LevelOptions = z.output<typeof levelOptionsSchema>
