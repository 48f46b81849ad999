import { z } from 'zod'

/** A number in [0, 1]; CLI strings are coerced. */
export const unitIntervalSchema = z.coerce
  .number({ invalid_type_error: 'Must be a number' })
  .min(0, 'Must be between 0 and 1')
  .max(1, 'Must be between 0 and 1')

/** Degrees about one axis. */
export const angleDegreesSchema = z.coerce
  .number({ invalid_type_error: 'Must be a number' })
  .finite('Must be a finite angle')
