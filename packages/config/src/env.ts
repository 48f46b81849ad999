/**
 * Environment-driven defaults, validated once at startup.
 *
 * Command-line options override these. An invalid value throws with the
 * variable name rather than surfacing later as a NaN radius.
 */

import { z } from 'zod'

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

export interface PanoConfig {
  /** Default sphere radius in mm. */
  radius: number
  /** Default cap on the longer image side, in pixels. */
  maxSize: number
  logLevel: LogLevel
}

export const DEFAULT_CONFIG: Readonly<PanoConfig> = Object.freeze({
  radius: 50,
  maxSize: 2000,
  logLevel: 'info',
})

type EnvSource = Record<string, string | undefined>

function optional(source: EnvSource, key: string, fallback: string): string {
  const val = source[key]
  return val === undefined || val === '' ? fallback : val
}

const envSchema = z.object({
  PANO2POINTS_RADIUS: z.coerce.number().finite().positive(),
  PANO2POINTS_MAX_SIZE: z.coerce.number().int().min(2),
  LOG_LEVEL: z.enum(LOG_LEVELS),
})

/** Read configuration from `source` (defaults to `process.env`). */
export function loadConfig(source: EnvSource = process.env): Readonly<PanoConfig> {
  const raw: Record<string, string> = {
    PANO2POINTS_RADIUS: optional(source, 'PANO2POINTS_RADIUS', String(DEFAULT_CONFIG.radius)),
    PANO2POINTS_MAX_SIZE: optional(source, 'PANO2POINTS_MAX_SIZE', String(DEFAULT_CONFIG.maxSize)),
    LOG_LEVEL: optional(source, 'LOG_LEVEL', DEFAULT_CONFIG.logLevel).toLowerCase(),
  }

  const result = envSchema.safeParse(raw)
  if (!result.success) {
    const issue = result.error.issues[0]
    const key = String(issue?.path[0] ?? 'environment')
    throw new Error(
      `Invalid environment variable ${key}=${JSON.stringify(raw[key] ?? '')}: ${issue?.message ?? 'invalid value'}`,
    )
  }

  return Object.freeze({
    radius: result.data.PANO2POINTS_RADIUS,
    maxSize: result.data.PANO2POINTS_MAX_SIZE,
    logLevel: result.data.LOG_LEVEL,
  })
}
