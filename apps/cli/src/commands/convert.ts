import { InputNotFoundError, isRestrictive } from '@pano2points/core'
import { convertOptionsSchema, type ConvertOptions } from '@pano2points/shared'
import { flagValue, stringValue, tokenize, validate } from '../lib/args.js'
import { InvalidOptionsError } from '../lib/errors.js'
import { defaultOutputPath, defaultPreviewPath } from '../lib/paths.js'
import { convert, type ConvertRequest } from '../pipeline.js'
import type { CommandContext } from './context.js'

export const CONVERT_USAGE = `Usage: pano2points [convert] <input> [options]

Convert an equirectangular panorama to a dithered spherical point cloud.

Options:
  -o, --output <path>        Output file (.ply or .xyz). Default: input name with .ply
  -r, --radius <mm>          Sphere radius in mm (default: PANO2POINTS_RADIUS or 50)
      --max-size <px>        Maximum image dimension (default: PANO2POINTS_MAX_SIZE or 2000)
      --invert               Dark areas get points instead of bright areas
      --rotate-x <deg>       Rotation about X, applied before the height filter
      --rotate-y <deg>       Rotation about Y, applied before the height filter
      --rotate-z <deg>       Rotation about Z, applied before the height filter
      --height-min <0-1>     Minimum height (0 = bottom, 1 = top)
      --height-max <0-1>     Maximum height (0 = bottom, 1 = top)
      --brightness-min <0-1> Minimum source brightness to include
      --brightness-max <0-1> Maximum source brightness to include
      --preview              Write <output>_dithered.png next to the output
      --preview-dither <p>   Write the dither preview to this path
  -h, --help                 Show this help
`

const OPTIONS = {
  output: { type: 'string', short: 'o' },
  radius: { type: 'string', short: 'r' },
  'max-size': { type: 'string' },
  invert: { type: 'boolean' },
  'rotate-x': { type: 'string' },
  'rotate-y': { type: 'string' },
  'rotate-z': { type: 'string' },
  'height-min': { type: 'string' },
  'height-max': { type: 'string' },
  'brightness-min': { type: 'string' },
  'brightness-max': { type: 'string' },
  preview: { type: 'boolean' },
  'preview-dither': { type: 'string' },
  help: { type: 'boolean', short: 'h' },
} as const

/** Parse and validate convert arguments; null means help was requested. */
export function parseConvertArgs(argv: string[], ctx: Pick<CommandContext, 'config'>): ConvertOptions | null {
  const { values, positionals } = tokenize(argv, OPTIONS)
  if (flagValue(values, 'help')) return null
  if (positionals.length !== 1) {
    throw new InvalidOptionsError([
      positionals.length === 0 ? 'input: Input path is required' : `Unexpected arguments: ${positionals.slice(1).join(' ')}`,
    ])
  }

  return validate(convertOptionsSchema, {
    input: positionals[0],
    output: stringValue(values, 'output'),
    radius: stringValue(values, 'radius') ?? ctx.config.radius,
    maxSize: stringValue(values, 'max-size') ?? ctx.config.maxSize,
    invert: flagValue(values, 'invert'),
    rotateX: stringValue(values, 'rotate-x'),
    rotateY: stringValue(values, 'rotate-y'),
    rotateZ: stringValue(values, 'rotate-z'),
    heightMin: stringValue(values, 'height-min'),
    heightMax: stringValue(values, 'height-max'),
    brightnessMin: stringValue(values, 'brightness-min'),
    brightnessMax: stringValue(values, 'brightness-max'),
    preview: flagValue(values, 'preview'),
    previewDither: stringValue(values, 'preview-dither'),
  })
}

/** Resolve output and preview paths into a pipeline request. */
export function toConvertRequest(options: ConvertOptions): ConvertRequest {
  const outputPath = options.output ?? defaultOutputPath(options.input)
  const previewPath =
    options.previewDither ?? (options.preview ? defaultPreviewPath(outputPath) : undefined)

  return {
    inputPath: options.input,
    outputPath,
    radius: options.radius,
    maxSize: options.maxSize,
    invert: options.invert,
    rotation: { x: options.rotateX, y: options.rotateY, z: options.rotateZ },
    heightFilter: { min: options.heightMin, max: options.heightMax },
    brightnessFilter: { min: options.brightnessMin, max: options.brightnessMax },
    previewPath,
  }
}

export async function runConvert(argv: string[], ctx: CommandContext): Promise<number> {
  const options = parseConvertArgs(argv, ctx)
  if (options === null) {
    ctx.stdout.write(CONVERT_USAGE)
    return 0
  }

  if (!(await ctx.io.exists(options.input))) {
    throw new InputNotFoundError(options.input)
  }

  const request = toConvertRequest(options)
  const { logger } = ctx

  logger.info('Loading panorama', { input: request.inputPath })
  logger.info('Parameters', { radius: request.radius, maxSize: request.maxSize })
  logger.info('Mode', { mode: request.invert ? 'inverted' : 'normal' })
  const { x, y, z } = request.rotation
  if (x !== 0 || y !== 0 || z !== 0) {
    logger.info('Rotation', { x, y, z })
  }
  if (isRestrictive(request.heightFilter)) {
    logger.info('Height range', { ...request.heightFilter })
  }
  if (isRestrictive(request.brightnessFilter)) {
    logger.info('Brightness range', { ...request.brightnessFilter })
  }

  const result = await convert(request, ctx.io, logger)

  logger.info('Generated points', {
    points: result.cloud.count,
    width: result.width,
    height: result.height,
  })
  logger.info('Point cloud saved', { path: request.outputPath })
  if (request.previewPath !== undefined) {
    logger.info('Dither preview saved', { path: request.previewPath })
  }
  return 0
}
