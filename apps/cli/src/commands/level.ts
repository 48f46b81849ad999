import { InputNotFoundError, level, normalizeRoll } from '@pano2points/core'
import { levelOptionsSchema, type LevelOptions } from '@pano2points/shared'
import { flagValue, stringValue, tokenize, validate } from '../lib/args.js'
import { InvalidOptionsError } from '../lib/errors.js'
import { readMetadata, writeMetadata } from '../lib/metadata.js'
import { defaultLeveledPath, sidecarPath } from '../lib/paths.js'
import type { CommandContext } from './context.js'

export const LEVEL_USAGE = `Usage: pano2points level <input> [options]

Level a downloaded panorama using the pitch and roll in its sidecar metadata.

Options:
  -o, --output <path>     Output image (default: <input>_leveled with the same extension)
  -m, --metadata <path>   Sidecar JSON (default: input name with .json)
      --correct-heading   Also undo the heading (default: keep the original orientation)
      --force             Level even if the sidecar says it already was
  -h, --help              Show this help
`

const OPTIONS = {
  output: { type: 'string', short: 'o' },
  metadata: { type: 'string', short: 'm' },
  'correct-heading': { type: 'boolean' },
  force: { type: 'boolean' },
  help: { type: 'boolean', short: 'h' },
} as const

export function parseLevelArgs(argv: string[]): LevelOptions | null {
  const { values, positionals } = tokenize(argv, OPTIONS)
  if (flagValue(values, 'help')) return null
  if (positionals.length !== 1) {
    throw new InvalidOptionsError([
      positionals.length === 0 ? 'input: Input path is required' : `Unexpected arguments: ${positionals.slice(1).join(' ')}`,
    ])
  }

  return validate(levelOptionsSchema, {
    input: positionals[0],
    output: stringValue(values, 'output'),
    metadata: stringValue(values, 'metadata'),
    correctHeading: flagValue(values, 'correct-heading'),
    force: flagValue(values, 'force'),
  })
}

export async function runLevel(argv: string[], ctx: CommandContext): Promise<number> {
  const options = parseLevelArgs(argv)
  if (options === null) {
    ctx.stdout.write(LEVEL_USAGE)
    return 0
  }

  const { io, logger } = ctx
  if (!(await io.exists(options.input))) {
    throw new InputNotFoundError(options.input)
  }

  const metadataPath = options.metadata ?? sidecarPath(options.input)
  const metadata = await readMetadata(io, metadataPath)
  if (metadata.auto_leveled && !options.force) {
    logger.warn('Panorama already leveled, nothing to do', { input: options.input, metadata: metadataPath })
    return 0
  }

  const orientation = {
    pitch: metadata.pitch,
    roll: normalizeRoll(metadata.roll),
    heading: options.correctHeading ? metadata.heading : 0,
  }
  logger.info('Leveling panorama', { input: options.input, id: metadata.id, ...orientation })

  const image = await io.readRaster(options.input)
  const leveled = level(image, orientation)

  const outputPath = options.output ?? defaultLeveledPath(options.input)
  await io.writeRaster(outputPath, leveled)
  logger.info('Panorama saved', { path: outputPath, width: leveled.width, height: leveled.height })

  const outputMetadataPath = sidecarPath(outputPath)
  await writeMetadata(io, outputMetadataPath, { ...metadata, auto_leveled: true })
  logger.info('Metadata saved', { path: outputMetadataPath })
  return 0
}
