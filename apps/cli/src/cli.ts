import { InputNotFoundError, PanoError } from '@pano2points/core'
import { CONVERT_USAGE, runConvert } from './commands/convert.js'
import type { CommandContext } from './commands/context.js'
import { runLevel } from './commands/level.js'
import { InvalidMetadataError, InvalidOptionsError } from './lib/errors.js'

export const USAGE = `${CONVERT_USAGE}
Other commands:
  pano2points level <input>  Level a panorama from its sidecar metadata (see level --help)
`

/**
 * Dispatch a command and map failures to an exit code: 0 on success,
 * 1 for a missing input, bad options or any error during conversion.
 */
export async function run(argv: string[], ctx: CommandContext): Promise<number> {
  const [first, ...rest] = argv
  try {
    if (first === undefined) {
      ctx.stdout.write(USAGE)
      return 1
    }
    if (first === 'level') return await runLevel(rest, ctx)
    if (first === 'convert') return await runConvert(rest, ctx)
    return await runConvert(argv, ctx)
  } catch (err) {
    if (err instanceof InputNotFoundError) {
      ctx.logger.error('Input file not found', { path: err.path })
    } else if (err instanceof InvalidOptionsError) {
      ctx.logger.error('Invalid options', { issues: err.issues })
    } else if (err instanceof InvalidMetadataError) {
      ctx.logger.error('Invalid metadata', { path: err.path, issues: err.issues })
    } else if (err instanceof PanoError) {
      ctx.logger.error('Error during conversion', { error: err.message, kind: err.name })
    } else {
      ctx.logger.error('Error during conversion', { error: err instanceof Error ? err.message : String(err) })
    }
    return 1
  }
}
