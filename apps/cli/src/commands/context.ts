import type { PanoConfig } from '@pano2points/config'
import type { PanoIO } from '../lib/image-io.js'
import type { LogSink, Logger } from '../lib/logger.js'

/** Everything a command needs from the outside world. */
export interface CommandContext {
  io: PanoIO
  logger: Logger
  config: Readonly<PanoConfig>
  /** Plain-text output (help). */
  stdout: LogSink
}
