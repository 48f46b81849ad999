import { loadConfig, type PanoConfig } from '@pano2points/config'
import { run } from './cli.js'
import { nodePanoIO } from './lib/image-io.js'
import { createLogger } from './lib/logger.js'

async function main(): Promise<number> {
  let config: Readonly<PanoConfig>
  try {
    config = loadConfig()
  } catch (err) {
    process.stderr.write(
      JSON.stringify({
        ts: new Date().toISOString(),
        level: 'error',
        msg: 'Invalid configuration',
        error: err instanceof Error ? err.message : String(err),
      }) + '\n',
    )
    return 1
  }

  return run(process.argv.slice(2), {
    io: nodePanoIO,
    logger: createLogger({ level: config.logLevel }),
    config,
    stdout: process.stdout,
  })
}

process.exitCode = await main()
