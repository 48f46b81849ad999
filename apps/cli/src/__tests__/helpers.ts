import { createGrayscale, type GrayscaleImage, type RasterImage } from '@pano2points/core'
import { DEFAULT_CONFIG } from '@pano2points/config'
import type { CommandContext } from '../commands/context.js'
import type { PanoIO } from '../lib/image-io.js'
import { createLogger, type LogSink } from '../lib/logger.js'

/** In-memory stand-in for the sharp/fs backed I/O. */
export class MemoryPanoIO implements PanoIO {
  readonly images = new Map<string, RasterImage<Uint8Array>>()
  readonly texts = new Map<string, string>()
  /** Paths written, in order. */
  readonly writes: string[] = []
  readonly maxSizes: number[] = []
  failWritesTo = new Set<string>()

  async exists(path: string): Promise<boolean> {
    return this.images.has(path) || this.texts.has(path)
  }

  async readGrayscale(path: string, maxSize: number): Promise<GrayscaleImage> {
    this.maxSizes.push(maxSize)
    const image = this.images.get(path)
    if (!image) throw new Error(`ENOENT: no such file, open '${path}'`)
    return createGrayscale(image.width, image.height, image.data)
  }

  async readRaster(path: string): Promise<RasterImage<Uint8Array>> {
    const image = this.images.get(path)
    if (!image) throw new Error(`ENOENT: no such file, open '${path}'`)
    return image
  }

  async writeGrayscale(path: string, image: GrayscaleImage): Promise<void> {
    await this.writeRaster(path, image)
  }

  async writeRaster(path: string, image: RasterImage<Uint8Array>): Promise<void> {
    this.guard(path)
    this.images.set(path, { ...image, data: Uint8Array.from(image.data) })
    this.writes.push(path)
  }

  async readText(path: string): Promise<string> {
    const text = this.texts.get(path)
    if (text === undefined) throw new Error(`ENOENT: no such file, open '${path}'`)
    return text
  }

  async writeText(path: string, chunks: Iterable<string>): Promise<void> {
    this.guard(path)
    this.texts.set(path, Array.from(chunks).join(''))
    this.writes.push(path)
  }

  private guard(path: string): void {
    if (this.failWritesTo.has(path)) throw new Error(`EACCES: permission denied, open '${path}'`)
  }
}

/** Sink that keeps everything written to it. */
export class CaptureSink implements LogSink {
  readonly chunks: string[] = []

  write(chunk: string): boolean {
    this.chunks.push(chunk)
    return true
  }

  text(): string {
    return this.chunks.join('')
  }

  /** Parsed JSON log lines. */
  entries(): Array<Record<string, unknown>> {
    return this.text()
      .split('\n')
      .filter((line) => line.length > 0)
      .map((line): Record<string, unknown> => JSON.parse(line))
  }
}

export interface TestContext extends CommandContext {
  io: MemoryPanoIO
  out: CaptureSink
  err: CaptureSink
  help: CaptureSink
}

export function makeContext(): TestContext {
  const io = new MemoryPanoIO()
  const out = new CaptureSink()
  const err = new CaptureSink()
  const help = new CaptureSink()
  return {
    io,
    out,
    err,
    help,
    logger: createLogger({ level: 'info', stdout: out, stderr: err, clock: () => new Date(0) }),
    config: DEFAULT_CONFIG,
    stdout: help,
  }
}

/** The 4x2 alternating panorama: dithers to [0,1,0,1 / 1,0,1,0]. */
export function alternatingImage(): GrayscaleImage {
  return createGrayscale(4, 2, [10, 250, 10, 250, 250, 10, 250, 10])
}
