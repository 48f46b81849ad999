/**
 * File and image I/O for the commands.
 *
 * Everything the pipeline reads or writes goes through {@link PanoIO}, so
 * tests can swap in an in-memory store. The default implementation decodes
 * and encodes images with sharp and writes text with fs.
 */

import { access, open, readFile } from 'node:fs/promises'
import { extname } from 'node:path'
import sharp from 'sharp'
import {
  InvalidRasterError,
  createGrayscale,
  createRaster,
  type GrayscaleImage,
  type RasterImage,
} from '@pano2points/core'

export interface PanoIO {
  exists(path: string): Promise<boolean>
  /** Decode as 8-bit grayscale, shrinking so neither side exceeds `maxSize`. */
  readGrayscale(path: string, maxSize: number): Promise<GrayscaleImage>
  /** Decode at full size keeping the file's channels (8-bit). */
  readRaster(path: string): Promise<RasterImage<Uint8Array>>
  writeGrayscale(path: string, image: GrayscaleImage): Promise<void>
  writeRaster(path: string, image: RasterImage<Uint8Array>): Promise<void>
  readText(path: string): Promise<string>
  writeText(path: string, chunks: Iterable<string>): Promise<void>
}

type SharpChannels = 1 | 2 | 3 | 4

/** JPEG quality used when writing leveled panoramas. */
export const JPEG_QUALITY = 95

// ─── Sizing ─────────────────────────────────────────────────────────────────

/**
 * Target size that fits `maxSize` on the longer side, preserving aspect
 * ratio with truncated dimensions. Returns null when no resize is needed.
 */
export function fitWithin(
  width: number,
  height: number,
  maxSize: number,
): { width: number; height: number } | null {
  const longest = Math.max(width, height)
  if (longest <= maxSize) return null
  const ratio = maxSize / longest
  return { width: Math.floor(width * ratio), height: Math.floor(height * ratio) }
}

function toSharpChannels(channels: number): SharpChannels {
  switch (channels) {
    case 1:
    case 2:
    case 3:
    case 4:
      return channels
    default:
      throw new InvalidRasterError(`cannot encode ${channels} channels`)
  }
}

/** Keep only the first channel of an interleaved buffer. */
function firstChannel(data: Uint8Array, channels: number): Uint8Array {
  if (channels === 1) return new Uint8Array(data)
  const out = new Uint8Array(data.length / channels)
  for (let i = 0; i < out.length; i++) {
    out[i] = data[i * channels]!
  }
  return out
}

function encoderFor(path: string, image: sharp.Sharp): sharp.Sharp {
  const ext = extname(path).toLowerCase()
  if (ext === '.jpg' || ext === '.jpeg') return image.jpeg({ quality: JPEG_QUALITY })
  if (ext === '.png') return image.png()
  return image
}

// ─── Node implementation ────────────────────────────────────────────────────

export const nodePanoIO: PanoIO = {
  async exists(path) {
    try {
      await access(path)
      return true
    } catch {
      return false
    }
  },

  async readGrayscale(path, maxSize) {
    const source = sharp(path)
    const meta = await source.metadata()
    if (meta.width === undefined || meta.height === undefined) {
      throw new InvalidRasterError(`could not read dimensions of ${path}`)
    }

    let pipeline = source.grayscale()
    const target = fitWithin(meta.width, meta.height, maxSize)
    if (target) {
      pipeline = pipeline.resize(target.width, target.height, {
        fit: 'fill',
        kernel: sharp.kernel.lanczos3,
      })
    }

    const { data, info } = await pipeline.raw().toBuffer({ resolveWithObject: true })
    return createGrayscale(info.width, info.height, firstChannel(data, info.channels))
  },

  async readRaster(path) {
    const { data, info } = await sharp(path).raw().toBuffer({ resolveWithObject: true })
    return createRaster(info.width, info.height, info.channels, new Uint8Array(data))
  },

  async writeGrayscale(path, image) {
    await nodePanoIO.writeRaster(path, image)
  },

  async writeRaster(path, image) {
    const raw = sharp(image.data, {
      raw: { width: image.width, height: image.height, channels: toSharpChannels(image.channels) },
    })
    await encoderFor(path, raw).toFile(path)
  },

  async readText(path) {
    return readFile(path, 'utf8')
  },

  async writeText(path, chunks) {
    const handle = await open(path, 'w')
    try {
      for (const chunk of chunks) {
        await handle.write(chunk)
      }
    } finally {
      await handle.close()
    }
  },
}

