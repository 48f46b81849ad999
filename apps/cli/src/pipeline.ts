/**
 * Conversion pipeline: load -> dither -> preview -> project -> serialize.
 *
 * Stages run strictly in order and the first failure ends the run. Files
 * written by earlier stages (the preview) stay on disk.
 */

import {
  ConversionError,
  PanoError,
  assertSphericalShape,
  dither,
  maskToGrayscale,
  projectToSphere,
  selectPointCloudFormat,
  serializePointCloud,
  type ConversionStage,
  type PointCloud,
  type RangeFilter,
  type RotationAngles,
} from '@pano2points/core'
import type { PanoIO } from './lib/image-io.js'
import { silentLogger, type Logger } from './lib/logger.js'

export interface ConvertRequest {
  inputPath: string
  /** `.xyz` writes XYZ; anything else writes PLY. */
  outputPath: string
  radius: number
  maxSize: number
  invert: boolean
  rotation: RotationAngles
  heightFilter: RangeFilter
  brightnessFilter: RangeFilter
  previewPath?: string
}

export interface ConvertResult {
  cloud: PointCloud
  /** Size of the image after resampling. */
  width: number
  height: number
}

/** Run one stage, tagging unexpected failures with the stage name. */
async function runStage<T>(
  stage: ConversionStage,
  logger: Logger,
  fn: () => T | Promise<T>,
): Promise<T> {
  const start = performance.now()
  try {
    const result = await fn()
    logger.debug('Stage complete', { stage, ms: Number((performance.now() - start).toFixed(1)) })
    return result
  } catch (err) {
    if (err instanceof PanoError) throw err
    throw new ConversionError(stage, err)
  }
}

export async function convert(
  request: ConvertRequest,
  io: PanoIO,
  logger: Logger = silentLogger,
): Promise<ConvertResult> {
  const image = await runStage('load', logger, async () => {
    const loaded = await io.readGrayscale(request.inputPath, request.maxSize)
    assertSphericalShape(loaded)
    return loaded
  })

  const mask = await runStage('dither', logger, () => dither(image))

  const { previewPath } = request
  if (previewPath !== undefined) {
    await runStage('preview', logger, () => io.writeGrayscale(previewPath, maskToGrayscale(mask)))
  }

  const cloud = await runStage('project', logger, () =>
    projectToSphere(mask, {
      radius: request.radius,
      invert: request.invert,
      rotation: request.rotation,
      heightFilter: request.heightFilter,
      brightnessFilter: request.brightnessFilter,
      originalImage: image,
    }),
  )

  await runStage('serialize', logger, () =>
    io.writeText(
      request.outputPath,
      serializePointCloud(cloud, selectPointCloudFormat(request.outputPath)),
    ),
  )

  return { cloud, width: image.width, height: image.height }
}
