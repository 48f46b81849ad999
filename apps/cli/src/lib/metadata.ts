import { InputNotFoundError } from '@pano2points/core'
import { panoramaMetadataSchema, type PanoramaMetadata } from '@pano2points/shared'
import { InvalidMetadataError } from './errors.js'
import type { PanoIO } from './image-io.js'

/** Read and validate a sidecar metadata file. */
export async function readMetadata(io: PanoIO, path: string): Promise<PanoramaMetadata> {
  if (!(await io.exists(path))) throw new InputNotFoundError(path)

  let raw: unknown
  try {
    raw = JSON.parse(await io.readText(path))
  } catch (err) {
    throw new InvalidMetadataError(path, [err instanceof Error ? err.message : String(err)])
  }

  const result = panoramaMetadataSchema.safeParse(raw)
  if (!result.success) {
    throw new InvalidMetadataError(
      path,
      result.error.issues.map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`),
    )
  }
  return result.data
}

/** Serialize a sidecar the way the downloader writes it: 2-space JSON. */
export function formatMetadata(metadata: PanoramaMetadata): string {
  return JSON.stringify(metadata, null, 2) + '\n'
}

export async function writeMetadata(io: PanoIO, path: string, metadata: PanoramaMetadata): Promise<void> {
  await io.writeText(path, [formatMetadata(metadata)])
}
