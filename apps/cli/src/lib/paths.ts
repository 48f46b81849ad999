import { basename, dirname, extname, join } from 'node:path'

/** Swap the last extension of `path` (or append one if it has none). */
export function replaceExtension(path: string, ext: string): string {
  const stem = basename(path, extname(path))
  return join(dirname(path), stem + ext)
}

/** `<input-dir>/<input-stem>.ply`. */
export function defaultOutputPath(input: string): string {
  return replaceExtension(input, '.ply')
}

/** `<output-dir>/<output-stem>_dithered.png`. */
export function defaultPreviewPath(output: string): string {
  const stem = basename(output, extname(output))
  return join(dirname(output), `${stem}_dithered.png`)
}

/** `<input-dir>/<input-stem>_leveled<input-ext>`. */
export function defaultLeveledPath(input: string): string {
  const ext = extname(input)
  return join(dirname(input), `${basename(input, ext)}_leveled${ext}`)
}

/** Sidecar metadata lives beside the image with a `.json` extension. */
export function sidecarPath(image: string): string {
  return replaceExtension(image, '.json')
}
