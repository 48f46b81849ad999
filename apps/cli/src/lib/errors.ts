import { PanoError } from '@pano2points/core'

/** Command-line arguments failed validation. */
export class InvalidOptionsError extends PanoError {
  constructor(public readonly issues: string[]) {
    super(`Invalid options: ${issues.join('; ')}`)
    this.name = 'InvalidOptionsError'
  }
}

/** A sidecar metadata file is unreadable or fails validation. */
export class InvalidMetadataError extends PanoError {
  constructor(
    public readonly path: string,
    public readonly issues: string[],
  ) {
    super(`Invalid panorama metadata in ${path}: ${issues.join('; ')}`)
    this.name = 'InvalidMetadataError'
  }
}
