// ---------------------------------------------------------------------------
// Error types raised by the pipeline. All of them end the run.
// ---------------------------------------------------------------------------

/** Stages of a conversion run, in execution order. */
export type ConversionStage = 'load' | 'dither' | 'preview' | 'project' | 'serialize';

/** Base class so callers can tell pipeline errors from anything else. */
export class PanoError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PanoError';
  }
}

/** The source image does not exist. */
export class InputNotFoundError extends PanoError {
  constructor(public readonly path: string) {
    super(`Input file not found: ${path}`);
    this.name = 'InputNotFoundError';
  }
}

/** Raster too small for the angle mapping (it divides by height-1 and width-1). */
export class DegenerateImageError extends PanoError {
  constructor(
    public readonly width: number,
    public readonly height: number,
  ) {
    super(`Image must be at least 2x2 pixels for spherical mapping, got ${width}x${height}`);
    this.name = 'DegenerateImageError';
  }
}

/** Buffer length, channel count or shape does not match what a transform needs. */
export class InvalidRasterError extends PanoError {
  constructor(public readonly reason: string) {
    super(`Invalid raster: ${reason}`);
    this.name = 'InvalidRasterError';
  }
}

/** Wraps an unexpected failure with the stage it happened in. */
export class ConversionError extends PanoError {
  constructor(
    public readonly stage: ConversionStage,
    cause: unknown,
  ) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Conversion failed during ${stage}: ${detail}`, { cause });
    this.name = 'ConversionError';
  }
}
