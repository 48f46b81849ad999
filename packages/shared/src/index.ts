// Schemas shared by the CLI commands: option validation and sidecar metadata.
export * from './schemas/index.js'
