// Measurement type definitions and the default dataset
export * from './measurement/index.js'

// Durable settings
export * from './settings/domain.js'

// Errors
export * from './errors/index.js'
