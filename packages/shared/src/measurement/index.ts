export * from './domain.js'
export * from './defaults.js'
export * from './ordering.js'
