export { AppBootstrap, type AppBootstrapService, type BootstrapHandle } from './bootstrap/AppBootstrap.js'
export { initializeDefaultData } from './bootstrap/initialize-default-data.js'
export { initializeLogging } from './bootstrap/initialize-logging.js'
export { type BootstrapReport, SeedOutcome, type SeedStage } from './bootstrap/outcome.js'
