// @orbitscale/local - Durable local state for the application shell
// Settings file, SQLite measurement type store and the managed log channel

export { dataDirectory, DATABASE_FILE, LOG_DIRECTORY, SETTINGS_FILE } from './config.js'
export { SettingsStore, type SettingsStoreService } from './services/SettingsStore.js'
export { MeasurementTypeStore, type MeasurementTypeStoreService } from './services/MeasurementTypeStore.js'
export {
  formatLogLine,
  LOG_FILE,
  type LogChannel,
  LogManager,
  type LogManagerInitOptions,
  type LogManagerService,
} from './logging/LogManager.js'
