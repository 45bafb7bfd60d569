import { Path } from '@effect/platform'
import { Config, Effect, Option } from 'effect'

// ============================================
// Data Directory
// ============================================

export const SETTINGS_FILE = 'settings.json'
export const DATABASE_FILE = 'orbitscale.db'
export const LOG_DIRECTORY = 'logs'

/**
 * Directory holding settings.json, the SQLite database and logs/.
 * ORBITSCALE_DATA_DIR overrides the default of ~/.orbitscale.
 */
export const dataDirectory = Effect.gen(function* () {
  const path = yield* Path.Path
  const configured = yield* Config.option(Config.string('ORBITSCALE_DATA_DIR'))
  return Option.getOrElse(configured, () => path.join(process.env.HOME ?? '~', '.orbitscale'))
})
