import { LogManager, SettingsStore } from '@orbitscale/local'
import { Cause, Effect } from 'effect'

const TAG = 'AppBootstrap'

/**
 * Read the file logging setting and bring up the managed log channel.
 *
 * A failed read falls back to false and is reported on the runtime logger,
 * since the managed channel is not initialized yet. Never fails; returns
 * the value LogManager was initialized with.
 */
export const initializeLogging: Effect.Effect<boolean, never, SettingsStore | LogManager> = Effect.gen(function* () {
  const settings = yield* SettingsStore
  const logs = yield* LogManager

  const fileLoggingEnabled = yield* settings.isFileLoggingEnabled().pipe(
    Effect.catchAll((error) =>
      Effect.logError('Failed to retrieve isFileLoggingEnabled setting', Cause.fail(error)).pipe(
        Effect.annotateLogs({ tag: TAG, channel: 'fallback' }),
        Effect.as(false),
      ),
    ),
  )

  yield* logs.init({ fileLoggingEnabled })
  yield* logs.info(TAG, `LogManager initialized. File logging enabled: ${fileLoggingEnabled}`)
  return fileLoggingEnabled
}).pipe(
  Effect.catchAllCause((cause) =>
    Effect.logError('Logging initialization failed', cause).pipe(
      Effect.annotateLogs({ tag: TAG, channel: 'fallback' }),
      Effect.as(false),
    ),
  ),
)
