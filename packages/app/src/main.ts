import { NodeRuntime } from '@effect/platform-node'
import { LogManager, MeasurementTypeStore, SettingsStore } from '@orbitscale/local'
import { Config, Effect, Layer, Logger, LogLevel } from 'effect'
import { AppBootstrap } from './bootstrap/AppBootstrap.js'

const AppLive = AppBootstrap.layer.pipe(
  Layer.provide(Layer.mergeAll(SettingsStore.Default, MeasurementTypeStore.Default, LogManager.Default)),
)

const MinimumLogLevel = Config.logLevel('ORBITSCALE_LOG_LEVEL').pipe(Config.withDefault(LogLevel.Info))

const program = Effect.gen(function* () {
  const bootstrap = yield* AppBootstrap

  const handle = yield* bootstrap.start()
  yield* Effect.logInfo('Startup returned, initialization continues in the background')

  // No host UI keeps this process alive; wait so the report is visible
  const report = yield* handle.completion
  yield* Effect.logInfo('Bootstrap finished').pipe(
    Effect.annotateLogs({ fileLoggingEnabled: report.fileLoggingEnabled, seed: report.seed._tag }),
  )
})

NodeRuntime.runMain(
  Effect.gen(function* () {
    const level = yield* MinimumLogLevel
    yield* program.pipe(Logger.withMinimumLogLevel(level))
  }).pipe(Effect.provide(AppLive), Effect.provide(Logger.logFmt)),
)
