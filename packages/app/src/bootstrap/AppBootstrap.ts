/**
 * AppBootstrap - Startup coordination for the application shell
 *
 * start() forks two independent daemon fibers and returns at once:
 * - logging: read the file logging setting, initialize LogManager
 * - data: seed the default measurement types on first start
 *
 * Each fiber has its own failure boundary, so neither can take down the
 * other or the caller. start() is memoized per service instance: repeated
 * or concurrent calls share one launch.
 */
import { LogManager, MeasurementTypeStore, SettingsStore } from '@orbitscale/local'
import { Context, Effect, Fiber, Layer } from 'effect'
import { initializeDefaultData } from './initialize-default-data.js'
import { initializeLogging } from './initialize-logging.js'
import type { BootstrapReport, SeedOutcome } from './outcome.js'

// ============================================
// Handle
// ============================================

export interface BootstrapHandle {
  readonly logging: Fiber.RuntimeFiber<boolean>
  readonly data: Fiber.RuntimeFiber<SeedOutcome>
  /** Waits for both tasks; never fails */
  readonly completion: Effect.Effect<BootstrapReport>
}

// ============================================
// Service
// ============================================

export interface AppBootstrapService {
  readonly start: () => Effect.Effect<BootstrapHandle>
}

export class AppBootstrap extends Context.Tag('@orbitscale/app/AppBootstrap')<AppBootstrap, AppBootstrapService>() {
  static readonly layer = Layer.effect(
    AppBootstrap,
    Effect.gen(function* () {
      const context = yield* Effect.context<SettingsStore | MeasurementTypeStore | LogManager>()

      const launch = Effect.gen(function* () {
        const logging = yield* Effect.forkDaemon(initializeLogging)
        const data = yield* Effect.forkDaemon(initializeDefaultData)

        return {
          logging,
          data,
          completion: Effect.all({ fileLoggingEnabled: Fiber.join(logging), seed: Fiber.join(data) }),
        } satisfies BootstrapHandle
      }).pipe(Effect.provide(context))

      const start = yield* Effect.cached(launch)

      return AppBootstrap.of({ start: () => start })
    }),
  )
}
