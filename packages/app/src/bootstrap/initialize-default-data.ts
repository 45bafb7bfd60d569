import { buildDefaultMeasurementTypes } from '@orbitscale/shared'
import { LogManager, MeasurementTypeStore, SettingsStore } from '@orbitscale/local'
import { Cause, Effect } from 'effect'
import { SeedOutcome, type SeedStage } from './outcome.js'

const TAG = 'AppBootstrap'

/**
 * Write the default measurement types on the first start of an install.
 *
 * The first start flag is cleared only after the insert has succeeded, so
 * an interrupted or failed seed leaves the flag set and is retried on the
 * next start. Every failure is logged and returned as a Failed outcome;
 * the effect itself never fails.
 */
export const initializeDefaultData: Effect.Effect<
  SeedOutcome,
  never,
  SettingsStore | MeasurementTypeStore | LogManager
> = Effect.gen(function* () {
  const settings = yield* SettingsStore
  const store = yield* MeasurementTypeStore
  const logs = yield* LogManager

  const failed = (stage: SeedStage, message: string, error: unknown) =>
    logs.error(TAG, message, error).pipe(Effect.as(SeedOutcome.failed(stage, message)))

  const seed = Effect.gen(function* () {
    const isFirstAppStart = yield* settings.isFirstAppStart()
    yield* logs.debug(TAG, `Checking for first app start. isFirstAppStart: ${isFirstAppStart}`)

    if (!isFirstAppStart) {
      yield* logs.debug(TAG, 'Not the first app start. Default data should already exist.')
      return SeedOutcome.alreadySeeded()
    }

    yield* logs.info(TAG, 'First app start detected. Inserting default measurement types...')
    const defaults = buildDefaultMeasurementTypes()
    yield* store.insertAll(defaults)
    yield* settings.setFirstAppStart(false)
    yield* logs.info(TAG, 'Default measurement types inserted and first start marked as completed.')
    return SeedOutcome.seeded(defaults.length)
  })

  return yield* seed.pipe(
    Effect.catchTags({
      SettingsReadError: (error) => failed('read_flag', 'Could not read the first start flag', error),
      MeasurementTypeDatabaseError: (error) =>
        failed('seed_write', 'Inserting default measurement types failed, first start flag left set', error),
      SettingsWriteError: (error) =>
        failed('flag_write', 'Default measurement types inserted but the first start flag was not cleared', error),
    }),
    Effect.catchAllCause((cause) =>
      failed('unexpected', 'Error during first-start data initialization', Cause.squash(cause)),
    ),
  )
})
