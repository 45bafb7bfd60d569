/**
 * AppBootstrap against the real local stores in a temp directory.
 * Each launch builds fresh layers, as a process restart would.
 */
import { FileSystem, Path } from '@effect/platform'
import { NodeContext } from '@effect/platform-node'
import { describe, expect, it } from '@effect/vitest'
import { LogManager, MeasurementTypeStore, SettingsStore } from '@orbitscale/local'
import { captureLogs } from '@orbitscale/local/testing'
import { Effect, Layer } from 'effect'
import { AppBootstrap } from '../src/bootstrap/AppBootstrap.js'
import { SeedOutcome } from '../src/bootstrap/outcome.js'

const localLayer = (directory: string) =>
  Layer.unwrapEffect(
    Effect.gen(function* () {
      const path = yield* Path.Path
      const stores = Layer.mergeAll(
        SettingsStore.layerAt(directory),
        MeasurementTypeStore.fileAt(path.join(directory, 'orbitscale.db')),
        LogManager.layerAt(path.join(directory, 'logs')),
      )
      return AppBootstrap.layer.pipe(Layer.provideMerge(stores))
    }),
  )

const startAndWait = Effect.gen(function* () {
  const bootstrap = yield* AppBootstrap
  const handle = yield* bootstrap.start()
  return yield* handle.completion
})

/** One process lifetime: start, wait for both tasks, read back the store */
const launch = (directory: string) =>
  Effect.gen(function* () {
    const report = yield* startAndWait
    const count = yield* Effect.flatMap(MeasurementTypeStore, (store) => store.count())
    return { report, count }
  }).pipe(Effect.provide(localLayer(directory)))

describe('AppBootstrap on local stores', () => {
  it.scoped('seeds a fresh install once and skips on the next launch', () =>
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem
      const path = yield* Path.Path
      const directory = yield* fs.makeTempDirectoryScoped()

      const first = yield* launch(directory)

      expect(first.report).toEqual({ fileLoggingEnabled: false, seed: SeedOutcome.seeded(36) })
      expect(first.count).toBe(36)
      const settings: unknown = JSON.parse(yield* fs.readFileString(path.join(directory, 'settings.json')))
      expect(settings).toEqual({ is_first_app_start: false })

      const second = yield* launch(directory)

      expect(second.report).toEqual({ fileLoggingEnabled: false, seed: SeedOutcome.alreadySeeded() })
      expect(second.count).toBe(36)
      expect(yield* fs.exists(path.join(directory, 'logs', 'orbitscale.log'))).toBe(false)
    }).pipe(Effect.provide(Layer.merge(NodeContext.layer, captureLogs([])))),
  )

  it.scoped('reseeds without duplicates when the flag was never cleared', () =>
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem
      const path = yield* Path.Path
      const directory = yield* fs.makeTempDirectoryScoped()

      yield* launch(directory)
      // a crash between the insert and the flag write looks like this
      yield* fs.writeFileString(path.join(directory, 'settings.json'), JSON.stringify({ is_first_app_start: true }))

      const retried = yield* launch(directory)

      expect(retried.report.seed).toEqual(SeedOutcome.seeded(36))
      expect(retried.count).toBe(36)
    }).pipe(Effect.provide(Layer.merge(NodeContext.layer, captureLogs([])))),
  )

  it.scoped('reports a failed seed and keeps the flag when the database cannot be opened', () =>
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem
      const path = yield* Path.Path
      const directory = yield* fs.makeTempDirectoryScoped()
      yield* fs.makeDirectory(path.join(directory, 'orbitscale.db'))

      const report = yield* startAndWait.pipe(Effect.provide(localLayer(directory)))

      expect(report).toEqual({
        fileLoggingEnabled: false,
        seed: SeedOutcome.failed('seed_write', 'Inserting default measurement types failed, first start flag left set'),
      })
      expect(yield* fs.exists(path.join(directory, 'settings.json'))).toBe(false)
    }).pipe(Effect.provide(Layer.merge(NodeContext.layer, captureLogs([])))),
  )

  it.scoped('writes bootstrap messages to the log file when file logging is enabled', () =>
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem
      const path = yield* Path.Path
      const directory = yield* fs.makeTempDirectoryScoped()
      yield* fs.writeFileString(
        path.join(directory, 'settings.json'),
        JSON.stringify({ is_file_logging_enabled: true }),
      )

      const { report } = yield* launch(directory)

      expect(report.fileLoggingEnabled).toBe(true)
      const lines = (yield* fs.readFileString(path.join(directory, 'logs', 'orbitscale.log'))).split('\n')
      expect(lines).toContain('1970-01-01T00:00:00.000Z INFO AppBootstrap: LogManager initialized. File logging enabled: true')
    }).pipe(Effect.provide(Layer.merge(NodeContext.layer, captureLogs([])))),
  )
})
