import { FileSystem, Path } from '@effect/platform'
import { NodeContext } from '@effect/platform-node'
import {
  DEFAULT_SETTINGS,
  type SettingKey,
  SettingsJson,
  SettingsReadError,
  SettingsWriteError,
} from '@orbitscale/shared'
import { Cause, Context, Effect, Layer, Schema } from 'effect'
import { dataDirectory, SETTINGS_FILE } from '../config.js'

const decodeSettings = Schema.decodeUnknown(Schema.parseJson(SettingsJson))

const EMPTY_SETTINGS: SettingsJson = {}

export interface SettingsStoreService {
  /** Read a setting, falling back to its default when unset */
  readonly get: (key: SettingKey) => Effect.Effect<boolean, SettingsReadError>
  /** Persist a setting, keeping the others as they are */
  readonly set: (key: SettingKey, value: boolean) => Effect.Effect<void, SettingsWriteError>
  readonly isFirstAppStart: () => Effect.Effect<boolean, SettingsReadError>
  readonly isFileLoggingEnabled: () => Effect.Effect<boolean, SettingsReadError>
  readonly setFirstAppStart: (value: boolean) => Effect.Effect<void, SettingsWriteError>
  readonly setFileLoggingEnabled: (enabled: boolean) => Effect.Effect<void, SettingsWriteError>
}

export class SettingsStore extends Context.Tag('@orbitscale/local/SettingsStore')<
  SettingsStore,
  SettingsStoreService
>() {
  /** Settings file inside the given directory */
  static readonly layerAt = (directory: string) => Layer.effect(SettingsStore, makeSettingsStore(directory))

  /** Settings file inside the configured data directory */
  static readonly layer = Layer.unwrapEffect(Effect.map(dataDirectory, (directory) => SettingsStore.layerAt(directory)))

  static readonly Default = SettingsStore.layer.pipe(Layer.provide(NodeContext.layer))
}

const makeSettingsStore = (directory: string) =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem
    const path = yield* Path.Path

    const settingsPath = path.join(directory, SETTINGS_FILE)
    const tempPath = `${settingsPath}.tmp`

    // Read-modify-write must not interleave within the process
    const writeLock = yield* Effect.makeSemaphore(1)

    const readSettings = Effect.gen(function* () {
      const exists = yield* fs.exists(settingsPath)
      if (!exists) {
        return EMPTY_SETTINGS
      }
      const content = yield* fs.readFileString(settingsPath)
      return yield* decodeSettings(content)
    })

    const writeSettings = (settings: SettingsJson) =>
      Effect.gen(function* () {
        yield* fs.makeDirectory(directory, { recursive: true })
        yield* fs.writeFileString(tempPath, JSON.stringify(settings, null, 2))
        // rename replaces the old file in one step
        yield* fs.rename(tempPath, settingsPath)
      })

    const get = (key: SettingKey) =>
      readSettings.pipe(
        Effect.map((settings) => settings[key] ?? DEFAULT_SETTINGS[key]),
        Effect.mapError((cause) => new SettingsReadError({ key, cause })),
      )

    const set = (key: SettingKey, value: boolean) =>
      Effect.gen(function* () {
        const current = yield* readSettings.pipe(
          Effect.catchAll((cause) =>
            Effect.logWarning('Unreadable settings file, rewriting from defaults', Cause.fail(cause)).pipe(
              Effect.annotateLogs({ key }),
              Effect.as(EMPTY_SETTINGS),
            ),
          ),
        )
        const next: SettingsJson = { ...current, [key]: value }
        yield* writeSettings(next)
      }).pipe(
        writeLock.withPermits(1),
        Effect.mapError((cause) => new SettingsWriteError({ key, cause })),
      )

    return SettingsStore.of({
      get,
      set,
      isFirstAppStart: () => get('is_first_app_start'),
      isFileLoggingEnabled: () => get('is_file_logging_enabled'),
      setFirstAppStart: (value) => set('is_first_app_start', value),
      setFileLoggingEnabled: (enabled) => set('is_file_logging_enabled', enabled),
    })
  })
