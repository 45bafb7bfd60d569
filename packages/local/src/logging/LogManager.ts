/**
 * LogManager - Managed log channel with optional file output
 *
 * Before init() every message goes to the fallback channel (the runtime
 * logger, annotated channel=fallback). After init() messages go to the
 * managed channel and, with file logging enabled, are appended to
 * logs/orbitscale.log. Callers may log at any time from any fiber.
 */
import { FileSystem, Path } from '@effect/platform'
import { NodeContext } from '@effect/platform-node'
import { Cause, Clock, Context, Effect, Layer, LogLevel, Option, Ref } from 'effect'
import { dataDirectory, LOG_DIRECTORY } from '../config.js'

export const LOG_FILE = 'orbitscale.log'

// ============================================
// State
// ============================================

export type LogChannel = 'fallback' | 'managed'

type LogState =
  | { readonly _tag: 'Uninitialized' }
  | { readonly _tag: 'Ready'; readonly logFile: Option.Option<string> }

export interface LogManagerInitOptions {
  readonly fileLoggingEnabled: boolean
}

// ============================================
// Service Interface
// ============================================

export interface LogManagerService {
  /** Switch to the managed channel; calling again replaces the configuration */
  readonly init: (options: LogManagerInitOptions) => Effect.Effect<void>
  readonly isReady: () => Effect.Effect<boolean>
  /** Path of the active log file, if file logging is on */
  readonly logFile: () => Effect.Effect<Option.Option<string>>
  readonly debug: (tag: string, message: string) => Effect.Effect<void>
  readonly info: (tag: string, message: string) => Effect.Effect<void>
  readonly warn: (tag: string, message: string) => Effect.Effect<void>
  readonly error: (tag: string, message: string, error?: unknown) => Effect.Effect<void>
}

export class LogManager extends Context.Tag('@orbitscale/local/LogManager')<LogManager, LogManagerService>() {
  /** Log files go into the given directory */
  static readonly layerAt = (logDirectory: string) => Layer.effect(LogManager, makeLogManager(logDirectory))

  static readonly layer = Layer.unwrapEffect(
    Effect.gen(function* () {
      const path = yield* Path.Path
      const directory = yield* dataDirectory
      return LogManager.layerAt(path.join(directory, LOG_DIRECTORY))
    }),
  )

  static readonly Default = LogManager.layer.pipe(Layer.provide(NodeContext.layer))
}

// ============================================
// Formatting
// ============================================

/**
 * One log file line: "<ISO time> <LEVEL> <tag>: <message>",
 * followed by the pretty-printed cause when there is one.
 */
export const formatLogLine = (
  timestamp: number,
  level: LogLevel.LogLevel,
  tag: string,
  message: string,
  cause: Cause.Cause<unknown>,
): string => {
  const line = `${new Date(timestamp).toISOString()} ${level.label} ${tag}: ${message}`
  return Cause.isEmpty(cause) ? `${line}\n` : `${line}\n${Cause.pretty(cause)}\n`
}

// ============================================
// Service Implementation
// ============================================

const makeLogManager = (logDirectory: string) =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem
    const path = yield* Path.Path

    const state = yield* Ref.make<LogState>({ _tag: 'Uninitialized' })
    // Keeps appended lines whole when fibers log concurrently
    const fileLock = yield* Effect.makeSemaphore(1)

    const toChannel = (
      channel: LogChannel,
      level: LogLevel.LogLevel,
      tag: string,
      message: string,
      cause: Cause.Cause<unknown>,
    ) => Effect.logWithLevel(level, message, cause).pipe(Effect.annotateLogs({ tag, channel }))

    const append = (file: string, line: string) =>
      fs.writeFileString(file, line, { flag: 'a' }).pipe(
        fileLock.withPermits(1),
        Effect.catchAll((error) =>
          toChannel('fallback', LogLevel.Warning, 'LogManager', `Failed to append to ${file}`, Cause.fail(error)),
        ),
      )

    const emit = (level: LogLevel.LogLevel, tag: string, message: string, cause: Cause.Cause<unknown>) =>
      Effect.gen(function* () {
        const current = yield* Ref.get(state)
        if (current._tag === 'Uninitialized') {
          return yield* toChannel('fallback', level, tag, message, cause)
        }
        yield* toChannel('managed', level, tag, message, cause)
        if (Option.isSome(current.logFile)) {
          const now = yield* Clock.currentTimeMillis
          yield* append(current.logFile.value, formatLogLine(now, level, tag, message, cause))
        }
      })

    const prepareLogFile = Effect.gen(function* () {
      yield* fs.makeDirectory(logDirectory, { recursive: true })
      return Option.some(path.join(logDirectory, LOG_FILE))
    }).pipe(
      Effect.catchAll((error) =>
        toChannel(
          'fallback',
          LogLevel.Warning,
          'LogManager',
          'File logging unavailable, continuing without a log file',
          Cause.fail(error),
        ).pipe(Effect.as(Option.none<string>())),
      ),
    )

    const init = (options: LogManagerInitOptions) =>
      Effect.gen(function* () {
        const logFile = options.fileLoggingEnabled ? yield* prepareLogFile : Option.none<string>()
        yield* Ref.set(state, { _tag: 'Ready', logFile })
      })

    return LogManager.of({
      init,
      isReady: () => Ref.get(state).pipe(Effect.map((current) => current._tag === 'Ready')),
      logFile: () =>
        Ref.get(state).pipe(
          Effect.map((current) => (current._tag === 'Ready' ? current.logFile : Option.none<string>())),
        ),
      debug: (tag, message) => emit(LogLevel.Debug, tag, message, Cause.empty),
      info: (tag, message) => emit(LogLevel.Info, tag, message, Cause.empty),
      warn: (tag, message) => emit(LogLevel.Warning, tag, message, Cause.empty),
      error: (tag, message, error) =>
        emit(LogLevel.Error, tag, message, error === undefined ? Cause.empty : Cause.fail(error)),
    })
  })
