/**
 * MeasurementTypeStore - Local SQLite storage for measurement type definitions
 *
 * - Schema is applied lazily on first use, so an unreadable database
 *   surfaces as a MeasurementTypeDatabaseError instead of a startup crash
 * - insertAll runs in one transaction and ignores rows whose key and name
 *   already exist, which makes repeated seeding a no-op
 */
import { FileSystem, Path } from '@effect/platform'
import { NodeContext } from '@effect/platform-node'
import { SqlClient } from '@effect/sql'
import { SqliteClient } from '@effect/sql-sqlite-node'
import {
  ArgbColor,
  DisplayOrder,
  InputFieldType,
  type MeasurementType,
  MeasurementTypeDatabaseError,
  MeasurementTypeIcon,
  MeasurementTypeId,
  MeasurementTypeKey,
  StoredMeasurementType,
  UnitType,
} from '@orbitscale/shared'
import { Cause, Context, Effect, Layer, Ref, Schema } from 'effect'
import { DATABASE_FILE, dataDirectory } from '../config.js'

// ============================================
// Database Row Schema
// ============================================

const MeasurementTypeRow = Schema.Struct({
  id: Schema.Number,
  key: MeasurementTypeKey,
  name: Schema.NullOr(Schema.String),
  unit: UnitType,
  color: Schema.Number,
  icon: MeasurementTypeIcon,
  input_type: InputFieldType,
  display_order: Schema.Number,
  is_derived: Schema.Number,
  is_pinned: Schema.Number,
  is_enabled: Schema.Number,
  is_on_right_y_axis: Schema.Number,
})

const decodeRow = Schema.decodeUnknown(MeasurementTypeRow)

const rowToDomain = (row: typeof MeasurementTypeRow.Type): StoredMeasurementType =>
  new StoredMeasurementType({
    id: MeasurementTypeId.make(row.id),
    key: row.key,
    name: row.name,
    unit: row.unit,
    color: ArgbColor.make(row.color),
    icon: row.icon,
    inputType: row.input_type,
    displayOrder: DisplayOrder.make(row.display_order),
    isDerived: row.is_derived === 1,
    isPinned: row.is_pinned === 1,
    isEnabled: row.is_enabled === 1,
    isOnRightYAxis: row.is_on_right_y_axis === 1,
  })

const decodeAndTransform = (raw: unknown) => Effect.map(decodeRow(raw), rowToDomain)

const toFlag = (value: boolean) => (value ? 1 : 0)

// ============================================
// Service Interface
// ============================================

export interface MeasurementTypeStoreService {
  /** Insert all definitions as one logical write */
  readonly insertAll: (types: ReadonlyArray<MeasurementType>) => Effect.Effect<void, MeasurementTypeDatabaseError>
  /** All stored definitions ordered by display order, then insertion order */
  readonly getAll: () => Effect.Effect<ReadonlyArray<StoredMeasurementType>, MeasurementTypeDatabaseError>
  readonly count: () => Effect.Effect<number, MeasurementTypeDatabaseError>
}

// The SQLite client throws while opening, so the failure arrives as a defect
const orUnavailable = <E, R>(
  layer: Layer.Layer<MeasurementTypeStore, E, R>,
): Layer.Layer<MeasurementTypeStore, never, R> =>
  layer.pipe(
    Layer.catchAllCause((cause) =>
      Layer.unwrapEffect(
        Effect.logError('Measurement type database unavailable', cause).pipe(
          Effect.as(MeasurementTypeStore.unavailable(Cause.squash(cause))),
        ),
      ),
    ),
  )

export class MeasurementTypeStore extends Context.Tag('@orbitscale/local/MeasurementTypeStore')<
  MeasurementTypeStore,
  MeasurementTypeStoreService
>() {
  /**
   * Create layer with provided SqlClient.
   * Use this for custom SqlClient configurations (e.g., in-memory for tests).
   */
  static readonly layer = Layer.effect(
    MeasurementTypeStore,
    Effect.gen(function* () {
      const sql = yield* SqlClient.SqlClient
      const fs = yield* FileSystem.FileSystem
      const path = yield* Path.Path
      return yield* makeMeasurementTypeStore(sql, fs, path)
    }),
  )

  /**
   * File-based SQLite at the given path. A database that cannot be opened
   * is logged and replaced by `unavailable`, so building this layer never fails.
   */
  static readonly fileAt = (filename: string) =>
    orUnavailable(MeasurementTypeStore.layer.pipe(Layer.provide(SqliteClient.layer({ filename }))))

  /**
   * Default layer with file-based SQLite inside the data directory.
   */
  static readonly Default = orUnavailable(
    Layer.unwrapEffect(
      Effect.gen(function* () {
        const fs = yield* FileSystem.FileSystem
        const path = yield* Path.Path
        const directory = yield* dataDirectory

        yield* fs.makeDirectory(directory, { recursive: true })

        return MeasurementTypeStore.fileAt(path.join(directory, DATABASE_FILE))
      }),
    ),
  ).pipe(Layer.provide(NodeContext.layer))

  /**
   * Store whose every operation fails with the given cause.
   * Stands in when the database cannot be opened at all.
   */
  static readonly unavailable = (cause: unknown) =>
    Layer.succeed(
      MeasurementTypeStore,
      MeasurementTypeStore.of({
        insertAll: () => Effect.fail(new MeasurementTypeDatabaseError({ operation: 'insert', cause })),
        getAll: () => Effect.fail(new MeasurementTypeDatabaseError({ operation: 'query', cause })),
        count: () => Effect.fail(new MeasurementTypeDatabaseError({ operation: 'query', cause })),
      }),
    )
}

// ============================================
// Schema Initialization
// ============================================

// Every statement is IF NOT EXISTS, so a schema left half-applied is completed here
const initializeSchema = (sql: SqlClient.SqlClient, fs: FileSystem.FileSystem, path: Path.Path) =>
  Effect.gen(function* () {
    const schemaPath = yield* path.fromFileUrl(new URL('../db/schema.sql', import.meta.url))
    const schemaSql = yield* fs.readFileString(schemaPath)

    // Remove comment lines and split by semicolon
    const statements = schemaSql
      .split('\n')
      .filter((line) => !line.trim().startsWith('--'))
      .join('\n')
      .split(';')
      .map((s) => s.trim())
      .filter((s) => s.length > 0)

    yield* sql.withTransaction(Effect.forEach(statements, (statement) => sql.unsafe(statement), { discard: true }))

    yield* Effect.logDebug('MeasurementTypeStore: Schema applied')
  })

// ============================================
// Service Implementation
// ============================================

const makeMeasurementTypeStore = (sql: SqlClient.SqlClient, fs: FileSystem.FileSystem, path: Path.Path) =>
  Effect.gen(function* () {
    const schemaReady = yield* Ref.make(false)
    const schemaLock = yield* Effect.makeSemaphore(1)

    // Retried on the next operation if it fails
    const ensureSchema = Effect.gen(function* () {
      if (yield* Ref.get(schemaReady)) {
        return
      }
      yield* initializeSchema(sql, fs, path)
      yield* Ref.set(schemaReady, true)
    }).pipe(schemaLock.withPermits(1))

    const insertRow = (type: MeasurementType) => sql`
      INSERT OR IGNORE INTO measurement_types (
        key, name, unit, color, icon, input_type, display_order,
        is_derived, is_pinned, is_enabled, is_on_right_y_axis
      )
      VALUES (
        ${type.key}, ${type.name}, ${type.unit}, ${type.color}, ${type.icon}, ${type.inputType}, ${type.displayOrder},
        ${toFlag(type.isDerived)}, ${toFlag(type.isPinned)}, ${toFlag(type.isEnabled)}, ${toFlag(type.isOnRightYAxis)}
      )
    `

    const insertAll = (types: ReadonlyArray<MeasurementType>) =>
      Effect.gen(function* () {
        yield* ensureSchema
        yield* sql.withTransaction(Effect.forEach(types, insertRow, { discard: true }))
      }).pipe(Effect.mapError((cause) => new MeasurementTypeDatabaseError({ operation: 'insert', cause })))

    const getAll = () =>
      Effect.gen(function* () {
        yield* ensureSchema
        const rows = yield* sql`
          SELECT id, key, name, unit, color, icon, input_type, display_order,
                 is_derived, is_pinned, is_enabled, is_on_right_y_axis
          FROM measurement_types
          ORDER BY display_order ASC, id ASC
        `
        return yield* Effect.forEach(rows, decodeAndTransform)
      }).pipe(Effect.mapError((cause) => new MeasurementTypeDatabaseError({ operation: 'query', cause })))

    const count = () =>
      Effect.gen(function* () {
        yield* ensureSchema
        const rows = yield* sql<{ total: number }>`SELECT COUNT(*) AS total FROM measurement_types`
        return rows.length > 0 ? rows[0].total : 0
      }).pipe(Effect.mapError((cause) => new MeasurementTypeDatabaseError({ operation: 'query', cause })))

    return MeasurementTypeStore.of({ insertAll, getAll, count })
  })
