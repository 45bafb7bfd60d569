import { Schema } from 'effect'
import { SettingKey } from '../settings/domain.js'

// ============================================
// Settings Errors
// ============================================

/**
 * Settings file could not be read or did not decode.
 */
export class SettingsReadError extends Schema.TaggedError<SettingsReadError>()('SettingsReadError', {
  key: SettingKey,
  cause: Schema.Defect,
}) {}

/**
 * Settings file could not be written.
 */
export class SettingsWriteError extends Schema.TaggedError<SettingsWriteError>()('SettingsWriteError', {
  key: SettingKey,
  cause: Schema.Defect,
}) {}

// ============================================
// Measurement Type Errors
// ============================================

export class MeasurementTypeDatabaseError extends Schema.TaggedError<MeasurementTypeDatabaseError>()(
  'MeasurementTypeDatabaseError',
  {
    operation: Schema.Literal('insert', 'query'),
    cause: Schema.Defect,
  },
) {}

// ============================================
// Union Types for Convenience
// ============================================

export const SettingsError = Schema.Union(SettingsReadError, SettingsWriteError)
export type SettingsError = typeof SettingsError.Type
