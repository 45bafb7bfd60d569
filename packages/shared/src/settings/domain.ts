import { Schema } from 'effect'

// ============================================
// Settings Keys
// ============================================

/**
 * Durable application settings.
 * - "is_first_app_start": true until the default dataset has been written once
 * - "is_file_logging_enabled": mirror managed log output into a file
 */
export const SettingKey = Schema.Literal('is_first_app_start', 'is_file_logging_enabled')
export type SettingKey = typeof SettingKey.Type

// ============================================
// Stored Representation
// ============================================

// settings.json content; absent keys fall back to DEFAULT_SETTINGS
export const SettingsJson = Schema.Struct({
  is_first_app_start: Schema.optional(Schema.Boolean),
  is_file_logging_enabled: Schema.optional(Schema.Boolean),
})
export type SettingsJson = typeof SettingsJson.Type

// ============================================
// Default Settings
// ============================================

export const DEFAULT_SETTINGS: { readonly [K in SettingKey]: boolean } = {
  is_first_app_start: true,
  is_file_logging_enabled: false,
}
