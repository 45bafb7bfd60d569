import { Schema } from 'effect'

// ============================================
// Measurement Type Primitives
// ============================================

/**
 * Semantic category of a measurement channel.
 * Several definitions may share a key (the planet channels all use "weight").
 */
export const MeasurementTypeKey = Schema.Literal(
  'weight',
  'bmi',
  'body_fat',
  'water',
  'muscle',
  'lbm',
  'bone',
  'waist',
  'whr',
  'whtr',
  'hips',
  'visceral_fat',
  'chest',
  'thigh',
  'biceps',
  'neck',
  'caliper_1',
  'caliper_2',
  'caliper_3',
  'caliper',
  'bmr',
  'tdee',
  'calories',
  'comment',
  'date',
  'time',
  'user',
  'custom',
)
export type MeasurementTypeKey = typeof MeasurementTypeKey.Type

/** Unit a value of the type is recorded in */
export const UnitType = Schema.Literal('kg', 'lb', 'st', 'percent', 'cm', 'inch', 'kcal', 'none')
export type UnitType = typeof UnitType.Type

/** How a value is entered and rendered */
export const InputFieldType = Schema.Literal('float', 'int', 'text', 'date', 'time', 'user')
export type InputFieldType = typeof InputFieldType.Type

/** Icon reference, resolved by the UI layer */
export const MeasurementTypeIcon = Schema.Literal(
  'default',
  'planet_mercury',
  'planet_venus',
  'planet_earth',
  'planet_mars',
  'planet_jupiter',
  'planet_saturn',
  'planet_uranus',
  'planet_neptune',
  'planet_pluto',
  'planet_moon',
  'bmi',
  'body_fat',
  'water',
  'muscle',
  'lbm',
  'bone',
  'waist',
  'whr',
  'whtr',
  'hips',
  'visceral_fat',
  'chest',
  'thigh',
  'biceps',
  'neck',
  'caliper1',
  'caliper2',
  'caliper3',
  'fat_caliper',
  'bmr',
  'tdee',
  'calories',
  'comment',
  'date',
  'time',
  'user',
)
export type MeasurementTypeIcon = typeof MeasurementTypeIcon.Type

/** Packed 0xAARRGGBB display color */
export const ArgbColor = Schema.Number.pipe(
  Schema.int(),
  Schema.between(0, 0xffffffff),
  Schema.brand('ArgbColor'),
)
export type ArgbColor = typeof ArgbColor.Type

/** Sort position among enabled and pinned entries */
export const DisplayOrder = Schema.Number.pipe(Schema.int(), Schema.nonNegative(), Schema.brand('DisplayOrder'))
export type DisplayOrder = typeof DisplayOrder.Type

/** Row identifier assigned by the measurement type store */
export const MeasurementTypeId = Schema.Number.pipe(Schema.int(), Schema.positive(), Schema.brand('MeasurementTypeId'))
export type MeasurementTypeId = typeof MeasurementTypeId.Type

// ============================================
// Measurement Type
// ============================================

/**
 * Configuration record describing one trackable quantity: what it is,
 * how it is displayed and how a value is entered.
 */
export class MeasurementType extends Schema.Class<MeasurementType>('MeasurementType')({
  key: MeasurementTypeKey,
  /** Display label; null means the default label for `key` */
  name: Schema.optionalWith(Schema.NullOr(Schema.String), { default: () => null }),
  unit: Schema.optionalWith(UnitType, { default: () => 'none' as const }),
  color: ArgbColor,
  icon: MeasurementTypeIcon,
  inputType: Schema.optionalWith(InputFieldType, { default: () => 'float' as const }),
  displayOrder: Schema.optionalWith(DisplayOrder, { default: () => DisplayOrder.make(0) }),
  isDerived: Schema.optionalWith(Schema.Boolean, { default: () => false }),
  isPinned: Schema.optionalWith(Schema.Boolean, { default: () => false }),
  isEnabled: Schema.optionalWith(Schema.Boolean, { default: () => true }),
  isOnRightYAxis: Schema.optionalWith(Schema.Boolean, { default: () => false }),
}) {}

/**
 * A measurement type as persisted, carrying its store-assigned id.
 */
export class StoredMeasurementType extends MeasurementType.extend<StoredMeasurementType>('StoredMeasurementType')({
  id: MeasurementTypeId,
}) {}
