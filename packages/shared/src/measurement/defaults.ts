import { ArgbColor, DisplayOrder, MeasurementType, type MeasurementTypeIcon } from './domain.js'

// ============================================
// Planet Channels
// ============================================

interface PlanetChannel {
  readonly name: string
  readonly color: number
  readonly icon: MeasurementTypeIcon
}

// Ordered by distance from the sun, moon last
const PLANET_CHANNELS: ReadonlyArray<PlanetChannel> = [
  { name: 'Mercury', color: 0xff8d9094, icon: 'planet_mercury' },
  { name: 'Venus', color: 0xffe8c766, icon: 'planet_venus' },
  { name: 'Earth', color: 0xff4a90e2, icon: 'planet_earth' },
  { name: 'Mars', color: 0xffd94f3d, icon: 'planet_mars' },
  { name: 'Jupiter', color: 0xffd4a574, icon: 'planet_jupiter' },
  { name: 'Saturn', color: 0xffe8d4a1, icon: 'planet_saturn' },
  { name: 'Uranus', color: 0xff67c3c1, icon: 'planet_uranus' },
  { name: 'Neptune', color: 0xff4169e1, icon: 'planet_neptune' },
  { name: 'Pluto', color: 0xffc19a6b, icon: 'planet_pluto' },
  { name: 'Moon', color: 0xffb0b0b0, icon: 'planet_moon' },
]

const planetWeight = (channel: PlanetChannel, index: number): MeasurementType =>
  new MeasurementType({
    key: 'weight',
    name: channel.name,
    unit: 'kg',
    color: ArgbColor.make(channel.color),
    icon: channel.icon,
    displayOrder: DisplayOrder.make(index + 1),
    isPinned: true,
    isEnabled: true,
    isOnRightYAxis: true,
  })

// ============================================
// Default Dataset
// ============================================

/**
 * Measurement types written to storage on the first start of an install.
 *
 * The ten planet channels come first, each an independent "weight" channel
 * pinned to the dashboard. The classic body metrics follow, all disabled,
 * then the bookkeeping fields every measurement carries.
 *
 * Returns fresh instances on each call; the content never changes.
 */
export const buildDefaultMeasurementTypes = (): ReadonlyArray<MeasurementType> => [
  ...PLANET_CHANNELS.map(planetWeight),

  new MeasurementType({ key: 'bmi', unit: 'none', color: ArgbColor.make(0xffffca28), icon: 'bmi', isDerived: true, isEnabled: false }),
  new MeasurementType({ key: 'body_fat', unit: 'percent', color: ArgbColor.make(0xffef5350), icon: 'body_fat', isEnabled: false }),
  new MeasurementType({ key: 'water', unit: 'percent', color: ArgbColor.make(0xff29b6f6), icon: 'water', isEnabled: false }),
  new MeasurementType({ key: 'muscle', unit: 'percent', color: ArgbColor.make(0xff66bb6a), icon: 'muscle', isEnabled: false }),
  new MeasurementType({ key: 'lbm', unit: 'kg', color: ArgbColor.make(0xff4dbac0), icon: 'lbm', isEnabled: false }),
  new MeasurementType({ key: 'bone', unit: 'kg', color: ArgbColor.make(0xffbdbdbd), icon: 'bone', isEnabled: false }),
  new MeasurementType({ key: 'waist', unit: 'cm', color: ArgbColor.make(0xff78909c), icon: 'waist', isEnabled: false }),
  new MeasurementType({ key: 'whr', unit: 'none', color: ArgbColor.make(0xffffa726), icon: 'whr', isDerived: true, isEnabled: false }),
  new MeasurementType({ key: 'whtr', unit: 'none', color: ArgbColor.make(0xffff7043), icon: 'whtr', isDerived: true, isEnabled: false }),
  new MeasurementType({ key: 'hips', unit: 'cm', color: ArgbColor.make(0xff5c6bc0), icon: 'hips', isEnabled: false }),
  new MeasurementType({ key: 'visceral_fat', unit: 'none', color: ArgbColor.make(0xffd84315), icon: 'visceral_fat', isEnabled: false }),
  new MeasurementType({ key: 'chest', unit: 'cm', color: ArgbColor.make(0xff8e24aa), icon: 'chest', isEnabled: false }),
  new MeasurementType({ key: 'thigh', unit: 'cm', color: ArgbColor.make(0xffa1887f), icon: 'thigh', isEnabled: false }),
  new MeasurementType({ key: 'biceps', unit: 'cm', color: ArgbColor.make(0xffec407a), icon: 'biceps', isEnabled: false }),
  new MeasurementType({ key: 'neck', unit: 'cm', color: ArgbColor.make(0xffb0bec5), icon: 'neck', isEnabled: false }),
  new MeasurementType({ key: 'caliper_1', unit: 'cm', color: ArgbColor.make(0xfffff59d), icon: 'caliper1', isEnabled: false }),
  new MeasurementType({ key: 'caliper_2', unit: 'cm', color: ArgbColor.make(0xffffe082), icon: 'caliper2', isEnabled: false }),
  new MeasurementType({ key: 'caliper_3', unit: 'cm', color: ArgbColor.make(0xffffcc80), icon: 'caliper3', isEnabled: false }),
  new MeasurementType({ key: 'caliper', unit: 'percent', color: ArgbColor.make(0xfffb8c00), icon: 'fat_caliper', isDerived: true, isEnabled: false }),
  new MeasurementType({ key: 'bmr', unit: 'kcal', color: ArgbColor.make(0xffab47bc), icon: 'bmr', isDerived: true, isEnabled: false }),
  new MeasurementType({ key: 'tdee', unit: 'kcal', color: ArgbColor.make(0xff26a69a), icon: 'tdee', isDerived: true, isEnabled: false }),
  new MeasurementType({ key: 'calories', unit: 'kcal', color: ArgbColor.make(0xff4caf50), icon: 'calories', isEnabled: false }),

  new MeasurementType({ key: 'comment', inputType: 'text', unit: 'none', color: ArgbColor.make(0xffe0e0e0), icon: 'comment', isPinned: true, isEnabled: true }),
  new MeasurementType({ key: 'date', inputType: 'date', unit: 'none', color: ArgbColor.make(0xff9e9e9e), icon: 'date', isEnabled: true }),
  new MeasurementType({ key: 'time', inputType: 'time', unit: 'none', color: ArgbColor.make(0xff757575), icon: 'time', isEnabled: true }),
  new MeasurementType({ key: 'user', inputType: 'user', unit: 'none', color: ArgbColor.make(0xff90a4ae), icon: 'user', isEnabled: true }),
]
