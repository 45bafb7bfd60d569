import { describe, expect, it } from '@effect/vitest'
import { buildDefaultMeasurementTypes } from './defaults.js'
import { MeasurementType } from './domain.js'
import { enabledMeasurementTypes, pinnedMeasurementTypes, sortByDisplayOrder } from './ordering.js'

const PLANETS = ['Mercury', 'Venus', 'Earth', 'Mars', 'Jupiter', 'Saturn', 'Uranus', 'Neptune', 'Pluto', 'Moon']

describe('buildDefaultMeasurementTypes', () => {
  it('returns the same sequence on every call', () => {
    const first = buildDefaultMeasurementTypes()
    const second = buildDefaultMeasurementTypes()

    expect(second).toHaveLength(first.length)
    expect(second).toEqual(first)
    expect(second.map((type) => [type.key, type.name])).toEqual(first.map((type) => [type.key, type.name]))
  })

  it('returns fresh instances', () => {
    const first = buildDefaultMeasurementTypes()
    const second = buildDefaultMeasurementTypes()

    expect(second[0]).not.toBe(first[0])
  })

  it('contains 36 definitions', () => {
    expect(buildDefaultMeasurementTypes()).toHaveLength(36)
  })

  it('starts with the ten planet weight channels in order', () => {
    const planets = buildDefaultMeasurementTypes().slice(0, 10)

    expect(planets.map((type) => type.name)).toEqual(PLANETS)
    expect(planets.map((type) => type.displayOrder)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10])
    for (const planet of planets) {
      expect(planet.key).toBe('weight')
      expect(planet.unit).toBe('kg')
      expect(planet.isPinned).toBe(true)
      expect(planet.isEnabled).toBe(true)
      expect(planet.isOnRightYAxis).toBe(true)
      expect(planet.isDerived).toBe(false)
    }
  })

  it('keeps the Earth channel blue', () => {
    const earth = buildDefaultMeasurementTypes()[2]

    expect(earth.name).toBe('Earth')
    expect(earth.color).toBe(0xff4a90e2)
    expect(earth.icon).toBe('planet_earth')
  })

  it('disables every legacy body metric', () => {
    const legacy = buildDefaultMeasurementTypes().slice(10, 32)

    expect(legacy.map((type) => type.key)).toEqual([
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
    ])
    expect(legacy.every((type) => !type.isEnabled)).toBe(true)
    expect(legacy.every((type) => type.name === null)).toBe(true)
  })

  it('marks computed metrics as derived', () => {
    const derived = buildDefaultMeasurementTypes()
      .filter((type) => type.isDerived)
      .map((type) => type.key)

    expect(derived).toEqual(['bmi', 'whr', 'whtr', 'caliper', 'bmr', 'tdee'])
  })

  it('ends with the enabled bookkeeping fields', () => {
    const tail = buildDefaultMeasurementTypes().slice(32)

    expect(tail.map((type) => [type.key, type.inputType, type.isEnabled, type.isPinned])).toEqual([
      ['comment', 'text', true, true],
      ['date', 'date', true, false],
      ['time', 'time', true, false],
      ['user', 'user', true, false],
    ])
  })

  it('applies constructor defaults to omitted fields', () => {
    const bone = buildDefaultMeasurementTypes().find((type) => type.key === 'bone')

    expect(bone).toBeInstanceOf(MeasurementType)
    expect(bone?.inputType).toBe('float')
    expect(bone?.displayOrder).toBe(0)
    expect(bone?.isPinned).toBe(false)
    expect(bone?.isOnRightYAxis).toBe(false)
  })

  it('never repeats a key and name pair', () => {
    const pairs = buildDefaultMeasurementTypes().map((type) => `${type.key}:${type.name ?? ''}`)

    expect(new Set(pairs).size).toBe(pairs.length)
  })
})

describe('ordering helpers', () => {
  it('sortByDisplayOrder keeps input order for equal positions', () => {
    const sorted = sortByDisplayOrder(buildDefaultMeasurementTypes())

    // the 26 order-0 entries keep their sequence and precede the planets
    expect(sorted.slice(0, 3).map((type) => type.key)).toEqual(['bmi', 'body_fat', 'water'])
    expect(sorted.slice(22, 26).map((type) => type.key)).toEqual(['comment', 'date', 'time', 'user'])
    expect(sorted.slice(26).map((type) => type.name)).toEqual(PLANETS)
  })

  it('pinnedMeasurementTypes returns pinned and enabled entries by display order', () => {
    const pinned = pinnedMeasurementTypes(buildDefaultMeasurementTypes())

    expect(pinned.map((type) => type.name ?? type.key)).toEqual(['comment', ...PLANETS])
  })

  it('enabledMeasurementTypes drops disabled entries', () => {
    const enabled = enabledMeasurementTypes(buildDefaultMeasurementTypes())

    expect(enabled).toHaveLength(14)
    expect(enabled.map((type) => type.key).slice(0, 4)).toEqual(['comment', 'date', 'time', 'user'])
  })

  it('does not mutate its input', () => {
    const types = buildDefaultMeasurementTypes()
    const keys = types.map((type) => type.key)

    sortByDisplayOrder(types)

    expect(types.map((type) => type.key)).toEqual(keys)
  })
})
