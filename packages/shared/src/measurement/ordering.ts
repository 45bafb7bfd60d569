import { Array as Arr, Order } from 'effect'
import type { MeasurementType } from './domain.js'

const byDisplayOrder: Order.Order<MeasurementType> = Order.mapInput(Order.number, (type) => type.displayOrder)

/**
 * Stable ascending sort on displayOrder; entries with equal order keep
 * their relative position in the input.
 */
export const sortByDisplayOrder = <A extends MeasurementType>(types: ReadonlyArray<A>): Array<A> =>
  Arr.sort(types, byDisplayOrder)

/** Enabled types in display order */
export const enabledMeasurementTypes = <A extends MeasurementType>(types: ReadonlyArray<A>): Array<A> =>
  sortByDisplayOrder(types.filter((type) => type.isEnabled))

/** Types shown on the dashboard: pinned and enabled, in display order */
export const pinnedMeasurementTypes = <A extends MeasurementType>(types: ReadonlyArray<A>): Array<A> =>
  sortByDisplayOrder(types.filter((type) => type.isPinned && type.isEnabled))
