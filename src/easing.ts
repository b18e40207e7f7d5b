import type { EasingFunction } from './types'

/**
 * Basic easing curves. Any `(position) => position` mapping over [0, 1]
 * can be passed to `ease()` instead.
 */
export const linear: EasingFunction = t => t

export const quadIn: EasingFunction = t => t * t
export const quadOut: EasingFunction = t => t * (2 - t)
export const quadInOut: EasingFunction = t => (t < 0.5 ? 2 * t * t : -1 + (4 - 2 * t) * t)

export const cubicIn: EasingFunction = t => t * t * t
export const cubicOut: EasingFunction = t => {
  const p = t - 1
  return p * p * p + 1
}

export const sineInOut: EasingFunction = t => -(Math.cos(Math.PI * t) - 1) / 2

export const EASINGS = {
  linear,
  quadIn,
  quadOut,
  quadInOut,
  cubicIn,
  cubicOut,
  sineInOut
} as const

export type EasingName = keyof typeof EASINGS
