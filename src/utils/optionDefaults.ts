import { TWEEN_DEFAULTS } from '../constants/defaults'
import type { OverwriteSettings, TweenOverwrite, TweenRecycle, TweenTiming } from '../types'

/**
 * Centralized defaulting for partial option objects.
 */
export function normalizeTiming(timing: Partial<TweenTiming> = {}): TweenTiming {
  return {
    phase: timing.phase ?? TWEEN_DEFAULTS.timing.phase,
    clock: timing.clock ?? TWEEN_DEFAULTS.timing.clock
  }
}

export function normalizeOverwrite(overwrite: TweenOverwrite | Partial<OverwriteSettings>): TweenOverwrite {
  if (overwrite === 'none') return 'none'
  return {
    when: overwrite.when ?? TWEEN_DEFAULTS.overwrite.when,
    method: overwrite.method ?? TWEEN_DEFAULTS.overwrite.method,
    scope: overwrite.scope ?? TWEEN_DEFAULTS.overwrite.scope
  }
}

/** Returns undefined for values that cannot be a duration or delay. */
export function normalizeSeconds(seconds: number): number | undefined {
  if (!Number.isFinite(seconds) || seconds < 0) return undefined
  return seconds
}

export function recyclesTweens(recycle: TweenRecycle): boolean {
  return recycle === 'all' || recycle === 'tweens'
}

export function recyclesGroups(recycle: TweenRecycle): boolean {
  return recycle === 'all' || recycle === 'groups'
}
