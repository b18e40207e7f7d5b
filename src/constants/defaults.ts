import type { LogLevel, OverwriteSettings, TweenRecycle, TweenTiming } from '../types'

/**
 * Timing presets
 *
 * - DEFAULT: regular update phase, scaled engine time
 * - PHYSICS: physics phase, scaled engine time
 * - LATE: late phase, after everything else moved
 * - MENU: unaffected by the time scale (paused games, menus)
 */
export const TIMING_PRESETS = {
  DEFAULT: { phase: 'update', clock: 'scaled' },
  PHYSICS: { phase: 'physics', clock: 'scaled' },
  LATE: { phase: 'late', clock: 'scaled' },
  MENU: { phase: 'update', clock: 'unscaled' }
} as const satisfies Record<string, TweenTiming>

/**
 * Overwrite presets
 *
 * - DEFAULT: stop overlapping tweens on the same property when starting
 * - IMMEDIATE: stop every tween on the same property as soon as it is added
 * - NONE: never overwrite
 */
export const OVERWRITE_PRESETS = {
  DEFAULT: { when: 'start', method: 'stop', scope: 'overlapping' },
  IMMEDIATE: { when: 'initialize', method: 'stop', scope: 'all' },
  NONE: 'none'
} as const satisfies Record<string, OverwriteSettings | 'none'>

export interface TweenDefaults {
  delay: number
  logLevel: LogLevel
  recycle: TweenRecycle
  timing: TweenTiming
  overwrite: OverwriteSettings
}

export const TWEEN_DEFAULTS: Readonly<TweenDefaults> = {
  delay: 0,
  logLevel: 'warning',
  recycle: 'all',
  timing: TIMING_PRESETS.DEFAULT,
  overwrite: OVERWRITE_PRESETS.DEFAULT
}

// Positions within this distance of 1 count as complete
export const POSITION_EPSILON = 1e-9

export const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  warning: 1,
  error: 2,
  silent: 3
}

/** Default chain order, high to low. */
export const PLUGIN_PRIORITY = {
  // Ahead of static arithmetic so `:slerp:` angles are not taken as plain numbers
  SLERP: 120,
  STATIC: 100,
  COMPILED: 50,
  REFLECTION: 10
} as const

export const FALLBACK_FRAME_MS = 16
