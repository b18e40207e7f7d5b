/**
 * Core tween type definitions
 */

import type { TweenError } from '../errors'
import type { Tween } from '../tween'

// ============================================================================
// Lifecycle
// ============================================================================

/** How start and end values are obtained when the tween starts. */
export type TweenMethod = 'to' | 'from' | 'fromTo' | 'by'

export type TweenState =
  | 'unused'
  | 'uninitialized'
  | 'validating'
  | 'waiting'
  | 'running'
  | 'finished'
  | 'stopped'
  | 'canceled'
  | 'failed'

export type CompletedBy = 'complete' | 'finish' | 'stop' | 'cancel'

// ============================================================================
// Timing
// ============================================================================

export type TimingPhase = 'update' | 'physics' | 'late'

/**
 * Clock a tween reads its time from.
 * `scaled` follows the engine time scale, `unscaled` ignores it and
 * `real` follows the host's wall clock.
 */
export type TweenClock = 'scaled' | 'unscaled' | 'real'

export interface TweenTiming {
  phase: TimingPhase
  clock: TweenClock
}

// ============================================================================
// Overwrite / Recycle / Logging
// ============================================================================

export type OverwriteWhen = 'initialize' | 'start'
export type OverwriteMethod = 'stop' | 'finish' | 'cancel'
export type OverwriteScope = 'all' | 'overlapping'

export interface OverwriteSettings {
  when: OverwriteWhen
  method: OverwriteMethod
  scope: OverwriteScope
}

export type TweenOverwrite = 'none' | OverwriteSettings

export type TweenRecycle = 'none' | 'tweens' | 'groups' | 'all'

export type LogLevel = 'debug' | 'warning' | 'error' | 'silent'

export type LogSink = (level: Exclude<LogLevel, 'silent'>, message: string) => void

export type EasingFunction = (position: number) => number

// ============================================================================
// Events
// ============================================================================

export type TweenEventName = 'initialize' | 'start' | 'update' | 'complete' | 'error'

export interface TweenEvent {
  event: TweenEventName
  tween: Tween
  completedBy?: CompletedBy
  overwritten?: boolean
  error?: TweenError
}

export type TweenEventHandler = (event: TweenEvent) => void

// ============================================================================
// Requests
// ============================================================================

interface TweenRequestBase {
  target?: object
  property: string
  duration?: number
  /** Value type tag, inferred from the given value when omitted. */
  valueType?: string
}

export type TweenRequest =
  | (TweenRequestBase & { method: 'to'; to: unknown })
  | (TweenRequestBase & { method: 'from'; from: unknown })
  | (TweenRequestBase & { method: 'fromTo'; from: unknown; to: unknown })
  | (TweenRequestBase & { method: 'by'; by: unknown })

export interface TweenShortcutOptions {
  duration?: number
  target?: object
  valueType?: string
}
