/**
 * tweengine
 * Property tweening with pluggable accessors and arithmetic
 */

// Engine
export { TweenEngine, TIMING_PHASES } from './engine'
export type { TweenEngineConfig, HostTickPump, EngineTick } from './engine'
export { TweenGroup } from './group'
export { Tween } from './tween'
export type { WaitOptions } from './tween'
export { TweenOptions, TweenOptionsContainer, TweenTemplate } from './options'
export { TweenPool } from './pool'
export { TweenPluginRegistry } from './registry'
export { PluginResolver, CAPABILITIES } from './resolver'
export type { ResolvableTween } from './resolver'

// Shared engine and composable
export { Animate, configureDefaultEngine, getDefaultEngine, disposeDefaultEngine } from './animate'
export type { DefaultEngineOptions } from './animate'
export { useTweenGroup } from './useTweenGroup'
export type { UseTweenGroupOptions, UseTweenGroupReturn } from './useTweenGroup'

// Frame loop
export { createRafControls, createTickDriver, isFrameLoopRunning, type RafControls } from './rafCoordinator'
export type { TickDriver, TickDriverOptions } from './rafCoordinator'

// Plugins
export * from './plugins'

// Easing
export { EASINGS, linear, quadIn, quadOut, quadInOut, cubicIn, cubicOut, sineInOut } from './easing'
export type { EasingName } from './easing'

// Errors
export {
  TweenError,
  TargetNotFoundError,
  TypeMismatchError,
  ValueTypeUnsupportedError,
  ActivationFailedError,
  PluginConflictError,
  ArithmeticUnsupportedError,
  HookFailedError,
  TweenUsageError,
  isTweenError,
  describeError
} from './errors'
export type { TweenErrorCode } from './errors'

// Constants (user can override)
export {
  TIMING_PRESETS,
  OVERWRITE_PRESETS,
  TWEEN_DEFAULTS,
  PLUGIN_PRIORITY,
  POSITION_EPSILON
} from './constants/defaults'

// Helpers
export { consoleSink, describeTarget } from './utils/logger'
export { inferValueType, matchesValueType } from './utils/valueTypes'
export type { Vec2, Vec3, Quaternion, Color } from './utils/valueTypes'
export { parseProperty } from './utils/propertyPath'
export type { ParsedProperty } from './utils/propertyPath'

// Re-export all types from central types file
export type * from './types'
