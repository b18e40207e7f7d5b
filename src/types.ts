/**
 * Shared type definitions for the tween engine
 * Re-exports from organized type modules
 */

// Re-export core types
export type {
  TweenMethod,
  TweenState,
  CompletedBy,
  TimingPhase,
  TweenClock,
  TweenTiming,
  OverwriteWhen,
  OverwriteMethod,
  OverwriteScope,
  OverwriteSettings,
  TweenOverwrite,
  TweenRecycle,
  LogLevel,
  LogSink,
  EasingFunction,
  TweenEventName,
  TweenEvent,
  TweenEventHandler,
  TweenRequest,
  TweenShortcutOptions
} from './types/core'

// Re-export plugin types
export type {
  Capability,
  BindingStrength,
  GetterHook,
  SetterHook,
  ArithmeticHook,
  CapabilityHooks,
  TweenInfo,
  ProbeResult,
  PluginProbe,
  TweenPlugin,
  PluginState,
  ProviderBinding,
  ResolutionResult
} from './types/plugins'
