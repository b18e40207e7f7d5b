/**
 * Plugin-specific type definitions
 */

import type { TweenError } from '../errors'
import type { TweenMethod } from './core'

export type Capability = 'getter' | 'setter' | 'arithmetic'

/**
 * Weak bindings come from the default chain and may be replaced.
 * Strong bindings come from explicit requests.
 */
export type BindingStrength = 'weak' | 'strong'

// ============================================================================
// Capability hooks
// ============================================================================

export interface GetterHook {
  get: (target: object) => unknown
}

export interface SetterHook {
  set: (target: object, value: unknown) => void
}

export interface ArithmeticHook {
  diff: (start: unknown, end: unknown) => unknown
  end: (start: unknown, diff: unknown) => unknown
  valueAtPosition: (start: unknown, end: unknown, diff: unknown, position: number) => unknown
}

export interface CapabilityHooks {
  getter: GetterHook
  setter: SetterHook
  arithmetic: ArithmeticHook
}

// ============================================================================
// Probes
// ============================================================================

/** Read-only view of a tween handed to plugin probes. */
export interface TweenInfo {
  readonly target: object | undefined
  /** Property path without its `:options:` prefix. */
  readonly property: string
  readonly propertyOptions: readonly string[]
  readonly valueType: string
  readonly method: TweenMethod
  /** First value supplied with the tween (end, start or diff). */
  readonly sampleValue: unknown
}

export type ProbeResult =
  | { ok: true; hooks: Partial<CapabilityHooks>; context?: unknown }
  | { ok: false; error: TweenError }

export type PluginProbe = (tween: TweenInfo) => ProbeResult

export interface TweenPlugin {
  name: string
  version: string
  capabilities: readonly Capability[]
  /** Position in the default chain, high to low. */
  priority?: number
  /** Relies on runtime code generation or reflection. Left out of the chain on static-only hosts. */
  dynamic?: boolean
  /** Whether a later strong request may replace this binding. Defaults to true. */
  overwritable?: boolean
  /** Probe used when the plugin runs as part of the default chain. */
  autoProbe?: PluginProbe
  /** Probe used for explicit requests. Falls back to `autoProbe`. */
  manualProbe?: PluginProbe
}

export interface PluginState {
  name: string
  plugin?: TweenPlugin
  enabled: boolean
  required: boolean
}

// ============================================================================
// Resolution
// ============================================================================

export interface ProviderBinding<C extends Capability = Capability> {
  capability: C
  plugin: TweenPlugin
  hook: CapabilityHooks[C]
  /** Context the hook was activated with. */
  context: unknown
  strength: BindingStrength
}

export type ResolutionResult<C extends Capability = Capability> =
  | { ok: true; binding: ProviderBinding<C> }
  | { ok: false; error: TweenError }
