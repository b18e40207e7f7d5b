import {
  ActivationFailedError,
  ArithmeticUnsupportedError,
  PluginConflictError,
  TargetNotFoundError,
  describeError
} from './errors'
import type { TweenError, TweenErrorCode } from './errors'
import type { TweenOptions } from './options'
import type { TweenPluginRegistry } from './registry'
import type {
  Capability,
  PluginProbe,
  PluginState,
  ProbeResult,
  ProviderBinding,
  ResolutionResult,
  TweenInfo,
  TweenPlugin
} from './types'

export const CAPABILITIES: readonly Capability[] = ['getter', 'setter', 'arithmetic']

/** What the resolver needs from a tween. */
export interface ResolvableTween extends TweenInfo {
  readonly options: TweenOptions
  getBinding: <C extends Capability>(capability: C) => ProviderBinding<C> | undefined
  setBinding: <C extends Capability>(binding: ProviderBinding<C>) => void
}

type ProbeCache = Map<PluginProbe, ProbeResult>

// Higher ranks describe the actual problem more precisely
const ERROR_RANK: Partial<Record<TweenErrorCode, number>> = {
  VALUE_TYPE_UNSUPPORTED: 4,
  TYPE_MISMATCH: 3,
  ARITHMETIC_UNSUPPORTED: 2,
  ACTIVATION_FAILED: 2,
  TARGET_NOT_FOUND: 1
}

/**
 * Binds getter, setter and arithmetic providers to tweens.
 *
 * Explicit (strong) requests run only the requested plugin. Everything else
 * walks the tween's enabled plugins: strong requests first, then weak ones
 * from the closest scope outward with the engine's default chain last,
 * binding the first provider whose probe succeeds.
 */
export class PluginResolver {
  constructor(private readonly registry: TweenPluginRegistry) {}

  resolve<C extends Capability>(
    tween: ResolvableTween,
    capability: C,
    explicitRequest?: TweenPlugin
  ): ResolutionResult<C> {
    const cache: ProbeCache = new Map()
    if (explicitRequest) {
      return this.resolveExplicit(tween, capability, explicitRequest, cache)
    }
    return this.resolveFromChain(tween, capability, cache)
  }

  /** Resolve all three capabilities. Returns the first failure. */
  resolveAll(tween: ResolvableTween): TweenError | undefined {
    const cache: ProbeCache = new Map()
    for (const capability of CAPABILITIES) {
      const result = this.resolveFromChain(tween, capability, cache)
      if (!result.ok) return result.error
    }
    return undefined
  }

  /** Bind every capability `plugin` serves as a strong request. */
  resolvePlugin(tween: ResolvableTween, plugin: TweenPlugin): TweenError | undefined {
    const cache: ProbeCache = new Map()
    for (const capability of plugin.capabilities) {
      const result = this.resolveExplicit(tween, capability, plugin, cache)
      if (!result.ok) return result.error
    }
    return undefined
  }

  lookup(state: Pick<PluginState, 'name' | 'plugin'>): TweenPlugin | undefined {
    return state.plugin ?? this.registry.getPlugin(state.name)
  }

  private resolveExplicit<C extends Capability>(
    tween: ResolvableTween,
    capability: C,
    plugin: TweenPlugin,
    cache: ProbeCache
  ): ResolutionResult<C> {
    const probe = plugin.manualProbe ?? plugin.autoProbe
    if (!probe) {
      return { ok: false, error: new ActivationFailedError(plugin.name, 'plugin has no probe') }
    }

    const result = this.probe(tween, plugin, probe, cache)
    if (!result.ok) {
      return {
        ok: false,
        error: result.error instanceof ActivationFailedError
          ? result.error
          : new ActivationFailedError(plugin.name, result.error.message, { cause: result.error })
      }
    }

    const hook = result.hooks[capability]
    if (!hook) {
      return { ok: false, error: new ActivationFailedError(plugin.name, `no ${capability} provided`) }
    }

    return this.bind(tween, { capability, plugin, hook, context: result.context, strength: 'strong' })
  }

  private resolveFromChain<C extends Capability>(
    tween: ResolvableTween,
    capability: C,
    cache: ProbeCache
  ): ResolutionResult<C> {
    // Strong requests
    for (const state of tween.options.collectPlugins()) {
      if (!state.required) continue
      const plugin = this.lookup(state)
      if (!plugin) {
        return { ok: false, error: new ActivationFailedError(state.name, 'plugin is not registered') }
      }
      if (!plugin.capabilities.includes(capability)) continue

      const result = this.resolveExplicit(tween, capability, plugin, cache)
      if (!result.ok) return result
    }

    const bound = tween.getBinding(capability)
    if (bound?.strength === 'strong') {
      return { ok: true, binding: bound }
    }

    // Weak requests, closest scope first
    const failures: TweenError[] = []
    for (const state of tween.options.collectWeakPlugins()) {
      const plugin = this.lookup(state)
      if (!plugin) {
        tween.options.log('debug', `Plugin '${state.name}' is not registered, skipping.`)
        continue
      }
      if (!plugin.autoProbe || !plugin.capabilities.includes(capability)) continue

      const result = this.probe(tween, plugin, plugin.autoProbe, cache)
      if (!result.ok) {
        failures.push(result.error)
        continue
      }

      const hook = result.hooks[capability]
      if (!hook) {
        failures.push(new ActivationFailedError(plugin.name, `no ${capability} provided`))
        continue
      }

      return this.bind(tween, { capability, plugin, hook, context: result.context, strength: 'weak' })
    }

    failures.forEach(error => {
      tween.options.log('debug', `No ${capability} for '${tween.property}': ${error.message}`)
    })
    return { ok: false, error: this.mostSpecific(tween, capability, failures) }
  }

  private bind<C extends Capability>(tween: ResolvableTween, binding: ProviderBinding<C>): ResolutionResult<C> {
    const current = tween.getBinding(binding.capability)

    if (current && current.plugin !== binding.plugin) {
      const replaceable = current.plugin.overwritable !== false

      if (binding.strength === 'weak') {
        // Weak requests never displace a strong or non-overwritable binding
        if (current.strength === 'strong' || !replaceable) {
          return { ok: true, binding: current }
        }
      } else if (!replaceable) {
        return {
          ok: false,
          error: new PluginConflictError(binding.plugin.name, current.plugin.name, binding.capability)
        }
      }
    }

    tween.setBinding(binding)
    return { ok: true, binding }
  }

  private probe(tween: ResolvableTween, plugin: TweenPlugin, probe: PluginProbe, cache: ProbeCache): ProbeResult {
    const cached = cache.get(probe)
    if (cached) return cached

    let result: ProbeResult
    try {
      result = probe(tween)
    } catch (error) {
      result = { ok: false, error: new ActivationFailedError(plugin.name, describeError(error), { cause: error }) }
    }
    cache.set(probe, result)
    return result
  }

  private mostSpecific(tween: ResolvableTween, capability: Capability, failures: readonly TweenError[]): TweenError {
    let best: TweenError | undefined
    for (const error of failures) {
      if (!best || (ERROR_RANK[error.code] ?? 0) > (ERROR_RANK[best.code] ?? 0)) {
        best = error
      }
    }
    if (best) return best

    if (capability === 'arithmetic') {
      return new ArithmeticUnsupportedError(tween.valueType)
    }
    return new TargetNotFoundError(`No ${capability} available for '${tween.property}'.`)
  }
}
