import { createEventHook } from '@vueuse/core'
import { describeError } from './errors'
import { TweenGroup } from './group'
import { TweenOptionsContainer, TweenTemplate } from './options'
import { createBuiltInPlugins, registerBuiltInArithmetic } from './plugins'
import { AccessorTable, ArithmeticTable } from './plugins/staticTables'
import { TweenPool } from './pool'
import { TweenPluginRegistry } from './registry'
import { PluginResolver } from './resolver'
import { Tween } from './tween'
import type {
  LogLevel,
  LogSink,
  TimingPhase,
  TweenClock,
  TweenRequest
} from './types'
import { recyclesGroups, recyclesTweens } from './utils/optionDefaults'

export const TIMING_PHASES: readonly TimingPhase[] = ['update', 'physics', 'late']

/** Whatever drives `tick()` from the host's frame loop. */
export interface HostTickPump {
  pause: () => void
  resume: () => void
}

export interface EngineTick {
  delta: number
  time: number
}

export interface TweenEngineConfig {
  /** Reuse tween and group instances. Pass a pool to share one between engines. */
  pool?: boolean | TweenPool
  /** Include compiled and reflective plugins in the default chain. Defaults to true. */
  enableDynamic?: boolean
  logLevel?: LogLevel
  logSink?: LogSink
  timeScale?: number
}

/**
 * Tween Engine - owns the clocks, the plugin set, the static tables and the
 * registered groups, and steps them phase by phase.
 *
 * The engine's options are the root scope every group and tween inherits from.
 */
export class TweenEngine extends TweenOptionsContainer {
  readonly registry: TweenPluginRegistry
  readonly resolver: PluginResolver
  readonly accessors = new AccessorTable()
  readonly arithmetic = new ArithmeticTable()
  readonly pool: TweenPool | undefined
  readonly singles = new TweenGroup()

  timeScale: number

  private groups: TweenGroup[] = []
  private registered = new Set<TweenGroup>()
  private afterTick = createEventHook<EngineTick>()
  private pump: HostTickPump | undefined
  private _time = 0
  private _unscaledTime = 0
  private _realTime = 0

  constructor(config: TweenEngineConfig = {}) {
    super()

    if (config.logLevel) this.options.logLevel = config.logLevel
    if (config.logSink) this.options.logSink = config.logSink
    this.timeScale = config.timeScale ?? 1
    this.pool = config.pool instanceof TweenPool ? config.pool : config.pool ? new TweenPool() : undefined

    this.registry = new TweenPluginRegistry((level, message) => this.options.log(level, message))
    this.resolver = new PluginResolver(this.registry)

    registerBuiltInArithmetic(this.arithmetic)
    createBuiltInPlugins(this.accessors, this.arithmetic).forEach(plugin => this.registry.register(plugin))
    this.registry.getDefaultChain().forEach(plugin => this.options.enablePlugin(plugin, true, false))
    this.enableDynamic(config.enableDynamic ?? true)

    // Engine-owned, never pooled
    this.singles.use(undefined, this.options, this)
    this.singles.recycle('tweens')
  }

  // ============================================================================
  // Clocks
  // ============================================================================

  get time(): number {
    return this._time
  }

  get unscaledTime(): number {
    return this._unscaledTime
  }

  get realTime(): number {
    return this._realTime
  }

  clockTime(clock: TweenClock): number {
    switch (clock) {
      case 'scaled':
        return this._time
      case 'unscaled':
        return this._unscaledTime
      case 'real':
        return this._realTime
    }
  }

  advance(deltaSeconds: number, realDeltaSeconds = deltaSeconds): void {
    this._time += deltaSeconds * this.timeScale
    this._unscaledTime += deltaSeconds
    this._realTime += realDeltaSeconds
  }

  // ============================================================================
  // Plugins
  // ============================================================================

  /** Toggle the compiled and reflective plugins in the default chain. */
  enableDynamic(enabled: boolean): void {
    this.registry.getDefaultChain()
      .filter(plugin => plugin.dynamic)
      .forEach(plugin => this.options.enablePlugin(plugin, enabled, false))
  }

  // ============================================================================
  // Factories
  // ============================================================================

  createTween(request: TweenRequest): Tween {
    const tween = this.pool?.getTween() ?? new Tween()
    return tween.use(request, this)
  }

  /** A group that outlives its tweens. */
  group(template?: TweenTemplate): TweenGroup {
    const group = this.pool?.getGroup() ?? new TweenGroup()
    group.use(undefined, template?.options ?? this.options, this)
    group.recycle('tweens')
    return group
  }

  /** A group with a default target, recycled once its tweens are done. */
  onTarget(target: object, template?: TweenTemplate): TweenGroup {
    const group = this.pool?.getGroup() ?? new TweenGroup()
    group.use(target, template?.options ?? this.options, this)
    return group
  }

  template(): TweenTemplate {
    return new TweenTemplate(this.options)
  }

  to(target: object, duration: number, property: string, to: unknown): Tween {
    return this.single({ method: 'to', target, duration, property, to })
  }

  from(target: object, duration: number, property: string, from: unknown): Tween {
    return this.single({ method: 'from', target, duration, property, from })
  }

  fromTo(target: object, duration: number, property: string, from: unknown, to: unknown): Tween {
    return this.single({ method: 'fromTo', target, duration, property, from, to })
  }

  by(target: object, duration: number, property: string, by: unknown): Tween {
    return this.single({ method: 'by', target, duration, property, by })
  }

  private single(request: TweenRequest): Tween {
    const tween = this.createTween(request)
    this.singles.add(tween)
    return tween
  }

  // ============================================================================
  // Groups
  // ============================================================================

  registerGroup(group: TweenGroup): void {
    if (this.registered.has(group)) return
    this.registered.add(group)
    this.groups.push(group)
    group.retain()
    this.pump?.resume()
  }

  get activeGroups(): readonly TweenGroup[] {
    return this.groups
  }

  has(target: object | undefined, property?: string): boolean {
    if (!this.checkTarget(target, 'has')) return false
    return this.groups.some(group => group.has(target, property))
  }

  stop(target: object | undefined, property?: string): void {
    if (!this.checkTarget(target, 'stop')) return
    this.groups.forEach(group => group.stop(target, property))
  }

  finish(target: object | undefined, property?: string): void {
    if (!this.checkTarget(target, 'finish')) return
    this.groups.forEach(group => group.finish(target, property))
  }

  cancel(target: object | undefined, property?: string): void {
    if (!this.checkTarget(target, 'cancel')) return
    this.groups.forEach(group => group.cancel(target, property))
  }

  overwrite(tween: Tween): void {
    this.groups.forEach(group => group.overwrite(tween))
  }

  private checkTarget(target: object | undefined, action: string): target is object {
    if (!target) {
      this.options.log('warning', `${action}() called without a target.`)
      return false
    }
    return true
  }

  // ============================================================================
  // Recycling
  // ============================================================================

  recycleTween(tween: Tween): void {
    if (!this.pool || !recyclesTweens(tween.options.recycle)) return
    if (tween.retainCount > 0) {
      tween.recycleOnRelease()
      return
    }
    this.pool.returnTween(tween)
  }

  recycleGroup(group: TweenGroup): void {
    if (!this.pool || group === this.singles || !recyclesGroups(group.options.recycle)) return
    if (group.retainCount > 0) {
      group.recycleOnRelease()
      return
    }
    this.pool.returnGroup(group)
  }

  // ============================================================================
  // Ticking
  // ============================================================================

  /** Step every registered group for one phase, dropping groups that ran empty. */
  update(phase: TimingPhase): void {
    this.accessors.lock()
    this.arithmetic.lock()
    try {
      for (let i = 0; i < this.groups.length; i++) {
        const group = this.groups[i]
        if (!group || group.update(phase)) continue

        this.groups.splice(i, 1)
        i--
        this.registered.delete(group)
        group.release()
        this.recycleGroup(group)
      }
    } finally {
      this.accessors.unlock()
      this.arithmetic.unlock()
    }
  }

  /** Advance the clocks and run update, physics and late phases in order. */
  tick(deltaSeconds: number, realDeltaSeconds = deltaSeconds): void {
    this.advance(deltaSeconds, realDeltaSeconds)
    TIMING_PHASES.forEach(phase => this.update(phase))

    this.afterTick
      .trigger({ delta: deltaSeconds, time: this._time })
      .catch((error: unknown) => this.options.log('error', `Exception in tick handler: ${describeError(error)}`))

    if (this.groups.length === 0) {
      this.pump?.pause()
    }
  }

  onAfterTick(handler: (tick: EngineTick) => void): () => void {
    const { off } = this.afterTick.on(handler)
    return off
  }

  /** Resolves on the first tick after which `done()` holds. */
  waitUntil(done: () => boolean, signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (signal?.aborted) {
        reject(signal.reason)
        return
      }
      if (done()) {
        resolve()
        return
      }

      let off: () => void = () => {}
      const onAbort = () => {
        off()
        reject(signal?.reason)
      }
      off = this.onAfterTick(() => {
        if (!done()) return
        off()
        signal?.removeEventListener('abort', onAbort)
        resolve()
      })
      signal?.addEventListener('abort', onAbort, { once: true })
    })
  }

  /** Let a host pump drive `tick()`. It is resumed while groups are registered. */
  usePump(pump: HostTickPump | undefined): void {
    this.pump?.pause()
    this.pump = pump
    if (pump && this.groups.length > 0) pump.resume()
  }

  dispose(): void {
    this.pump?.pause()
    this.pump = undefined
    this.groups.forEach(group => group.stop())
    this.groups = []
    this.registered.clear()
    this.accessors.teardown()
    this.arithmetic.teardown()
  }
}
