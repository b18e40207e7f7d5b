import { createEventHook } from '@vueuse/core'
import type { EventHook } from '@vueuse/core'
import { TWEEN_DEFAULTS } from './constants/defaults'
import { EASINGS, linear } from './easing'
import type { EasingName } from './easing'
import { describeError } from './errors'
import { consoleSink, shouldLog } from './utils/logger'
import { normalizeOverwrite, normalizeSeconds, normalizeTiming } from './utils/optionDefaults'
import type {
  EasingFunction,
  LogLevel,
  LogSink,
  OverwriteSettings,
  PluginState,
  TweenEvent,
  TweenEventHandler,
  TweenEventName,
  TweenOverwrite,
  TweenPlugin,
  TweenRecycle,
  TweenTiming
} from './types'

type EventHooks = Record<TweenEventName, EventHook<TweenEvent>>
type GuardMap = Record<TweenEventName, Map<TweenEventHandler, TweenEventHandler>>

function createHooks(): EventHooks {
  return {
    initialize: createEventHook<TweenEvent>(),
    start: createEventHook<TweenEvent>(),
    update: createEventHook<TweenEvent>(),
    complete: createEventHook<TweenEvent>(),
    error: createEventHook<TweenEvent>()
  }
}

function createGuards(): GuardMap {
  return {
    initialize: new Map(),
    start: new Map(),
    update: new Map(),
    complete: new Map(),
    error: new Map()
  }
}

/**
 * One scope of cascading options. Every getter returns the local value when
 * set, otherwise the parent's, otherwise the library default.
 * Events triggered on a scope bubble up through its parents.
 */
export class TweenOptions {
  parent: TweenOptions | undefined

  private _duration: number | undefined
  private _easing: EasingFunction | undefined
  private _delay: number | undefined
  private _timing: TweenTiming | undefined
  private _overwrite: TweenOverwrite | undefined
  private _recycle: TweenRecycle | undefined
  private _logLevel: LogLevel | undefined
  private _logSink: LogSink | undefined
  private _isTargetAlive: ((target: object) => boolean) | undefined
  private _defaultPluginRequired: boolean | undefined
  private _plugins: PluginState[] = []

  private hooks = createHooks()
  private guards = createGuards()

  constructor(parent?: TweenOptions) {
    this.parent = parent
  }

  // ============================================================================
  // Cascading values
  // ============================================================================

  /** Seconds. Undefined or 0 makes the tween instant. */
  get duration(): number | undefined {
    return this._duration ?? this.parent?.duration
  }

  set duration(value: number | undefined) {
    if (value === undefined) {
      this._duration = undefined
      return
    }
    const seconds = normalizeSeconds(value)
    if (seconds === undefined) {
      this.log('warning', `Ignoring invalid duration ${value}.`)
      return
    }
    this._duration = seconds
  }

  get easing(): EasingFunction {
    return this._easing ?? this.parent?.easing ?? linear
  }

  set easing(value: EasingFunction | undefined) {
    this._easing = value
  }

  get delay(): number {
    return this._delay ?? this.parent?.delay ?? TWEEN_DEFAULTS.delay
  }

  set delay(value: number | undefined) {
    if (value === undefined) {
      this._delay = undefined
      return
    }
    const seconds = normalizeSeconds(value)
    if (seconds === undefined) {
      this.log('warning', `Ignoring invalid start delay ${value}.`)
      return
    }
    this._delay = seconds
  }

  get timing(): TweenTiming {
    return this._timing ?? this.parent?.timing ?? TWEEN_DEFAULTS.timing
  }

  set timing(value: TweenTiming | undefined) {
    this._timing = value
  }

  get overwrite(): TweenOverwrite {
    return this._overwrite ?? this.parent?.overwrite ?? TWEEN_DEFAULTS.overwrite
  }

  set overwrite(value: TweenOverwrite | undefined) {
    this._overwrite = value
  }

  get recycle(): TweenRecycle {
    return this._recycle ?? this.parent?.recycle ?? TWEEN_DEFAULTS.recycle
  }

  set recycle(value: TweenRecycle | undefined) {
    this._recycle = value
  }

  get logLevel(): LogLevel {
    return this._logLevel ?? this.parent?.logLevel ?? TWEEN_DEFAULTS.logLevel
  }

  set logLevel(value: LogLevel | undefined) {
    this._logLevel = value
  }

  get logSink(): LogSink {
    return this._logSink ?? this.parent?.logSink ?? consoleSink
  }

  set logSink(value: LogSink | undefined) {
    this._logSink = value
  }

  /** Host check for targets that can be destroyed while still referenced. */
  get isTargetAlive(): ((target: object) => boolean) | undefined {
    return this._isTargetAlive ?? this.parent?.isTargetAlive
  }

  set isTargetAlive(value: ((target: object) => boolean) | undefined) {
    this._isTargetAlive = value
  }

  /** Whether `enablePlugin()` without an explicit flag makes a strong request. */
  get defaultPluginRequired(): boolean {
    return this._defaultPluginRequired ?? this.parent?.defaultPluginRequired ?? false
  }

  set defaultPluginRequired(value: boolean | undefined) {
    this._defaultPluginRequired = value
  }

  // ============================================================================
  // Plugins
  // ============================================================================

  enablePlugin(plugin: TweenPlugin | string, enabled = true, required?: boolean): void {
    const name = typeof plugin === 'string' ? plugin : plugin.name
    const state: PluginState = {
      name,
      plugin: typeof plugin === 'string' ? undefined : plugin,
      enabled,
      required: required ?? this.defaultPluginRequired
    }
    const index = this._plugins.findIndex(existing => existing.name === name)
    if (index >= 0) {
      state.plugin = state.plugin ?? this._plugins[index]?.plugin
      this._plugins[index] = state
    } else {
      this._plugins.push(state)
    }
  }

  get pluginStates(): readonly PluginState[] {
    return this._plugins
  }

  /**
   * Effective plugin states along the parent chain, in load order.
   * Parents load first; a child's state for the same plugin replaces the
   * parent's and takes the child's position.
   */
  collectPlugins(): PluginState[] {
    return this.collectLevels().flat()
  }

  /**
   * Weak plugin states in resolution order: the closest scope first, each
   * scope in enable order, the root's default chain last.
   */
  collectWeakPlugins(): PluginState[] {
    return this.collectLevels()
      .reverse()
      .flatMap(level => level.filter(state => !state.required))
  }

  /** Enabled states per scope, root first, each plugin kept at its closest scope. */
  private collectLevels(): PluginState[][] {
    const levels: PluginState[][] = []
    const closest = new Map<string, PluginState>()

    for (let scope: TweenOptions | undefined = this; scope; scope = scope.parent) {
      const level: PluginState[] = []
      for (const state of scope._plugins) {
        const existing = closest.get(state.name)
        if (existing) {
          existing.plugin = existing.plugin ?? state.plugin
          continue
        }
        const merged = { ...state }
        closest.set(state.name, merged)
        level.push(merged)
      }
      levels.unshift(level)
    }

    return levels.map(level => level.filter(state => state.enabled))
  }

  // ============================================================================
  // Events
  // ============================================================================

  on(event: TweenEventName, handler: TweenEventHandler): () => void {
    const guarded: TweenEventHandler = payload => {
      try {
        const result: unknown = handler(payload)
        if (result instanceof Promise) {
          result.catch((error: unknown) => this.reportHandlerError(event, error))
        }
      } catch (error) {
        this.reportHandlerError(event, error)
      }
    }

    this.off(event, handler)
    this.guards[event].set(handler, guarded)
    this.hooks[event].on(guarded)
    return () => this.off(event, handler)
  }

  off(event: TweenEventName, handler: TweenEventHandler): void {
    const guarded = this.guards[event].get(handler)
    if (!guarded) return
    this.hooks[event].off(guarded)
    this.guards[event].delete(handler)
  }

  hasListeners(event: TweenEventName): boolean {
    return this.guards[event].size > 0 || (this.parent?.hasListeners(event) ?? false)
  }

  trigger(payload: TweenEvent): void {
    if (this.guards[payload.event].size > 0) {
      this.hooks[payload.event]
        .trigger(payload)
        .catch((error: unknown) => this.reportHandlerError(payload.event, error))
    }
    this.parent?.trigger(payload)
  }

  resetEvents(): void {
    this.hooks = createHooks()
    this.guards = createGuards()
  }

  // ============================================================================
  // Logging
  // ============================================================================

  log(level: Exclude<LogLevel, 'silent'>, message: string): void {
    if (!shouldLog(level, this.logLevel)) return
    this.logSink(level, message)
  }

  reset(): void {
    this.parent = undefined
    this._duration = undefined
    this._easing = undefined
    this._delay = undefined
    this._timing = undefined
    this._overwrite = undefined
    this._recycle = undefined
    this._logLevel = undefined
    this._logSink = undefined
    this._isTargetAlive = undefined
    this._defaultPluginRequired = undefined
    this._plugins = []
    this.resetEvents()
  }

  private reportHandlerError(event: TweenEventName, error: unknown): void {
    this.log('error', `Exception in ${event} handler: ${describeError(error)}`)
  }
}

/**
 * Base for everything that carries an options scope: tweens, groups,
 * templates and the engine root. Setters are fluent.
 */
export abstract class TweenOptionsContainer {
  readonly options: TweenOptions

  constructor(parent?: TweenOptions) {
    this.options = new TweenOptions(parent)
  }

  over(duration: number): this {
    this.options.duration = duration
    return this
  }

  ease(easing: EasingFunction | EasingName): this {
    this.options.easing = typeof easing === 'string' ? EASINGS[easing] : easing
    return this
  }

  delay(seconds: number): this {
    this.options.delay = seconds
    return this
  }

  timing(timing: Partial<TweenTiming>): this {
    this.options.timing = normalizeTiming(timing)
    return this
  }

  overwriteMode(overwrite: TweenOverwrite | Partial<OverwriteSettings>): this {
    this.options.overwrite = normalizeOverwrite(overwrite)
    return this
  }

  recycle(recycle: TweenRecycle): this {
    this.options.recycle = recycle
    return this
  }

  logLevel(level: LogLevel): this {
    this.options.logLevel = level
    return this
  }

  logTo(sink: LogSink): this {
    this.options.logSink = sink
    return this
  }

  /**
   * Enable or disable a plugin on this scope. Required plugins are strong
   * requests; tweens make required requests unless told otherwise.
   */
  plugin(plugin: TweenPlugin | string, enabled = true, required?: boolean): this {
    this.options.enablePlugin(plugin, enabled, required)
    return this
  }

  on(event: TweenEventName, handler: TweenEventHandler): this {
    this.options.on(event, handler)
    return this
  }

  off(event: TweenEventName, handler: TweenEventHandler): this {
    this.options.off(event, handler)
    return this
  }
}

/** Shared option scope that several groups or tweens can inherit from. */
export class TweenTemplate extends TweenOptionsContainer {}
