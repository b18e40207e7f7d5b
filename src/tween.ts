import { POSITION_EPSILON } from './constants/defaults'
import { linear } from './easing'
import type { TweenEngine } from './engine'
import { HookFailedError, TargetNotFoundError, TweenUsageError, isTweenError } from './errors'
import type { TweenError } from './errors'
import { TweenOptionsContainer } from './options'
import type { ResolvableTween } from './resolver'
import type {
  Capability,
  CompletedBy,
  EasingFunction,
  OverwriteWhen,
  ProviderBinding,
  TweenEventName,
  TweenMethod,
  TweenPlugin,
  TweenRequest,
  TweenState
} from './types'
import { describeTarget } from './utils/logger'
import { parseProperty } from './utils/propertyPath'
import type { ParsedProperty } from './utils/propertyPath'
import { inferValueType } from './utils/valueTypes'

type BindingMap = { [K in Capability]?: ProviderBinding<K> }

const TERMINAL_STATES: readonly TweenState[] = ['finished', 'stopped', 'canceled', 'failed']

const STATE_AFTER: Record<CompletedBy, TweenState> = {
  complete: 'finished',
  finish: 'finished',
  stop: 'stopped',
  cancel: 'canceled'
}

const clamp01 = (value: number): number => Math.min(1, Math.max(0, value))

export interface WaitOptions {
  signal?: AbortSignal
}

/**
 * A single property animation.
 *
 * Lifecycle: unused → uninitialized → validating → waiting → running →
 * finished | stopped | canceled, or failed from any non-terminal state.
 * Plugins are resolved once, on the first update or on `validate()`.
 * Position is derived from the tween's clock, so stepping twice at the same
 * time writes the same value.
 */
export class Tween extends TweenOptionsContainer implements ResolvableTween {
  private _state: TweenState = 'unused'
  private _method: TweenMethod = 'to'
  private _target: WeakRef<object> | undefined
  private _targetGiven = false
  private _property: ParsedProperty = parseProperty('')
  private _valueType = 'unknown'

  private _startValue: unknown
  private _endValue: unknown
  private _diffValue: unknown
  private _value: unknown
  private _position = 0

  private _creationTime = { scaled: 0, unscaled: 0, real: 0 }
  private _startTime = 0
  private _duration = 0
  private _easing: EasingFunction = linear

  private _completedBy: CompletedBy | undefined
  private _overwritten = false
  private _error: TweenError | undefined
  private _bindings: BindingMap = {}
  private _validated = false
  private _valuesPrepared = false

  private _engine: TweenEngine | undefined
  private _retainCount = 0
  private _recycleOnRelease = false

  constructor() {
    super()
    this.options.defaultPluginRequired = true
  }

  // ============================================================================
  // Setup
  // ============================================================================

  use(request: TweenRequest, engine: TweenEngine): this {
    if (this._state !== 'unused') {
      throw new TweenUsageError('Trying to re-use a tween that has not been reset yet.')
    }
    this._state = 'uninitialized'

    this._engine = engine
    this.options.parent = engine.options
    this._method = request.method
    this._targetGiven = request.target !== undefined
    this._target = request.target ? new WeakRef(request.target) : undefined
    this._property = parseProperty(request.property)
    if (request.duration !== undefined) {
      this.options.duration = request.duration
    }

    switch (request.method) {
      case 'to':
        this._endValue = request.to
        break
      case 'from':
        this._startValue = request.from
        break
      case 'fromTo':
        this._startValue = request.from
        this._endValue = request.to
        break
      case 'by':
        this._diffValue = request.by
        break
    }
    this._valueType = request.valueType ?? inferValueType(this.sampleValue)

    this._creationTime = {
      scaled: engine.clockTime('scaled'),
      unscaled: engine.clockTime('unscaled'),
      real: engine.clockTime('real')
    }
    return this
  }

  /** Attach to an engine and adopt a default target, if none was given. */
  attach(engine: TweenEngine, defaultTarget?: object): void {
    this._engine = engine
    if (!this._targetGiven && defaultTarget) {
      this._target = new WeakRef(defaultTarget)
      this._targetGiven = true
    }
  }

  reset(): void {
    this.options.reset()
    this.options.defaultPluginRequired = true

    this._state = 'unused'
    this._method = 'to'
    this._target = undefined
    this._targetGiven = false
    this._property = parseProperty('')
    this._valueType = 'unknown'
    this._startValue = undefined
    this._endValue = undefined
    this._diffValue = undefined
    this._value = undefined
    this._position = 0
    this._creationTime = { scaled: 0, unscaled: 0, real: 0 }
    this._startTime = 0
    this._duration = 0
    this._easing = linear
    this._completedBy = undefined
    this._overwritten = false
    this._error = undefined
    this._bindings = {}
    this._validated = false
    this._valuesPrepared = false
    this._engine = undefined
    this._retainCount = 0
    this._recycleOnRelease = false
  }

  // ============================================================================
  // Accessors
  // ============================================================================

  get state(): TweenState {
    return this._state
  }

  get isTerminal(): boolean {
    return TERMINAL_STATES.includes(this._state)
  }

  get method(): TweenMethod {
    return this._method
  }

  get target(): object | undefined {
    return this._target?.deref()
  }

  /** Member path, without the `:options:` prefix. */
  get property(): string {
    return this._property.path
  }

  get propertyOptions(): readonly string[] {
    return this._property.options
  }

  get valueType(): string {
    return this._valueType
  }

  get sampleValue(): unknown {
    switch (this._method) {
      case 'to':
        return this._endValue
      case 'from':
        return this._startValue
      case 'fromTo':
        return this._endValue ?? this._startValue
      case 'by':
        return this._diffValue
    }
  }

  get startValue(): unknown {
    return this._startValue
  }

  get endValue(): unknown {
    return this._endValue
  }

  get diffValue(): unknown {
    return this._diffValue
  }

  /** Last value written to the target. */
  get value(): unknown {
    return this._value
  }

  get position(): number {
    return this._position
  }

  get completedBy(): CompletedBy | undefined {
    return this._completedBy
  }

  get overwritten(): boolean {
    return this._overwritten
  }

  get error(): TweenError | undefined {
    return this._error
  }

  get engine(): TweenEngine | undefined {
    return this._engine
  }

  /** Current time on the clock selected by the timing option. */
  get time(): number {
    return this._engine?.clockTime(this.options.timing.clock) ?? 0
  }

  /** Time the tween will start or has started. */
  get startTime(): number {
    return this._creationTime[this.options.timing.clock] + this.options.delay
  }

  get duration(): number {
    return this.options.duration ?? 0
  }

  get retainCount(): number {
    return this._retainCount
  }

  getBinding<C extends Capability>(capability: C): ProviderBinding<C> | undefined {
    return this._bindings[capability]
  }

  setBinding<C extends Capability>(binding: ProviderBinding<C>): void {
    const bindings: { [K in C]?: ProviderBinding<K> } = this._bindings
    bindings[binding.capability] = binding
  }

  // ============================================================================
  // Plugins
  // ============================================================================

  /**
   * Request a plugin. Before resolution this records the request on the
   * tween's options; afterwards a strong request rebinds immediately and a
   * failure fails the tween.
   */
  override plugin(plugin: TweenPlugin | string, enabled = true, required?: boolean): this {
    super.plugin(plugin, enabled, required)

    const strong = required ?? this.options.defaultPluginRequired
    if (!this._validated || this.isTerminal || !enabled || !strong) return this

    const resolver = this._engine?.resolver
    const resolved = typeof plugin === 'string' ? resolver?.lookup({ name: plugin }) : plugin
    if (!resolver || !resolved) {
      this.fail(new TweenUsageError(`Plugin '${typeof plugin === 'string' ? plugin : plugin.name}' is not registered.`))
      return this
    }

    const error = resolver.resolvePlugin(this, resolved)
    if (error) this.fail(error)
    return this
  }

  /**
   * Resolve plugins now instead of on the first update, so failures surface
   * where the tween is set up. Optionally writes the start value right away.
   */
  validate(forceRender = false): boolean {
    if (this._state === 'failed' || this._state === 'unused') return false

    if (!this._validated) {
      const resolver = this._engine?.resolver
      if (!resolver) {
        this.fail(new TweenUsageError('Tween needs to be added to an engine before it can be validated.'))
        return false
      }
      const error = resolver.resolveAll(this)
      if (error) {
        this.fail(error)
        return false
      }
      this._validated = true
    }

    if (forceRender && !this.isTerminal) {
      this.prepareValues()
      if (this.state === 'failed') return false
      return this.apply(this.valueAtPosition(0))
    }
    return true
  }

  // ============================================================================
  // Control
  // ============================================================================

  /** Freeze at the current value. */
  stop(): void {
    this.complete('stop')
  }

  /** Jump to the end value. */
  finish(): void {
    this.complete('finish')
  }

  /** Jump back to the start value. */
  cancel(): void {
    this.complete('cancel')
  }

  /** Whether the active intervals of both tweens intersect. */
  overlaps(other: Tween): boolean {
    const start = this.startTime
    const end = start + this.duration
    const otherStart = other.startTime
    const otherEnd = otherStart + other.duration

    // Instant tweens are points inside the other interval
    if (this.duration === 0 || other.duration === 0) {
      return start <= otherEnd && otherStart <= end
    }
    return start < otherEnd && otherStart < end
  }

  /** Complete this tween on behalf of `other`, following other's overwrite settings. */
  overwrite(other: Tween): void {
    if (this.isTerminal || other === this) return

    const settings = other.options.overwrite
    if (settings === 'none') return
    if (settings.scope === 'overlapping' && !this.overlaps(other)) return

    this.options.log('debug', `Overwrite '${this.property}' on ${describeTarget(this.target)} with ${settings.method}.`)
    this.complete(settings.method, true)
  }

  retain(): void {
    this._retainCount++
  }

  release(): void {
    if (this._retainCount > 0) this._retainCount--
    if (this._retainCount === 0 && this._recycleOnRelease) {
      this._recycleOnRelease = false
      this._engine?.recycleTween(this)
    }
  }

  /** Mark the tween to be returned to the pool once its last retain is released. */
  recycleOnRelease(): void {
    this._recycleOnRelease = true
  }

  waitForCompletion(options: WaitOptions = {}): Promise<void> {
    const engine = this._engine
    if (!engine) {
      return Promise.reject(new TweenUsageError('Tween needs to be added to an engine before it can be waited on.'))
    }
    this.retain()
    return engine
      .waitUntil(() => this.isTerminal, options.signal)
      .finally(() => this.release())
  }

  // ============================================================================
  // Update
  // ============================================================================

  /** Advance the tween. Returns false once it no longer needs updates. */
  update(): boolean {
    if (this._state === 'unused' || this.isTerminal) return false

    if (this._validated && !this.targetAvailable()) {
      this.fail(
        new TargetNotFoundError(`Target of '${this.property}' is no longer available.`),
        'debug'
      )
      return false
    }

    if (this._state === 'uninitialized') {
      this.initialize()
    }
    if (this._state === 'waiting' && this.time >= this.startTime) {
      this.start()
    }

    if (this.isTerminal) return false
    if (this._state !== 'running') return true

    return this.step()
  }

  private step(): boolean {
    let position = this._duration > 0
      ? clamp01((this.time - this._startTime) / this._duration)
      : 1
    const done = position >= 1 - POSITION_EPSILON
    if (done) position = 1
    this._position = position

    const value = this.valueAtPosition(this._easing(position))
    if (this._state === 'failed') return false
    if (!this.apply(value)) return false

    if (this.options.hasListeners('update')) {
      this.emit('update')
    }
    if (this.isTerminal) return false

    if (done) {
      this.complete('complete')
      return false
    }
    return true
  }

  private initialize(): void {
    this._state = 'validating'
    if (!this.validate()) return

    this._state = 'waiting'
    this.doOverwrite('initialize')
    if (this.isTerminal) return
    this.emit('initialize')
  }

  private start(): void {
    this._state = 'running'

    this.prepareValues()
    if (this.state === 'failed') return

    this._startTime = this.startTime
    this._duration = this.duration
    this._easing = this.options.easing

    this.doOverwrite('start')
    if (this.isTerminal) return
    this.emit('start')
  }

  private complete(completedBy: CompletedBy, fromOverwrite = false): void {
    if (this.isTerminal || this._state === 'unused') return

    if (completedBy === 'cancel' || completedBy === 'finish') {
      if (!this.validate()) return
      this.prepareValues()
      if (this._state === 'failed') return

      const position = completedBy === 'cancel' ? 0 : 1
      if (!this.apply(this.valueAtPosition(position))) return
      this._position = position
    }

    this._state = STATE_AFTER[completedBy]
    this._completedBy = completedBy
    this._overwritten = fromOverwrite
    this.emit('complete')
    this.options.resetEvents()
  }

  private doOverwrite(when: OverwriteWhen): void {
    const settings = this.options.overwrite
    if (settings === 'none' || settings.when !== when) return
    this._engine?.overwrite(this)
  }

  private prepareValues(): void {
    if (this._valuesPrepared) return

    const target = this.target
    const getter = this._bindings.getter
    const arithmetic = this._bindings.arithmetic
    if (!target || !getter || !arithmetic) {
      this.fail(new TargetNotFoundError(`Cannot read start values of '${this.property}'.`))
      return
    }

    const read = this.guard(getter, () => getter.hook.get(target))
    if (!read.ok) return
    const math = arithmetic.hook

    const computed = this.guard(arithmetic, () => {
      switch (this._method) {
        case 'to':
          this._startValue = read.value
          this._diffValue = math.diff(this._startValue, this._endValue)
          break
        case 'from':
          this._endValue = read.value
          this._diffValue = math.diff(this._startValue, this._endValue)
          break
        case 'fromTo':
          this._diffValue = math.diff(this._startValue, this._endValue)
          break
        case 'by':
          this._startValue = read.value
          this._endValue = math.end(this._startValue, this._diffValue)
          break
      }
    })
    if (!computed.ok) return

    this._valuesPrepared = true
  }

  private valueAtPosition(position: number): unknown {
    const arithmetic = this._bindings.arithmetic
    if (!arithmetic) {
      this.fail(new TargetNotFoundError(`No arithmetic bound for '${this.property}'.`))
      return undefined
    }
    const result = this.guard(arithmetic, () =>
      arithmetic.hook.valueAtPosition(this._startValue, this._endValue, this._diffValue, position)
    )
    return result.ok ? result.value : undefined
  }

  private apply(value: unknown): boolean {
    if (this._state === 'failed') return false
    const target = this.target
    const setter = this._bindings.setter
    if (!target || !setter) {
      this.fail(new TargetNotFoundError(`Cannot write '${this.property}', target or setter missing.`))
      return false
    }
    const written = this.guard(setter, () => setter.hook.set(target, value))
    if (!written.ok) return false
    this._value = value
    return true
  }

  private guard<T>(binding: ProviderBinding, run: () => T): { ok: true; value: T } | { ok: false } {
    try {
      return { ok: true, value: run() }
    } catch (error) {
      this.fail(isTweenError(error) ? error : new HookFailedError(binding.plugin.name, binding.capability, error))
      return { ok: false }
    }
  }

  private targetAvailable(): boolean {
    const target = this.target
    if (!target) return false
    return this.options.isTargetAlive?.(target) ?? true
  }

  private fail(error: TweenError, level: 'debug' | 'error' = 'error'): void {
    if (this.isTerminal) return
    this._state = 'failed'
    this._error = error
    this.options.log(level, `Tween of '${this.property}' on ${describeTarget(this.target)} failed: ${error.message}`)
    this.emit('error')
  }

  private emit(event: TweenEventName): void {
    this.options.trigger({
      event,
      tween: this,
      completedBy: this._completedBy,
      overwritten: this._overwritten,
      error: this._error
    })
  }

  toString(): string {
    return `[Tween: ${this._method} '${this._property.raw}' on ${describeTarget(this.target)} in ${this._state}]`
  }
}
