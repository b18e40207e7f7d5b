import type { TweenEngine } from './engine'
import { TweenUsageError } from './errors'
import { TweenOptionsContainer } from './options'
import type { TweenOptions } from './options'
import type { Tween, WaitOptions } from './tween'
import type { TimingPhase, TweenRequest, TweenShortcutOptions } from './types'

/**
 * Tween Group - owns tweens and steps them per timing phase.
 *
 * New tweens wait in the pending list until the next update of any phase.
 * They get their first step in reverse insertion order, so a tween added
 * later overwrites one added earlier in the same frame, and then move into
 * the bucket of their timing phase.
 */
export class TweenGroup extends TweenOptionsContainer {
  private pending: Tween[] = []
  private buckets: Record<TimingPhase, Tween[]> = {
    update: [],
    physics: [],
    late: []
  }

  private _inUse = false
  private _defaultTarget: object | undefined
  private _engine: TweenEngine | undefined
  private _retainCount = 0
  private _recycleOnRelease = false

  use(target: object | undefined, parentOptions: TweenOptions, engine: TweenEngine): void {
    if (this._inUse) {
      throw new TweenUsageError('TweenGroup instance already in use.')
    }
    this._inUse = true

    this._defaultTarget = target
    this.options.parent = parentOptions
    this._engine = engine
  }

  reset(): void {
    this.options.reset()

    this._inUse = false
    this._defaultTarget = undefined
    this._engine = undefined
    this._retainCount = 0
    this._recycleOnRelease = false

    this.pending = []
    this.buckets = { update: [], physics: [], late: [] }
  }

  get inUse(): boolean {
    return this._inUse
  }

  get defaultTarget(): object | undefined {
    return this._defaultTarget
  }

  get engine(): TweenEngine | undefined {
    return this._engine
  }

  /** Number of tweens in the pending list and all phase buckets. */
  get size(): number {
    return this.pending.length
      + this.buckets.update.length
      + this.buckets.physics.length
      + this.buckets.late.length
  }

  // ============================================================================
  // Adding tweens
  // ============================================================================

  add(tween: Tween): this {
    const engine = this.requireEngine('add tweens')

    tween.options.parent = this.options
    tween.attach(engine, this._defaultTarget)

    const wasEmpty = this.size === 0
    this.pending.push(tween)

    // Register when going from empty to non-empty
    if (wasEmpty) {
      engine.registerGroup(this)
    }
    return this
  }

  to(property: string, to: unknown, options: TweenShortcutOptions = {}): Tween {
    return this.create({ ...options, method: 'to', property, to })
  }

  from(property: string, from: unknown, options: TweenShortcutOptions = {}): Tween {
    return this.create({ ...options, method: 'from', property, from })
  }

  fromTo(property: string, from: unknown, to: unknown, options: TweenShortcutOptions = {}): Tween {
    return this.create({ ...options, method: 'fromTo', property, from, to })
  }

  by(property: string, by: unknown, options: TweenShortcutOptions = {}): Tween {
    return this.create({ ...options, method: 'by', property, by })
  }

  private create(request: TweenRequest): Tween {
    const engine = this.requireEngine('create tweens')
    const tween = engine.createTween(request)
    this.add(tween)
    return tween
  }

  // ============================================================================
  // Queries & bulk control
  // ============================================================================

  private allTweens(): Tween[] {
    return [
      ...this.pending,
      ...this.buckets.update,
      ...this.buckets.physics,
      ...this.buckets.late
    ]
  }

  private matching(target?: object, property?: string): Tween[] {
    return this.allTweens().filter(tween =>
      (property === undefined || tween.property === property)
      && (target === undefined || tween.target === target)
    )
  }

  /** Whether the group holds any tween, or any on the given target and property. */
  has(target?: object, property?: string): boolean {
    if (target === undefined && property === undefined) {
      return this.size > 0
    }
    return this.matching(target, property).length > 0
  }

  stop(target?: object, property?: string): void {
    this.matching(target, property).forEach(tween => tween.stop())
  }

  finish(target?: object, property?: string): void {
    this.matching(target, property).forEach(tween => tween.finish())
  }

  cancel(target?: object, property?: string): void {
    this.matching(target, property).forEach(tween => tween.cancel())
  }

  validate(forceRender = false): boolean {
    let valid = true
    this.allTweens().forEach(tween => {
      valid = tween.validate(forceRender) && valid
    })
    return valid
  }

  /** Let every tween on the same target and property react to `tween`. */
  overwrite(tween: Tween): void {
    const lists = [this.pending, this.buckets.update, this.buckets.physics, this.buckets.late]
    for (const list of lists) {
      for (let i = 0; i < list.length; i++) {
        const other = list[i]
        if (other && other.target === tween.target && other.property === tween.property) {
          other.overwrite(tween)
        }
      }
    }
  }

  // ============================================================================
  // Waiting
  // ============================================================================

  /** Resolves on the first tick after the group ran out of tweens. */
  waitForCompletion(options: WaitOptions = {}): Promise<void> {
    if (!this._engine) {
      return Promise.reject(new TweenUsageError('Group needs to be added to an engine before it can be waited on.'))
    }
    this.retain()
    return this._engine
      .waitUntil(() => !this.has(), options.signal)
      .finally(() => this.release())
  }

  retain(): void {
    this._retainCount++
  }

  release(): void {
    if (this._retainCount > 0) this._retainCount--
    if (this._retainCount === 0 && this._recycleOnRelease) {
      this._recycleOnRelease = false
      this._engine?.recycleGroup(this)
    }
  }

  get retainCount(): number {
    return this._retainCount
  }

  recycleOnRelease(): void {
    this._recycleOnRelease = true
  }

  // ============================================================================
  // Engine
  // ============================================================================

  /**
   * Promote pending tweens, then step the bucket of `phase`.
   * Returns whether the group still holds any tween.
   */
  update(phase: TimingPhase): boolean {
    const engine = this._engine
    if (!this._inUse || !engine) return false

    const bucket = this.buckets[phase]
    const stepCount = bucket.length

    const promoting = this.pending.length
    if (promoting > 0) {
      const discarded: Tween[] = []
      // Reverse order: later tweens overwrite earlier ones
      for (let i = promoting - 1; i >= 0; i--) {
        if (!this._inUse) return false
        const tween = this.pending[i]
        if (!tween) continue
        if (tween.update()) {
          this.buckets[tween.options.timing.phase].push(tween)
        } else {
          discarded.push(tween)
        }
      }
      this.pending.splice(0, promoting)
      discarded.forEach(tween => engine.recycleTween(tween))
    }

    // Tweens promoted above already had their step for this tick
    let count = stepCount
    for (let i = 0; i < count; i++) {
      if (!this._inUse) return false
      const tween = bucket[i]
      if (!tween) continue
      if (!tween.update()) {
        bucket.splice(i, 1)
        i--
        count--
        engine.recycleTween(tween)
      }
    }

    return this.has()
  }

  private requireEngine(action: string): TweenEngine {
    if (!this._inUse || !this._engine) {
      throw new TweenUsageError(`Cannot ${action} on a group that is not in use.`)
    }
    return this._engine
  }
}
