import { TweenEngine } from './engine'
import type { TweenEngineConfig } from './engine'
import type { TweenGroup } from './group'
import type { TweenTemplate } from './options'
import { createTickDriver } from './rafCoordinator'
import type { TickDriver, TickDriverOptions } from './rafCoordinator'
import type { Tween } from './tween'

let defaultEngine: TweenEngine | null = null
let defaultDriver: TickDriver | null = null

export interface DefaultEngineOptions extends TweenEngineConfig {
  /** Drive the engine from the frame loop. Defaults to true. */
  autoTick?: boolean | TickDriverOptions
}

/**
 * Replace the shared engine. The previous one is disposed.
 * Pooling is on unless the config says otherwise.
 */
export function configureDefaultEngine(options: DefaultEngineOptions = {}): TweenEngine {
  disposeDefaultEngine()

  const { autoTick = true, ...config } = options
  const engine = new TweenEngine({ pool: true, ...config })
  if (autoTick !== false) {
    defaultDriver = createTickDriver(engine, autoTick === true ? {} : autoTick)
  }
  defaultEngine = engine
  return engine
}

/** Shared engine behind `Animate`, created on first use. */
export function getDefaultEngine(): TweenEngine {
  return defaultEngine ?? configureDefaultEngine()
}

export function disposeDefaultEngine(): void {
  defaultDriver?.stop()
  defaultDriver = null
  defaultEngine?.dispose()
  defaultEngine = null
}

/**
 * Shortcuts on the shared engine.
 *
 * @example
 * Animate.to(player, 0.5, 'position', { x: 10, y: 0 })
 * Animate.on(enemy).over(1).by('health', -20)
 */
export const Animate = {
  get engine(): TweenEngine {
    return getDefaultEngine()
  },

  to: (target: object, duration: number, property: string, to: unknown): Tween =>
    getDefaultEngine().to(target, duration, property, to),

  from: (target: object, duration: number, property: string, from: unknown): Tween =>
    getDefaultEngine().from(target, duration, property, from),

  fromTo: (target: object, duration: number, property: string, from: unknown, to: unknown): Tween =>
    getDefaultEngine().fromTo(target, duration, property, from, to),

  by: (target: object, duration: number, property: string, by: unknown): Tween =>
    getDefaultEngine().by(target, duration, property, by),

  on: (target: object, template?: TweenTemplate): TweenGroup =>
    getDefaultEngine().onTarget(target, template),

  group: (template?: TweenTemplate): TweenGroup =>
    getDefaultEngine().group(template),

  template: (): TweenTemplate =>
    getDefaultEngine().template(),

  has: (target: object, property?: string): boolean =>
    getDefaultEngine().has(target, property),

  stop: (target: object, property?: string): void =>
    getDefaultEngine().stop(target, property),

  finish: (target: object, property?: string): void =>
    getDefaultEngine().finish(target, property),

  cancel: (target: object, property?: string): void =>
    getDefaultEngine().cancel(target, property)
}
