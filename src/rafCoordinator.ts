import { FALLBACK_FRAME_MS } from './constants/defaults'
import type { TweenEngine } from './engine'

type FrameCallback = (time: number) => void

/** Schedules one frame and returns its cancel function. */
type FrameScheduler = (cb: FrameCallback) => () => void

const hasWindow = typeof window !== 'undefined'

const scheduleFrame: FrameScheduler =
  hasWindow && typeof window.requestAnimationFrame === 'function'
    ? (cb) => {
        const id = window.requestAnimationFrame(cb)
        return () => window.cancelAnimationFrame(id)
      }
    : (cb) => {
        const id = setTimeout(() => cb(Date.now()), FALLBACK_FRAME_MS)
        return () => clearTimeout(id)
      }

class RafCoordinator {
  private callbacks = new Map<symbol, FrameCallback>()
  private cancelFrame: (() => void) | null = null

  add(callback: FrameCallback): symbol {
    const id = Symbol('raf-subscriber')
    this.callbacks.set(id, callback)
    this.ensureLoop()
    return id
  }

  remove(id: symbol): void {
    if (!this.callbacks.has(id)) return
    this.callbacks.delete(id)

    if (this.callbacks.size === 0 && this.cancelFrame !== null) {
      this.cancelFrame()
      this.cancelFrame = null
    }
  }

  get running(): boolean {
    return this.cancelFrame !== null
  }

  private ensureLoop(): void {
    if (this.cancelFrame !== null) return
    const step = (timestamp: number) => {
      this.callbacks.forEach(cb => cb(timestamp))
      if (this.callbacks.size > 0) {
        this.cancelFrame = scheduleFrame(step)
      } else {
        this.cancelFrame = null
      }
    }

    this.cancelFrame = scheduleFrame(step)
  }
}

const coordinator = new RafCoordinator()

/** Whether the shared frame loop is scheduled. */
export function isFrameLoopRunning(): boolean {
  return coordinator.running
}

export interface RafControls {
  pause: () => void
  resume: () => void
}

interface CreateRafOptions {
  immediate?: boolean
}

export function createRafControls(
  callback: (ctx: { timestamp: number; delta: number }) => void,
  options?: CreateRafOptions
): RafControls {
  let subscriptionId: symbol | null = null
  let lastTimestamp = 0

  const wrappedCallback = (timestamp: number) => {
    const delta = lastTimestamp ? timestamp - lastTimestamp : 0
    lastTimestamp = timestamp
    callback({ timestamp, delta })
  }

  const resume = () => {
    if (subscriptionId) return
    lastTimestamp = 0
    subscriptionId = coordinator.add(wrappedCallback)
  }

  const pause = () => {
    if (!subscriptionId) return
    coordinator.remove(subscriptionId)
    subscriptionId = null
    lastTimestamp = 0
  }

  if (options?.immediate !== false) {
    resume()
  }

  return { pause, resume }
}

// ============================================================================
// Engine driver
// ============================================================================

export interface TickDriverOptions {
  /** Longest step in seconds a single frame may advance the engine by. */
  maxDelta?: number
}

export interface TickDriver extends RafControls {
  /** Detach from the engine and stop the loop. */
  stop: () => void
}

/**
 * Drive `engine.tick()` from the shared frame loop. The engine resumes the
 * driver when a group registers and pauses it once nothing is left to step.
 */
export function createTickDriver(engine: TweenEngine, options: TickDriverOptions = {}): TickDriver {
  const maxDelta = options.maxDelta ?? Infinity

  const controls = createRafControls(({ delta }) => {
    engine.tick(Math.min(delta / 1000, maxDelta))
  }, { immediate: false })

  engine.usePump(controls)

  return {
    ...controls,
    stop: () => engine.usePump(undefined)
  }
}
