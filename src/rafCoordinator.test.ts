import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { TweenEngine } from './engine'
import { createRafControls, createTickDriver, isFrameLoopRunning } from './rafCoordinator'

describe('rafCoordinator', () => {
  beforeEach(() => {
    vi.useFakeTimers()
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it('passes frame deltas to subscribers and stops without them', () => {
    const frames: number[] = []
    const controls = createRafControls(({ delta }) => { frames.push(delta) })

    vi.advanceTimersByTime(16 * 3)
    expect(frames).toEqual([0, 16, 16])

    controls.pause()
    expect(isFrameLoopRunning()).toBe(false)
    vi.advanceTimersByTime(16 * 3)
    expect(frames).toHaveLength(3)
  })

  it('does not start until resumed when not immediate', () => {
    const callback = vi.fn()
    const controls = createRafControls(callback, { immediate: false })

    vi.advanceTimersByTime(100)
    expect(callback).not.toHaveBeenCalled()

    controls.resume()
    vi.advanceTimersByTime(16)
    expect(callback).toHaveBeenCalledTimes(1)
    controls.pause()
  })

  it('drives an engine while it has work', () => {
    const engine = new TweenEngine()
    const driver = createTickDriver(engine)
    const box = { x: 0 }
    engine.to(box, 0.064, 'x', 64)
    expect(isFrameLoopRunning()).toBe(true)

    // First frame only establishes the timestamp
    vi.advanceTimersByTime(16)
    expect(engine.time).toBe(0)

    vi.advanceTimersByTime(16 * 4)
    expect(box.x).toBe(64)
    expect(engine.activeGroups).toEqual([])
    expect(isFrameLoopRunning()).toBe(false)

    driver.stop()
  })

  it('caps long frames', () => {
    const engine = new TweenEngine()
    const driver = createTickDriver(engine, { maxDelta: 0.01 })
    engine.to({ x: 0 }, 1, 'x', 1)

    vi.advanceTimersByTime(16)
    vi.advanceTimersByTime(16)
    expect(engine.time).toBe(0.01)

    driver.stop()
    expect(isFrameLoopRunning()).toBe(false)
  })
})
