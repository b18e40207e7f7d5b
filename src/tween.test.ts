import { describe, expect, it, vi } from 'vitest'
import { TweenEngine } from './engine'
import {
  ActivationFailedError,
  ArithmeticUnsupportedError,
  PluginConflictError,
  TargetNotFoundError,
  TypeMismatchError,
  ValueTypeUnsupportedError
} from './errors'
import { createFollowPlugin, createNumberArithmetic, slerpPlugin } from './plugins'
import { Tween } from './tween'
import type { TweenEvent, TweenPlugin } from './types'

function setup() {
  const sink = vi.fn()
  const engine = new TweenEngine({ logSink: sink })
  return { engine, sink }
}

describe('Tween', () => {
  describe('methods', () => {
    it('to: reads the start from the target', () => {
      const { engine } = setup()
      const box = { x: 2 }
      engine.to(box, 1, 'x', 10)

      engine.tick(0.5)
      expect(box.x).toBe(6)
      engine.tick(0.5)
      expect(box.x).toBe(10)
    })

    it('from: animates from the given value back to the current one', () => {
      const { engine } = setup()
      const box = { x: 10 }
      engine.from(box, 1, 'x', 0)

      engine.tick(0.5)
      expect(box.x).toBe(5)
      engine.tick(0.5)
      expect(box.x).toBe(10)
    })

    it('fromTo: ignores the current value', () => {
      const { engine } = setup()
      const box = { x: 100 }
      engine.fromTo(box, 1, 'x', 0, 10)

      engine.tick(0.25)
      expect(box.x).toBe(2.5)
    })

    it('by: offsets the current value', () => {
      const { engine } = setup()
      const box = { x: 2 }
      const tween = engine.by(box, 1, 'x', 4)

      engine.tick(0.5)
      expect(box.x).toBe(4)
      expect(tween.endValue).toBe(6)
    })

    it('completes immediately without a duration', () => {
      const { engine } = setup()
      const box = { x: 0 }
      const tween = engine.singles.to('x', 3, { target: box })

      engine.tick(0.016)
      expect(box.x).toBe(3)
      expect(tween.state).toBe('finished')
      expect(tween.completedBy).toBe('complete')
    })
  })

  describe('timing', () => {
    it('waits for its start delay', () => {
      const { engine } = setup()
      const box = { x: 0 }
      const tween = engine.to(box, 1, 'x', 10).delay(1)

      engine.tick(0.5)
      expect(tween.state).toBe('waiting')
      expect(box.x).toBe(0)
      engine.tick(0.5)
      expect(tween.state).toBe('running')
      expect(box.x).toBe(0)
      engine.tick(0.5)
      expect(box.x).toBe(5)
    })

    it('follows the unscaled clock when asked to', () => {
      const { engine } = setup()
      engine.timeScale = 0
      const scaled = { x: 0 }
      const menu = { x: 0 }
      engine.to(scaled, 1, 'x', 10)
      engine.to(menu, 1, 'x', 10).timing({ clock: 'unscaled' })

      engine.tick(0.5)
      expect(scaled.x).toBe(0)
      expect(menu.x).toBe(5)
    })

    it('eases the position', () => {
      const { engine } = setup()
      const box = { x: 0 }
      engine.to(box, 1, 'x', 10).ease('quadIn')

      engine.tick(0.5)
      expect(box.x).toBe(2.5)
    })
  })

  describe('control', () => {
    it('stop freezes the current value', () => {
      const { engine } = setup()
      const box = { x: 0 }
      const tween = engine.to(box, 1, 'x', 10)

      engine.tick(0.5)
      tween.stop()
      engine.tick(0.25)
      engine.tick(0.25)

      expect(box.x).toBe(5)
      expect(tween.state).toBe('stopped')
      expect(tween.completedBy).toBe('stop')
    })

    it('finish writes the end value', () => {
      const { engine } = setup()
      const box = { x: 0 }
      const tween = engine.to(box, 1, 'x', 10)

      engine.tick(0.25)
      tween.finish()
      expect(box.x).toBe(10)
      expect(tween.state).toBe('finished')
      expect(tween.position).toBe(1)
    })

    it('cancel writes the start value back', () => {
      const { engine } = setup()
      const box = { x: 4 }
      const tween = engine.to(box, 1, 'x', 10)

      engine.tick(0.5)
      expect(box.x).toBe(7)
      tween.cancel()
      expect(box.x).toBe(4)
      expect(tween.state).toBe('canceled')
    })

    it('cancel before the first update still resolves and restores', () => {
      const { engine } = setup()
      const box = { x: 4 }
      const tween = engine.to(box, 1, 'x', 10)

      tween.cancel()
      expect(box.x).toBe(4)
      expect(tween.state).toBe('canceled')
    })

    it('emits lifecycle events in order', () => {
      const { engine } = setup()
      const box = { x: 0 }
      const events: string[] = []
      const record = (event: TweenEvent) => { events.push(event.event) }
      engine.to(box, 0.5, 'x', 1)
        .on('initialize', record)
        .on('start', record)
        .on('update', record)
        .on('complete', record)

      engine.tick(0.25)
      engine.tick(0.25)
      expect(events).toEqual(['initialize', 'start', 'update', 'update', 'complete'])
    })

    it('cannot be used twice without a reset', () => {
      const { engine } = setup()
      const tween = new Tween().use({ method: 'to', property: 'x', to: 1 }, engine)
      expect(() => tween.use({ method: 'to', property: 'x', to: 1 }, engine))
        .toThrow('Trying to re-use a tween that has not been reset yet.')

      tween.reset()
      expect(tween.state).toBe('unused')
      expect(() => tween.use({ method: 'to', property: 'x', to: 1 }, engine)).not.toThrow()
    })
  })

  describe('resolution failures', () => {
    it('fails on a missing member and logs it with context', () => {
      const { engine, sink } = setup()
      const box = { x: 0 }
      const tween = engine.to(box, 1, 'nope', 1)

      engine.tick(0.1)
      expect(tween.state).toBe('failed')
      expect(tween.error).toBeInstanceOf(TargetNotFoundError)
      expect(sink).toHaveBeenCalledWith(
        'error',
        "Tween of 'nope' on object failed: No accessor taught for object.nope (number)."
      )
    })

    it('prefers a type mismatch over a missing accessor', () => {
      const { engine } = setup()
      const tween = engine.to({ x: 'left' }, 1, 'x', 1)

      expect(tween.validate()).toBe(false)
      expect(tween.error).toBeInstanceOf(TypeMismatchError)
      expect(tween.error?.message).toBe("Property 'x' is of type 'string', tween expects 'number'.")
    })

    it('refuses members of frozen values', () => {
      const { engine } = setup()
      const tween = engine.to({ pos: Object.freeze({ x: 0, y: 0 }) }, 1, 'pos.x', 1)

      expect(tween.validate()).toBe(false)
      expect(tween.error).toBeInstanceOf(ValueTypeUnsupportedError)
    })

    it('tweens members of frozen values through the struct plugin', () => {
      const { engine } = setup()
      const ship = { pos: Object.freeze({ x: 0, y: 0 }) }
      engine.to(ship, 1, 'pos.x', 10).plugin('struct')

      engine.tick(0.5)
      expect(ship.pos).toEqual({ x: 5, y: 0 })
      expect(Object.isFrozen(ship.pos)).toBe(true)
    })

    it('reports values without arithmetic', () => {
      const { engine } = setup()
      const tween = engine.to({ label: 'a' }, 1, 'label', 'b')

      expect(tween.validate()).toBe(false)
      expect(tween.error).toBeInstanceOf(ArithmeticUnsupportedError)
      expect(tween.error?.message).toBe("No arithmetic available for value type 'string'.")
    })

    it('does not take down its siblings', () => {
      const { engine } = setup()
      const box = { x: 0 }
      engine.to(box, 1, 'missing', 1)
      engine.to(box, 1, 'x', 10)

      engine.tick(0.5)
      expect(box.x).toBe(5)
    })

    it('fails when its target is no longer alive', () => {
      const { engine, sink } = setup()
      let alive = true
      engine.options.isTargetAlive = () => alive
      const box = { x: 0 }
      const tween = engine.to(box, 1, 'x', 10)

      engine.tick(0.5)
      alive = false
      engine.tick(0.25)

      expect(box.x).toBe(5)
      expect(tween.state).toBe('failed')
      expect(tween.error).toBeInstanceOf(TargetNotFoundError)
      expect(sink).not.toHaveBeenCalledWith('error', expect.any(String))
    })
  })

  describe('plugin requests', () => {
    const locked: TweenPlugin = {
      name: 'locked',
      version: '1.0.0',
      capabilities: ['arithmetic'],
      overwritable: false,
      manualProbe: () => ({ ok: true, hooks: { arithmetic: createNumberArithmetic('number') } })
    }

    it('binds an explicit plugin regardless of chain order', () => {
      const { engine } = setup()
      const tween = engine.to({ angle: 350 }, 1, 'angle', 10).plugin(slerpPlugin)

      expect(tween.validate()).toBe(true)
      expect(tween.getBinding('arithmetic')?.plugin.name).toBe('slerp')
      expect(tween.getBinding('arithmetic')?.strength).toBe('strong')
      expect(tween.getBinding('getter')?.strength).toBe('weak')
    })

    it('rebinds right away when a plugin is requested after validation', () => {
      const { engine } = setup()
      const tween = engine.to({ angle: 350 }, 1, 'angle', 10)

      expect(tween.validate()).toBe(true)
      expect(tween.getBinding('arithmetic')?.plugin.name).toBe('staticArithmetic')
      tween.plugin(slerpPlugin)
      expect(tween.getBinding('arithmetic')?.plugin.name).toBe('slerp')
    })

    it('fails loudly when a second explicit plugin conflicts', () => {
      const { engine, sink } = setup()
      const tween = engine.to({ x: 0 }, 1, 'x', 10).plugin(locked)

      expect(tween.validate()).toBe(true)
      tween.plugin(slerpPlugin)

      expect(tween.state).toBe('failed')
      expect(tween.error).toBeInstanceOf(PluginConflictError)
      expect(tween.error?.message)
        .toBe("Plugin 'slerp' could not be activated: arithmetic is already bound to 'locked', which cannot be overwritten")
      expect(sink).toHaveBeenCalledWith('error', expect.stringContaining('which cannot be overwritten'))
    })

    it('reports explicit activation failures', () => {
      const { engine } = setup()
      const tween = engine.to({ x: 0 }, 1, 'x', 10).plugin('compiledArithmetic')

      expect(tween.validate()).toBe(false)
      expect(tween.error).toBeInstanceOf(ActivationFailedError)
      expect(tween.error?.message).toBe(
        "Plugin 'compiledArithmetic' could not be activated: " +
        "Cannot compile arithmetic for 'number', expected a plain record of numbers."
      )
    })

    it('goes the short way round with :slerp:', () => {
      const { engine } = setup()
      const dial = { angle: 350 }
      engine.to(dial, 1, ':slerp:angle', 10)

      engine.tick(0.5)
      expect(dial.angle).toBe(360)
      engine.tick(0.5)
      expect(dial.angle).toBe(370)
    })

    it('follows a moving goal', () => {
      const { engine } = setup()
      let goal = 10
      const box = { x: 0 }
      engine.to(box, 1, 'x', goal).plugin(createFollowPlugin(() => goal))

      engine.tick(0.5)
      expect(box.x).toBe(5)
      goal = 20
      engine.tick(0.5)
      expect(box.x).toBe(20)
    })
  })
})
