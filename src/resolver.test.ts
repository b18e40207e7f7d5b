import { describe, expect, it } from 'vitest'
import { TweenEngine } from './engine'
import { ActivationFailedError } from './errors'
import { createNumberArithmetic, slerpPlugin } from './plugins'
import type { TweenPlugin } from './types'

class Knob {
  value = 1
}

function numberPlugin(name: string, accept = true): TweenPlugin {
  return {
    name,
    version: '1.0.0',
    capabilities: ['arithmetic'],
    autoProbe: tween => accept
      ? { ok: true, hooks: { arithmetic: createNumberArithmetic(tween.valueType) } }
      : { ok: false, error: new ActivationFailedError(name, 'declined') }
  }
}

describe('PluginResolver', () => {
  describe('default chain', () => {
    it('prefers taught accessors, then compiled, then reflective', () => {
      const engine = new TweenEngine()
      engine.accessors.teach(Knob, 'value', 'number', {
        get: knob => knob.value,
        set: (knob, value) => {
          if (typeof value === 'number') knob.value = value
        }
      })

      let level = 0
      const gauge = {
        get level() { return level },
        set level(value: number) { level = value }
      }

      const taught = engine.to(new Knob(), 1, 'value', 2)
      const plain = engine.to({ value: 1 }, 1, 'value', 2)
      const accessor = engine.to(gauge, 1, 'level', 2)

      expect(engine.resolver.resolve(taught, 'getter')).toMatchObject({
        ok: true,
        binding: { strength: 'weak', plugin: { name: 'staticAccessor' } }
      })
      expect(engine.resolver.resolve(plain, 'getter')).toMatchObject({
        ok: true,
        binding: { strength: 'weak', plugin: { name: 'compiledAccessor' } }
      })
      expect(engine.resolver.resolve(accessor, 'setter')).toMatchObject({
        ok: true,
        binding: { strength: 'weak', plugin: { name: 'reflectionAccessor' } }
      })
    })

    it('binds the closest scope\'s weak plugin ahead of the built-ins', () => {
      const engine = new TweenEngine()
      const tween = engine.onTarget({ x: 0 })
        .plugin(numberPlugin('stepped'), true, false)
        .over(1)
        .to('x', 10)

      expect(tween.validate()).toBe(true)
      expect(tween.getBinding('arithmetic')?.plugin.name).toBe('stepped')
      expect(tween.getBinding('arithmetic')?.strength).toBe('weak')
      expect(tween.getBinding('getter')?.plugin.name).toBe('compiledAccessor')
    })

    it('lets a group\'s weak plugin win over its template\'s', () => {
      const engine = new TweenEngine()
      const template = engine.template().plugin(numberPlugin('fromTemplate'), true, false)
      const tween = engine.onTarget({ x: 0 }, template)
        .plugin(numberPlugin('fromGroup'), true, false)
        .over(1)
        .to('x', 10)

      expect(engine.resolver.resolve(tween, 'arithmetic')).toMatchObject({
        ok: true,
        binding: { plugin: { name: 'fromGroup' } }
      })
    })

    it('falls back to the built-ins when a scope plugin declines', () => {
      const engine = new TweenEngine()
      const tween = engine.onTarget({ x: 0 })
        .plugin(numberPlugin('picky', false), true, false)
        .over(1)
        .to('x', 10)

      expect(engine.resolver.resolve(tween, 'arithmetic')).toMatchObject({
        ok: true,
        binding: { strength: 'weak', plugin: { name: 'staticArithmetic' } }
      })
    })
  })

  describe('explicit requests', () => {
    it('binds the requested plugin strongly', () => {
      const engine = new TweenEngine()
      const tween = engine.to({ angle: 350 }, 1, 'angle', 10)

      expect(engine.resolver.resolve(tween, 'arithmetic', slerpPlugin)).toMatchObject({
        ok: true,
        binding: { strength: 'strong', plugin: { name: 'slerp' } }
      })
      expect(tween.getBinding('arithmetic')?.plugin).toBe(slerpPlugin)
    })

    it('wraps a plugin that throws while activating', () => {
      const engine = new TweenEngine()
      const tween = engine.to({ x: 0 }, 1, 'x', 10)
      const broken: TweenPlugin = {
        name: 'broken',
        version: '1.0.0',
        capabilities: ['arithmetic'],
        manualProbe: () => {
          throw new Error('activation exploded')
        }
      }

      const result = engine.resolver.resolve(tween, 'arithmetic', broken)
      expect(result.ok).toBe(false)
      if (result.ok) return
      expect(result.error).toBeInstanceOf(ActivationFailedError)
      expect(result.error.message).toBe("Plugin 'broken' could not be activated: activation exploded")
      expect(result.error.cause).toBeInstanceOf(Error)
      expect(tween.getBinding('arithmetic')).toBeUndefined()
    })

    it('wraps a plugin that declines an explicit request', () => {
      const engine = new TweenEngine()
      const tween = engine.to({ x: 0 }, 1, 'x', 10)
      const compiled = engine.registry.getPlugin('compiledArithmetic')
      if (!compiled) throw new Error('compiledArithmetic missing')

      const result = engine.resolver.resolve(tween, 'arithmetic', compiled)
      expect(result.ok).toBe(false)
      if (result.ok) return
      expect(result.error).toBeInstanceOf(ActivationFailedError)
      expect(result.error.message).toBe(
        "Plugin 'compiledArithmetic' could not be activated: " +
        "Cannot compile arithmetic for 'number', expected a plain record of numbers."
      )
    })

    it('never lets a weak request replace a strong binding', () => {
      const engine = new TweenEngine()
      const tween = engine.to({ angle: 350 }, 1, 'angle', 10)
      engine.resolver.resolve(tween, 'arithmetic', slerpPlugin)

      expect(engine.resolver.resolve(tween, 'arithmetic')).toMatchObject({
        ok: true,
        binding: { strength: 'strong', plugin: { name: 'slerp' } }
      })
      expect(tween.getBinding('arithmetic')?.plugin.name).toBe('slerp')
    })
  })
})
