import { describe, expect, it } from 'vitest'
import { compiledAccessorPlugin } from './compiledAccessorPlugin'
import { reflectionAccessorPlugin } from './reflectionAccessorPlugin'
import { createStaticAccessorPlugin } from './staticAccessorPlugin'
import { AccessorTable } from './staticTables'
import { structPlugin } from './structPlugin'
import type { CapabilityHooks, PluginProbe, ProbeResult, TweenInfo } from '../types'

class Sprite {
  private opacity = 1

  getOpacity(): number {
    return this.opacity
  }

  setOpacity(value: number): void {
    this.opacity = value
  }
}

class BigSprite extends Sprite {}

class Gauge {
  private _level = 3

  get level(): number {
    return this._level
  }

  set level(value: number) {
    this._level = value
  }

  get max(): number {
    return 10
  }
}

function info(target: object | undefined, property: string, valueType = 'number'): TweenInfo {
  return { target, property, propertyOptions: [], valueType, method: 'to', sampleValue: 0 }
}

function probeOf(probe: PluginProbe | undefined): PluginProbe {
  if (!probe) throw new Error('probe missing')
  return probe
}

function hooksOf(result: ProbeResult): Partial<CapabilityHooks> {
  if (!result.ok) throw result.error
  return result.hooks
}

function errorOf(result: ProbeResult): string {
  if (result.ok) throw new Error('expected the probe to fail')
  return `${result.error.name}: ${result.error.message}`
}

describe('static accessors', () => {
  const table = new AccessorTable()
  table.teach(Sprite, 'opacity', 'number', {
    get: sprite => sprite.getOpacity(),
    set: (sprite, value) => {
      if (typeof value === 'number') sprite.setOpacity(value)
    }
  })
  const probe = probeOf(createStaticAccessorPlugin(table).autoProbe)

  it('reads and writes through taught accessors, subclasses included', () => {
    const sprite = new BigSprite()
    const hooks = hooksOf(probe(info(sprite, 'opacity')))
    hooks.setter?.set(sprite, 0.25)
    expect(sprite.getOpacity()).toBe(0.25)
    expect(hooks.getter?.get(sprite)).toBe(0.25)
  })

  it('misses properties and value types nobody taught', () => {
    expect(errorOf(probe(info(new Sprite(), 'opacity', 'vec2'))))
      .toBe('TargetNotFoundError: No accessor taught for Sprite.opacity (vec2).')
    expect(errorOf(probe(info({}, 'opacity'))))
      .toBe('TargetNotFoundError: No accessor taught for object.opacity (number).')
  })

  it('forgets a taught accessor', () => {
    const scratch = new AccessorTable()
    scratch.teach(Sprite, 'opacity', 'number', { get: () => 1, set: () => {} })
    expect(scratch.size).toBe(1)

    expect(scratch.forget(Sprite, 'opacity', 'number')).toBe(true)
    expect(scratch.forget(Sprite, 'opacity', 'number')).toBe(false)
    expect(scratch.find(new Sprite(), 'opacity', 'number')).toBeUndefined()
    expect(scratch.size).toBe(0)
  })

  it('refuses to be taught while locked', () => {
    table.lock()
    expect(() => table.teach(Sprite, 'scale', 'number', { get: () => 1, set: () => {} }))
      .toThrow("Cannot teach 'scale' while the engine is ticking.")
    table.unlock()
    expect(table.locked).toBe(false)
  })
})

describe('compiled accessors', () => {
  const probe = probeOf(compiledAccessorPlugin.autoProbe)

  it('walks nested data properties', () => {
    const target = { body: { position: { x: 1 } } }
    const hooks = hooksOf(probe(info(target, 'body.position.x')))
    hooks.setter?.set(target, 7)
    expect(target.body.position.x).toBe(7)
    expect(hooks.getter?.get(target)).toBe(7)
  })

  it('reports a missing member', () => {
    expect(errorOf(probe(info({ x: 1 }, 'y'))))
      .toBe("TargetNotFoundError: Member 'y' not found on object.")
    expect(errorOf(probe(info({ body: {} }, 'limb.x'))))
      .toBe("TargetNotFoundError: Member 'limb' not found on object.")
  })

  it('reports a type mismatch', () => {
    expect(errorOf(probe(info({ label: 'hi' }, 'label'))))
      .toBe("TypeMismatchError: Property 'label' is of type 'string', tween expects 'number'.")
  })

  it('rejects members of copied values', () => {
    expect(errorOf(probe(info({ size: 4 }, 'size.width'))))
      .toBe("ValueTypeUnsupportedError: 'size' holds a number value, its members cannot be written in place. Maybe use the struct plugin?")
    expect(errorOf(probe(info({ pos: Object.freeze({ x: 1, y: 2 }) }, 'pos.x'))))
      .toBe("ValueTypeUnsupportedError: 'pos' is a frozen value, its members cannot be written in place. Maybe use the struct plugin?")
  })

  it('leaves accessor properties to the reflective plugin', () => {
    expect(errorOf(probe(info(new Gauge(), 'level'))))
      .toBe("ActivationFailedError: Plugin 'compiledAccessor' could not be activated: 'level' is an accessor property")
  })
})

describe('reflective accessors', () => {
  const probe = probeOf(reflectionAccessorPlugin.autoProbe)

  it('uses getter and setter pairs', () => {
    const gauge = new Gauge()
    const hooks = hooksOf(probe(info(gauge, 'level')))
    expect(hooks.getter?.get(gauge)).toBe(3)
    hooks.setter?.set(gauge, 8)
    expect(gauge.level).toBe(8)
  })

  it('refuses getters without a setter', () => {
    expect(errorOf(probe(info(new Gauge(), 'max'))))
      .toBe("ActivationFailedError: Plugin 'reflectionAccessor' could not be activated: 'max' is read-only")
  })

  it('reads and writes map entries', () => {
    const target = { stats: new Map<string, number>([['speed', 2]]) }
    const hooks = hooksOf(probe(info(target, 'stats.speed')))
    hooks.setter?.set(target, 5)
    expect(target.stats.get('speed')).toBe(5)
  })
})

describe('struct plugin', () => {
  const probe = probeOf(structPlugin.manualProbe)

  it('writes a copy of a frozen record back to its owner', () => {
    const original = Object.freeze({ x: 1, y: 2 })
    const target = { pos: original }
    const hooks = hooksOf(probe(info(target, 'pos.x')))

    hooks.setter?.set(target, 4)
    expect(target.pos).toEqual({ x: 4, y: 2 })
    expect(target.pos).not.toBe(original)
    expect(Object.isFrozen(target.pos)).toBe(true)
    expect(original.x).toBe(1)
  })

  it('needs a container and a member', () => {
    expect(errorOf(probe(info({ x: 1 }, 'x'))))
      .toBe("ActivationFailedError: Plugin 'struct' could not be activated: 'x' must have the form 'container.member'")
  })

  it('has no auto probe', () => {
    expect(structPlugin.autoProbe).toBeUndefined()
  })
})
