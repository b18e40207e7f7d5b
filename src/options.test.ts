import { describe, expect, it, vi } from 'vitest'
import { OVERWRITE_PRESETS, TIMING_PRESETS } from './constants/defaults'
import { quadIn } from './easing'
import { TweenOptions } from './options'
import { Tween } from './tween'

describe('TweenOptions', () => {
  it('falls back through parents to the defaults', () => {
    const root = new TweenOptions()
    const child = new TweenOptions(root)

    expect(child.duration).toBeUndefined()
    expect(child.delay).toBe(0)
    expect(child.timing).toEqual(TIMING_PRESETS.DEFAULT)
    expect(child.overwrite).toEqual(OVERWRITE_PRESETS.DEFAULT)
    expect(child.recycle).toBe('all')
    expect(child.logLevel).toBe('warning')

    root.duration = 2
    root.easing = quadIn
    expect(child.duration).toBe(2)
    expect(child.easing).toBe(quadIn)

    child.duration = 0.5
    expect(child.duration).toBe(0.5)
    expect(root.duration).toBe(2)
  })

  it('ignores invalid durations with a warning', () => {
    const sink = vi.fn()
    const options = new TweenOptions()
    options.logSink = sink
    options.duration = 1
    options.duration = -3

    expect(options.duration).toBe(1)
    expect(sink).toHaveBeenCalledWith('warning', 'Ignoring invalid duration -3.')
  })

  it('filters log lines below the level', () => {
    const sink = vi.fn()
    const options = new TweenOptions()
    options.logSink = sink
    options.log('debug', 'hidden')
    options.logLevel = 'debug'
    options.log('debug', 'shown')

    expect(sink).toHaveBeenCalledTimes(1)
    expect(sink).toHaveBeenCalledWith('debug', 'shown')
  })

  it('loads parent plugins first and lets a child move and override them', () => {
    const root = new TweenOptions()
    root.enablePlugin('a', true, false)
    root.enablePlugin('b', true, false)

    const child = new TweenOptions(root)
    child.enablePlugin('a', false)
    child.enablePlugin('c', true, true)
    expect(child.collectPlugins().map(state => state.name)).toEqual(['b', 'c'])

    child.enablePlugin('a', true)
    expect(child.collectPlugins().map(state => `${state.name}:${state.required}`))
      .toEqual(['b:false', 'a:false', 'c:true'])
  })

  it('lists weak plugins from the closest scope outward', () => {
    const root = new TweenOptions()
    root.enablePlugin('a', true, false)
    root.enablePlugin('b', true, false)

    const middle = new TweenOptions(root)
    middle.enablePlugin('c', true, false)
    middle.enablePlugin('strong', true, true)

    const child = new TweenOptions(middle)
    child.enablePlugin('d', true, false)
    child.enablePlugin('a', true, false)
    expect(child.collectWeakPlugins().map(state => state.name)).toEqual(['d', 'a', 'c', 'b'])
  })

  it('updates a plugin state in place on the same scope', () => {
    const options = new TweenOptions()
    options.enablePlugin('a', true, false)
    options.enablePlugin('b', true, false)
    options.enablePlugin('a', false)
    options.enablePlugin('a', true)
    expect(options.pluginStates.map(state => state.name)).toEqual(['a', 'b'])
  })

  it('bubbles events to parent scopes and isolates throwing handlers', () => {
    const sink = vi.fn()
    const root = new TweenOptions()
    root.logSink = sink
    const child = new TweenOptions(root)

    const seen: string[] = []
    root.on('complete', event => { seen.push(`root:${event.event}`) })
    child.on('complete', () => { throw new Error('handler broke') })
    child.on('complete', event => { seen.push(`child:${event.event}`) })

    expect(child.hasListeners('complete')).toBe(true)
    expect(child.hasListeners('start')).toBe(false)

    child.trigger({ event: 'complete', tween: new Tween() })

    expect(seen).toEqual(['child:complete', 'root:complete'])
    expect(sink).toHaveBeenCalledWith('error', 'Exception in complete handler: handler broke')
  })
})
