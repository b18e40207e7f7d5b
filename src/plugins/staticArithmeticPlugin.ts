import { PLUGIN_PRIORITY } from '../constants/defaults'
import { ArithmeticUnsupportedError } from '../errors'
import type { TweenPlugin } from '../types'
import { createComponentArithmetic, createNumberArithmetic } from './componentMath'
import type { ArithmeticTable } from './staticTables'

/**
 * Static arithmetic - per-value-type formulas enabled ahead of time.
 *
 * Every built-in entry reconstructs the end value as `start + diff`, so
 * `end(start, diff(start, end))` returns `end` for all of them.
 */
export function registerBuiltInArithmetic(table: ArithmeticTable): void {
  table.enable('number', createNumberArithmetic('number'))
  table.enable('integer', createNumberArithmetic('integer', Math.trunc))
  table.enable('vec2', createComponentArithmetic(['x', 'y'], 'vec2'))
  table.enable('vec3', createComponentArithmetic(['x', 'y', 'z'], 'vec3'))
  table.enable('color', createComponentArithmetic(['r', 'g', 'b', 'a'], 'color', { a: 1 }))
}

export function createStaticArithmeticPlugin(table: ArithmeticTable): TweenPlugin {
  return {
    name: 'staticArithmetic',
    version: '1.0.0',
    capabilities: ['arithmetic'],
    priority: PLUGIN_PRIORITY.STATIC,

    autoProbe: tween => {
      const arithmetic = table.find(tween.valueType)
      if (!arithmetic) {
        return { ok: false, error: new ArithmeticUnsupportedError(tween.valueType) }
      }
      return { ok: true, hooks: { arithmetic }, context: { valueType: tween.valueType } }
    }
  }
}
