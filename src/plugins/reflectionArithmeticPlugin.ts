import { PLUGIN_PRIORITY } from '../constants/defaults'
import { ArithmeticUnsupportedError } from '../errors'
import type { TweenPlugin } from '../types'
import { inferValueType } from '../utils/valueTypes'

/** Values that implement their own operators, returning new instances. */
export interface OperatorValue {
  add: (other: unknown) => unknown
  sub: (other: unknown) => unknown
  scale: (factor: number) => unknown
}

export function hasOperators(value: unknown): value is OperatorValue {
  if (typeof value !== 'object' || value === null) return false
  return typeof Reflect.get(value, 'add') === 'function'
    && typeof Reflect.get(value, 'sub') === 'function'
    && typeof Reflect.get(value, 'scale') === 'function'
}

function operand(value: unknown, valueType: string): OperatorValue {
  if (!hasOperators(value)) {
    throw new ArithmeticUnsupportedError(valueType, `'${inferValueType(value)}' does not implement add, sub and scale.`)
  }
  return value
}

/**
 * Reflective arithmetic - dispatches to `add`, `sub` and `scale` methods
 * found on the values themselves.
 */
export const reflectionArithmeticPlugin: TweenPlugin = {
  name: 'reflectionArithmetic',
  version: '1.0.0',
  capabilities: ['arithmetic'],
  priority: PLUGIN_PRIORITY.REFLECTION,
  dynamic: true,

  autoProbe: tween => {
    if (!hasOperators(tween.sampleValue)) {
      return { ok: false, error: new ArithmeticUnsupportedError(tween.valueType) }
    }

    const type = tween.valueType
    return {
      ok: true,
      hooks: {
        arithmetic: {
          diff: (start, end) => operand(end, type).sub(start),
          end: (start, diff) => operand(start, type).add(diff),
          valueAtPosition: (start, _end, diff, position) => operand(start, type).add(operand(diff, type).scale(position))
        }
      }
    }
  }
}
