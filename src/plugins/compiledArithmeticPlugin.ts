import { PLUGIN_PRIORITY } from '../constants/defaults'
import { ArithmeticUnsupportedError } from '../errors'
import type { TweenPlugin } from '../types'
import { inferValueType, isNumericRecord } from '../utils/valueTypes'
import { createComponentArithmetic } from './componentMath'

/**
 * Compiled arithmetic - builds component-wise formulas for plain numeric
 * records from the key set of the tween's sample value.
 */
export const compiledArithmeticPlugin: TweenPlugin = {
  name: 'compiledArithmetic',
  version: '1.0.0',
  capabilities: ['arithmetic'],
  priority: PLUGIN_PRIORITY.COMPILED,
  dynamic: true,

  autoProbe: tween => {
    const sample = tween.sampleValue
    if (!isNumericRecord(sample)) {
      return {
        ok: false,
        error: new ArithmeticUnsupportedError(
          tween.valueType,
          `Cannot compile arithmetic for '${inferValueType(sample)}', expected a plain record of numbers.`
        )
      }
    }

    const keys = Object.keys(sample)
    return {
      ok: true,
      hooks: { arithmetic: createComponentArithmetic(keys, tween.valueType) },
      context: { keys }
    }
  }
}
