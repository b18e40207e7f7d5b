import { ArithmeticUnsupportedError } from '../errors'
import type { ArithmeticHook, TweenPlugin } from '../types'
import { isNumericRecord } from '../utils/valueTypes'
import { createComponentArithmetic, createNumberArithmetic } from './componentMath'

export interface FollowPluginOptions {
  /** Plugin name, so several follow plugins can be told apart in logs. */
  name?: string
}

/**
 * Follow plugin - the end value is read from `source` on every step, so the
 * tween homes in on a moving goal and lands on wherever it is at the end.
 */
export function createFollowPlugin(source: () => unknown, options: FollowPluginOptions = {}): TweenPlugin {
  const name = options.name ?? 'follow'

  return {
    name,
    version: '1.0.0',
    capabilities: ['arithmetic'],

    manualProbe: tween => {
      let base: ArithmeticHook
      if (tween.valueType === 'number' || tween.valueType === 'integer') {
        base = createNumberArithmetic(tween.valueType)
      } else if (isNumericRecord(tween.sampleValue)) {
        base = createComponentArithmetic(Object.keys(tween.sampleValue), tween.valueType)
      } else {
        return {
          ok: false,
          error: new ArithmeticUnsupportedError(tween.valueType, `Cannot follow values of type '${tween.valueType}'.`)
        }
      }

      return {
        ok: true,
        hooks: {
          arithmetic: {
            diff: base.diff,
            end: base.end,
            valueAtPosition: (start, _end, _diff, position) => {
              const goal = source()
              return base.valueAtPosition(start, goal, base.diff(start, goal), position)
            }
          }
        },
        context: { source }
      }
    }
  }
}
