import { PLUGIN_PRIORITY } from '../constants/defaults'
import { TargetNotFoundError } from '../errors'
import type { TweenPlugin } from '../types'
import { describeTarget } from '../utils/logger'
import type { AccessorTable } from './staticTables'

/**
 * Static accessors - getters and setters taught ahead of time through
 * `AccessorTable.teach()`. Works on hosts without runtime code generation.
 */
export function createStaticAccessorPlugin(table: AccessorTable): TweenPlugin {
  return {
    name: 'staticAccessor',
    version: '1.0.0',
    capabilities: ['getter', 'setter'],
    priority: PLUGIN_PRIORITY.STATIC,

    autoProbe: tween => {
      const target = tween.target
      if (!target) {
        return { ok: false, error: new TargetNotFoundError(`Tween of '${tween.property}' has no target.`) }
      }

      const entry = table.find(target, tween.property, tween.valueType)
      if (!entry) {
        return {
          ok: false,
          error: new TargetNotFoundError(
            `No accessor taught for ${describeTarget(target)}.${tween.property} (${tween.valueType}).`
          )
        }
      }

      return {
        ok: true,
        hooks: {
          getter: { get: entry.get },
          setter: { set: entry.set }
        },
        context: { targetClass: entry.targetClass.name }
      }
    }
  }
}
