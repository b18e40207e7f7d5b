import { PLUGIN_PRIORITY } from '../constants/defaults'
import { ActivationFailedError, TargetNotFoundError } from '../errors'
import type { TweenPlugin } from '../types'
import { checkMember, findDescriptor, lastSegment, walkContainers } from './memberAccess'

const NAME = 'compiledAccessor'

/**
 * Compiled accessors - resolves the member path once and builds closures
 * specialized to its depth. Only plain writable data properties qualify;
 * accessor properties and maps are left to the reflective fallback.
 */
export const compiledAccessorPlugin: TweenPlugin = {
  name: NAME,
  version: '1.0.0',
  capabilities: ['getter', 'setter'],
  priority: PLUGIN_PRIORITY.COMPILED,
  dynamic: true,

  autoProbe: tween => {
    const target = tween.target
    if (!target) {
      return { ok: false, error: new TargetNotFoundError(`Tween of '${tween.property}' has no target.`) }
    }

    const segments = tween.property.split('.')
    const walked = walkContainers(target, segments)
    if (!walked.ok) return walked

    const key = lastSegment(segments)
    if (walked.container instanceof Map) {
      return { ok: false, error: new ActivationFailedError(NAME, `'${tween.property}' is a map entry`) }
    }

    const problem = checkMember(tween, walked.container, key)
    if (problem) return { ok: false, error: problem }

    const descriptor = findDescriptor(walked.container, key)
    if (!descriptor || !('value' in descriptor)) {
      return { ok: false, error: new ActivationFailedError(NAME, `'${tween.property}' is an accessor property`) }
    }
    if (!descriptor.writable) {
      return { ok: false, error: new ActivationFailedError(NAME, `'${tween.property}' is read-only`) }
    }

    const head = segments.slice(0, -1)
    const resolve = compileWalk(head, tween.property)

    return {
      ok: true,
      hooks: {
        getter: { get: target => Reflect.get(resolve(target), key) },
        setter: {
          set: (target, value) => {
            Reflect.set(resolve(target), key, value)
          }
        }
      },
      context: { path: segments }
    }
  }
}

function compileWalk(head: readonly string[], property: string): (target: object) => object {
  const step = (container: unknown, key: string): object => {
    const next: unknown = typeof container === 'object' && container !== null
      ? Reflect.get(container, key)
      : undefined
    if (typeof next !== 'object' || next === null) {
      throw new TargetNotFoundError(`Container '${key}' of '${property}' is no longer an object.`)
    }
    return next
  }

  switch (head.length) {
    case 0:
      return target => target
    case 1: {
      const [a = ''] = head
      return target => step(target, a)
    }
    case 2: {
      const [a = '', b = ''] = head
      return target => step(step(target, a), b)
    }
    default:
      return target => head.reduce<object>((container, key) => step(container, key), target)
  }
}
