import { PLUGIN_PRIORITY } from '../constants/defaults'
import { ActivationFailedError, TargetNotFoundError } from '../errors'
import type { TweenPlugin } from '../types'
import { checkMember, findDescriptor, lastSegment, readMember, walkContainers } from './memberAccess'

const NAME = 'reflectionAccessor'

function requireContainer(target: object, segments: readonly string[]): object {
  const walked = walkContainers(target, segments)
  if (!walked.ok) throw walked.error
  return walked.container
}

/**
 * Reflective accessors - looks the member up on every access through the
 * Reflect API. Handles getter/setter pairs, proxies and map entries.
 */
export const reflectionAccessorPlugin: TweenPlugin = {
  name: NAME,
  version: '1.0.0',
  capabilities: ['getter', 'setter'],
  priority: PLUGIN_PRIORITY.REFLECTION,
  dynamic: true,

  autoProbe: tween => {
    const target = tween.target
    if (!target) {
      return { ok: false, error: new TargetNotFoundError(`Tween of '${tween.property}' has no target.`) }
    }

    const property = tween.property
    const segments = property.split('.')
    const walked = walkContainers(target, segments)
    if (!walked.ok) return walked

    const key = lastSegment(segments)
    const problem = checkMember(tween, walked.container, key)
    if (problem) return { ok: false, error: problem }

    if (!(walked.container instanceof Map)) {
      const descriptor = findDescriptor(walked.container, key)
      const writable = descriptor === undefined
        || ('value' in descriptor ? descriptor.writable === true : descriptor.set !== undefined)
      if (!writable) {
        return { ok: false, error: new ActivationFailedError(NAME, `'${tween.property}' is read-only`) }
      }
    }

    return {
      ok: true,
      hooks: {
        getter: { get: target => readMember(requireContainer(target, segments), key) },
        setter: {
          set: (target, value) => {
            const container = requireContainer(target, segments)
            if (container instanceof Map) {
              container.set(key, value)
              return
            }
            if (!Reflect.set(container, key, value)) {
              throw new ActivationFailedError(NAME, `write to '${property}' was rejected`)
            }
          }
        }
      },
      context: { path: segments }
    }
  }
}
