import { ActivationFailedError, TargetNotFoundError } from '../errors'
import type { TweenPlugin } from '../types'
import { isPlainObject } from '../utils/valueTypes'
import { checkMember, lastSegment, readMember, walkContainers } from './memberAccess'

const NAME = 'struct'

/**
 * Struct plugin - tweens a member of a value that is copied rather than
 * shared (frozen or otherwise immutable records). Each write copies the
 * container with the new member value and assigns the copy back.
 *
 * Explicit only: `tween.plugin('struct')` on a `container.member` path.
 */
export const structPlugin: TweenPlugin = {
  name: NAME,
  version: '1.0.0',
  capabilities: ['getter', 'setter'],

  manualProbe: tween => {
    const target = tween.target
    if (!target) {
      return { ok: false, error: new TargetNotFoundError(`Tween of '${tween.property}' has no target.`) }
    }

    const property = tween.property
    const segments = property.split('.')
    if (segments.length < 2) {
      return { ok: false, error: new ActivationFailedError(NAME, `'${property}' must have the form 'container.member'`) }
    }

    const containerPath = segments.slice(0, -1)
    const containerKey = lastSegment(containerPath)
    const member = lastSegment(segments)

    const owner = walkContainers(target, containerPath)
    if (!owner.ok) return owner

    const container = readMember(owner.container, containerKey)
    if (!isPlainObject(container)) {
      return {
        ok: false,
        error: new ActivationFailedError(NAME, `'${containerPath.join('.')}' is not a plain record`)
      }
    }

    const problem = checkMember(tween, container, member)
    if (problem) return { ok: false, error: problem }

    const readContainer = (target: object): Record<string, unknown> => {
      const walked = walkContainers(target, containerPath)
      if (!walked.ok) throw walked.error
      const value = readMember(walked.container, containerKey)
      if (!isPlainObject(value)) {
        throw new TargetNotFoundError(`'${containerPath.join('.')}' is no longer a plain record.`)
      }
      return value
    }

    return {
      ok: true,
      hooks: {
        getter: { get: target => readContainer(target)[member] },
        setter: {
          set: (target, value) => {
            const walked = walkContainers(target, containerPath)
            if (!walked.ok) throw walked.error
            const current = readContainer(target)
            const next = { ...current, [member]: value }
            if (Object.isFrozen(current)) Object.freeze(next)
            if (!Reflect.set(walked.container, containerKey, next)) {
              throw new ActivationFailedError(NAME, `write to '${containerPath.join('.')}' was rejected`)
            }
          }
        }
      },
      context: { container: containerPath, member }
    }
  }
}
