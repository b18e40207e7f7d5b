import { TargetNotFoundError, TypeMismatchError, ValueTypeUnsupportedError } from '../errors'
import type { TweenError } from '../errors'
import type { TweenInfo } from '../types'
import { describeTarget } from '../utils/logger'
import { inferValueType, matchesValueType } from '../utils/valueTypes'

export type WalkResult =
  | { ok: true; container: object }
  | { ok: false; error: TweenError }

export function findDescriptor(target: object, key: string): PropertyDescriptor | undefined {
  let current: object | null = target
  while (current) {
    const descriptor = Object.getOwnPropertyDescriptor(current, key)
    if (descriptor) return descriptor
    current = Reflect.getPrototypeOf(current)
  }
  return undefined
}

export function hasMember(container: object, key: string): boolean {
  if (container instanceof Map) return container.has(key)
  return key in container
}

export function readMember(container: object, key: string): unknown {
  if (container instanceof Map) return container.get(key)
  const value: unknown = Reflect.get(container, key)
  return value
}

/**
 * Walk every segment but the last and return the object that owns the final
 * member. Members reached through primitives or frozen objects are copies as
 * far as writes go, and are rejected.
 */
export function walkContainers(target: object, segments: readonly string[]): WalkResult {
  let container = target
  for (let i = 0; i < segments.length - 1; i++) {
    const key = segments[i] ?? ''
    const path = segments.slice(0, i + 1).join('.')

    if (!hasMember(container, key)) {
      return { ok: false, error: new TargetNotFoundError(`Member '${path}' not found on ${describeTarget(target)}.`) }
    }

    const next = readMember(container, key)
    if (typeof next !== 'object' || next === null) {
      return {
        ok: false,
        error: new ValueTypeUnsupportedError(
          `'${path}' holds a ${inferValueType(next)} value, its members cannot be written in place. ` +
          `Maybe use the struct plugin?`
        )
      }
    }
    if (Object.isFrozen(next)) {
      return {
        ok: false,
        error: new ValueTypeUnsupportedError(
          `'${path}' is a frozen value, its members cannot be written in place. Maybe use the struct plugin?`
        )
      }
    }
    container = next
  }
  return { ok: true, container }
}

export function lastSegment(segments: readonly string[]): string {
  return segments[segments.length - 1] ?? ''
}

/** Missing target, missing member or mismatched value type, if any. */
export function checkMember(tween: TweenInfo, container: object, key: string): TweenError | undefined {
  if (!hasMember(container, key)) {
    return new TargetNotFoundError(`Member '${tween.property}' not found on ${describeTarget(tween.target)}.`)
  }
  const current = readMember(container, key)
  if (!matchesValueType(current, tween.valueType)) {
    return new TypeMismatchError(tween.property, tween.valueType, inferValueType(current))
  }
  return undefined
}
