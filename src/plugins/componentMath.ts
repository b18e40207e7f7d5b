import { ArithmeticUnsupportedError } from '../errors'
import type { ArithmeticHook } from '../types'
import { inferValueType, isNumericRecord } from '../utils/valueTypes'

export function toNumber(value: unknown, valueType: string): number {
  if (typeof value !== 'number') {
    throw new ArithmeticUnsupportedError(valueType, `Expected a number, got '${inferValueType(value)}'.`)
  }
  return value
}

export function readComponents(
  value: unknown,
  keys: readonly string[],
  valueType: string,
  fallbacks: Readonly<Record<string, number>> = {}
): number[] {
  if (!isNumericRecord(value)) {
    throw new ArithmeticUnsupportedError(valueType, `Expected a ${valueType} value, got '${inferValueType(value)}'.`)
  }
  return keys.map(key => {
    const component = value[key] ?? fallbacks[key]
    if (typeof component !== 'number') {
      throw new ArithmeticUnsupportedError(valueType, `Component '${key}' missing from ${valueType} value.`)
    }
    return component
  })
}

export function writeComponents(keys: readonly string[], components: readonly number[]): Record<string, number> {
  const out: Record<string, number> = {}
  keys.forEach((key, index) => {
    out[key] = components[index] ?? 0
  })
  return out
}

export const lerpNumber = (start: number, diff: number, position: number): number => start + diff * position

export function createNumberArithmetic(valueType: string, round?: (value: number) => number): ArithmeticHook {
  const finish = round ?? ((value: number) => value)
  return {
    diff: (start, end) => toNumber(end, valueType) - toNumber(start, valueType),
    end: (start, diff) => toNumber(start, valueType) + toNumber(diff, valueType),
    valueAtPosition: (start, _end, diff, position) =>
      finish(lerpNumber(toNumber(start, valueType), toNumber(diff, valueType), position))
  }
}

/**
 * Component-wise arithmetic over plain numeric records with a fixed key set.
 */
export function createComponentArithmetic(
  keys: readonly string[],
  valueType: string,
  fallbacks: Readonly<Record<string, number>> = {}
): ArithmeticHook {
  const zip = (a: unknown, b: unknown, combine: (x: number, y: number) => number) => {
    const left = readComponents(a, keys, valueType, fallbacks)
    const right = readComponents(b, keys, valueType, fallbacks)
    return writeComponents(keys, left.map((x, index) => combine(x, right[index] ?? 0)))
  }

  return {
    diff: (start, end) => zip(end, start, (e, s) => e - s),
    end: (start, diff) => zip(start, diff, (s, d) => s + d),
    valueAtPosition: (start, _end, diff, position) => zip(start, diff, (s, d) => lerpNumber(s, d, position))
  }
}
