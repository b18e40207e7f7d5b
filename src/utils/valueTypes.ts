/**
 * Value type tags and the structural checks behind them.
 *
 * Tags: number, integer, vec2, vec3, quaternion (never inferred), color,
 * record (plain object of numbers), object, a class name for class
 * instances, or the `typeof` result otherwise.
 */

export interface Vec2 {
  x: number
  y: number
}

export interface Vec3 extends Vec2 {
  z: number
}

export interface Quaternion extends Vec3 {
  w: number
}

export interface Color {
  r: number
  g: number
  b: number
  a?: number
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

export function isNumericRecord(value: unknown): value is Record<string, number> {
  if (!isPlainObject(value)) return false
  const values = Object.values(value)
  return values.length > 0 && values.every(v => typeof v === 'number')
}

function hasShape(value: unknown, required: readonly string[], optional: readonly string[] = []): boolean {
  if (!isNumericRecord(value)) return false
  const keys = Object.keys(value)
  return required.every(key => key in value)
    && keys.every(key => required.includes(key) || optional.includes(key))
}

export const isVec2 = (value: unknown): value is Vec2 => hasShape(value, ['x', 'y'])
export const isVec3 = (value: unknown): value is Vec3 => hasShape(value, ['x', 'y', 'z'])
export const isQuaternion = (value: unknown): value is Quaternion => hasShape(value, ['x', 'y', 'z', 'w'])
export const isColor = (value: unknown): value is Color => hasShape(value, ['r', 'g', 'b'], ['a'])

export function inferValueType(value: unknown): string {
  if (typeof value === 'number') return 'number'
  if (value === null) return 'null'
  if (typeof value !== 'object') return typeof value
  if (Array.isArray(value)) return 'array'

  if (isPlainObject(value)) {
    if (isVec2(value)) return 'vec2'
    if (isVec3(value)) return 'vec3'
    if (isColor(value)) return 'color'
    if (isNumericRecord(value)) return 'record'
    return 'object'
  }

  return value.constructor?.name || 'object'
}

export function matchesValueType(value: unknown, valueType: string): boolean {
  switch (valueType) {
    case 'number':
      return typeof value === 'number'
    case 'integer':
      return Number.isInteger(value)
    case 'vec2':
      return isVec2(value)
    case 'vec3':
      return isVec3(value)
    case 'quaternion':
      return isQuaternion(value)
    case 'color':
      return isColor(value)
    case 'record':
      return isNumericRecord(value)
    case 'object':
      return isPlainObject(value)
    default:
      return inferValueType(value) === valueType
  }
}
