/**
 * Slerp plugin - rotational interpolation along the shortest arc.
 *
 * - quaternion values: spherical linear interpolation (auto-activates)
 * - number values: angles in degrees
 * - vec3 values: euler angles in degrees, per axis
 *
 * Angles and euler values only activate automatically with the `:slerp:`
 * property option, or through an explicit request. For angles the computed
 * end may differ from the requested end by whole turns.
 */

import { PLUGIN_PRIORITY } from '../constants/defaults'
import { ArithmeticUnsupportedError } from '../errors'
import type { ArithmeticHook, ProbeResult, TweenInfo, TweenPlugin } from '../types'
import { isQuaternion } from '../utils/valueTypes'
import type { Quaternion } from '../utils/valueTypes'
import { lerpNumber, readComponents, toNumber, writeComponents } from './componentMath'

// ============================================================================
// Angles
// ============================================================================

/** Signed difference in (-180, 180] that turns `from` into `to`. */
export function shortestAngle(from: number, to: number): number {
  let delta = (to - from) % 360
  if (delta > 180) delta -= 360
  else if (delta <= -180) delta += 360
  return delta
}

const angleArithmetic: ArithmeticHook = {
  diff: (start, end) => shortestAngle(toNumber(start, 'number'), toNumber(end, 'number')),
  end: (start, diff) => toNumber(start, 'number') + toNumber(diff, 'number'),
  valueAtPosition: (start, _end, diff, position) =>
    lerpNumber(toNumber(start, 'number'), toNumber(diff, 'number'), position)
}

const EULER_KEYS = ['x', 'y', 'z'] as const

const eulerArithmetic: ArithmeticHook = {
  diff: (start, end) => {
    const s = readComponents(start, EULER_KEYS, 'vec3')
    const e = readComponents(end, EULER_KEYS, 'vec3')
    return writeComponents(EULER_KEYS, s.map((value, i) => shortestAngle(value, e[i] ?? value)))
  },
  end: (start, diff) => {
    const s = readComponents(start, EULER_KEYS, 'vec3')
    const d = readComponents(diff, EULER_KEYS, 'vec3')
    return writeComponents(EULER_KEYS, s.map((value, i) => value + (d[i] ?? 0)))
  },
  valueAtPosition: (start, _end, diff, position) => {
    const s = readComponents(start, EULER_KEYS, 'vec3')
    const d = readComponents(diff, EULER_KEYS, 'vec3')
    return writeComponents(EULER_KEYS, s.map((value, i) => lerpNumber(value, d[i] ?? 0, position)))
  }
}

// ============================================================================
// Quaternions
// ============================================================================

function asQuaternion(value: unknown): Quaternion {
  if (!isQuaternion(value)) {
    throw new ArithmeticUnsupportedError('quaternion', 'Expected a quaternion with x, y, z and w.')
  }
  return value
}

export function dot(a: Quaternion, b: Quaternion): number {
  return a.x * b.x + a.y * b.y + a.z * b.z + a.w * b.w
}

export function normalize(q: Quaternion): Quaternion {
  const length = Math.sqrt(dot(q, q))
  if (length === 0) return { x: 0, y: 0, z: 0, w: 1 }
  return { x: q.x / length, y: q.y / length, z: q.z / length, w: q.w / length }
}

export function multiply(a: Quaternion, b: Quaternion): Quaternion {
  return {
    x: a.w * b.x + a.x * b.w + a.y * b.z - a.z * b.y,
    y: a.w * b.y - a.x * b.z + a.y * b.w + a.z * b.x,
    z: a.w * b.z + a.x * b.y - a.y * b.x + a.z * b.w,
    w: a.w * b.w - a.x * b.x - a.y * b.y - a.z * b.z
  }
}

export function inverse(q: Quaternion): Quaternion {
  const lengthSq = dot(q, q)
  if (lengthSq === 0) return { x: 0, y: 0, z: 0, w: 1 }
  return { x: -q.x / lengthSq, y: -q.y / lengthSq, z: -q.z / lengthSq, w: q.w / lengthSq }
}

export function slerp(a: Quaternion, b: Quaternion, t: number): Quaternion {
  let cos = dot(a, b)
  let to = b
  if (cos < 0) {
    cos = -cos
    to = { x: -b.x, y: -b.y, z: -b.z, w: -b.w }
  }

  // Nearly parallel: fall back to normalized lerp
  if (cos > 0.9995) {
    return normalize({
      x: a.x + (to.x - a.x) * t,
      y: a.y + (to.y - a.y) * t,
      z: a.z + (to.z - a.z) * t,
      w: a.w + (to.w - a.w) * t
    })
  }

  const theta0 = Math.acos(cos)
  const theta = theta0 * t
  const sin0 = Math.sin(theta0)
  const wa = Math.cos(theta) - cos * Math.sin(theta) / sin0
  const wb = Math.sin(theta) / sin0
  return {
    x: a.x * wa + to.x * wb,
    y: a.y * wa + to.y * wb,
    z: a.z * wa + to.z * wb,
    w: a.w * wa + to.w * wb
  }
}

/** Rotation angle in radians between two unit quaternions. */
export function angleBetween(a: Quaternion, b: Quaternion): number {
  const cos = Math.min(1, Math.abs(dot(normalize(a), normalize(b))))
  return 2 * Math.acos(cos)
}

// Diff is the relative rotation, so `end(start, diff)` composes back to the end.
const quaternionArithmetic: ArithmeticHook = {
  diff: (start, end) => multiply(inverse(asQuaternion(start)), asQuaternion(end)),
  end: (start, diff) => multiply(asQuaternion(start), asQuaternion(diff)),
  valueAtPosition: (start, end, _diff, position) => slerp(asQuaternion(start), asQuaternion(end), position)
}

// ============================================================================
// Plugin
// ============================================================================

function activate(tween: TweenInfo, allowAngles: boolean): ProbeResult {
  switch (tween.valueType) {
    case 'quaternion':
      return { ok: true, hooks: { arithmetic: quaternionArithmetic }, context: { mode: 'quaternion' } }
    case 'number':
      if (allowAngles) return { ok: true, hooks: { arithmetic: angleArithmetic }, context: { mode: 'angle' } }
      break
    case 'vec3':
      if (allowAngles) return { ok: true, hooks: { arithmetic: eulerArithmetic }, context: { mode: 'euler' } }
      break
  }
  return { ok: false, error: new ArithmeticUnsupportedError(tween.valueType) }
}

export const slerpPlugin: TweenPlugin = {
  name: 'slerp',
  version: '1.0.0',
  capabilities: ['arithmetic'],
  priority: PLUGIN_PRIORITY.SLERP,

  autoProbe: tween => activate(tween, tween.propertyOptions.includes('slerp')),
  manualProbe: tween => activate(tween, true)
}
