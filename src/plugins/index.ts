/**
 * Tween Plugins
 *
 * Capability providers bound to a tween by the resolver.
 * Each plugin follows the TweenPlugin interface contract.
 *
 * DEFAULT chain (auto-activated, in priority order):
 * - slerp (priority: 120) - Quaternions, or angles with `:slerp:`
 * - staticAccessor (priority: 100) - Accessors taught ahead of time
 * - staticArithmetic (priority: 100) - Arithmetic enabled ahead of time
 * - compiledAccessor (priority: 50) - Cached closures over data properties
 * - compiledArithmetic (priority: 50) - Component-wise records
 * - reflectionAccessor (priority: 10) - Reflect API, accessors and maps
 * - reflectionArithmetic (priority: 10) - Values with add/sub/scale
 *
 * EXPLICIT plugins (request with `.plugin()`):
 * - struct - Members of copied-by-value records
 * - createFollowPlugin() - End value read from a moving source
 */

import type { TweenPlugin } from '../types'
import { compiledAccessorPlugin } from './compiledAccessorPlugin'
import { compiledArithmeticPlugin } from './compiledArithmeticPlugin'
import { reflectionAccessorPlugin } from './reflectionAccessorPlugin'
import { reflectionArithmeticPlugin } from './reflectionArithmeticPlugin'
import { slerpPlugin } from './slerpPlugin'
import { createStaticAccessorPlugin } from './staticAccessorPlugin'
import { createStaticArithmeticPlugin } from './staticArithmeticPlugin'
import type { AccessorTable, ArithmeticTable } from './staticTables'
import { structPlugin } from './structPlugin'

export { compiledAccessorPlugin } from './compiledAccessorPlugin'
export { compiledArithmeticPlugin } from './compiledArithmeticPlugin'
export { reflectionAccessorPlugin } from './reflectionAccessorPlugin'
export { reflectionArithmeticPlugin, hasOperators } from './reflectionArithmeticPlugin'
export type { OperatorValue } from './reflectionArithmeticPlugin'
export { slerpPlugin, slerp, shortestAngle, angleBetween } from './slerpPlugin'
export { createStaticAccessorPlugin } from './staticAccessorPlugin'
export { createStaticArithmeticPlugin, registerBuiltInArithmetic } from './staticArithmeticPlugin'
export { structPlugin } from './structPlugin'
export { createFollowPlugin } from './followPlugin'
export type { FollowPluginOptions } from './followPlugin'
export { AccessorTable, ArithmeticTable } from './staticTables'
export { createComponentArithmetic, createNumberArithmetic } from './componentMath'
export type { Constructor, TaughtAccessor } from './staticTables'

export function createBuiltInPlugins(accessors: AccessorTable, arithmetic: ArithmeticTable): TweenPlugin[] {
  return [
    slerpPlugin,
    createStaticAccessorPlugin(accessors),
    createStaticArithmeticPlugin(arithmetic),
    compiledAccessorPlugin,
    compiledArithmeticPlugin,
    reflectionAccessorPlugin,
    reflectionArithmeticPlugin,
    structPlugin
  ]
}
