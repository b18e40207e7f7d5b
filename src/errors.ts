/**
 * Error taxonomy for plugin resolution and engine usage.
 *
 * Resolution errors are carried as values inside `ResolutionResult` and on
 * the failed tween. Only `TweenUsageError` is thrown, for programming errors.
 */

export type TweenErrorCode =
  | 'TARGET_NOT_FOUND'
  | 'TYPE_MISMATCH'
  | 'VALUE_TYPE_UNSUPPORTED'
  | 'ACTIVATION_FAILED'
  | 'ARITHMETIC_UNSUPPORTED'
  | 'HOOK_FAILED'
  | 'USAGE'

export class TweenError extends Error {
  readonly code: TweenErrorCode

  constructor(code: TweenErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'TweenError'
    this.code = code
  }
}

/** Target missing, or the named member does not exist on it. */
export class TargetNotFoundError extends TweenError {
  constructor(message: string) {
    super('TARGET_NOT_FOUND', message)
    this.name = 'TargetNotFoundError'
  }
}

export class TypeMismatchError extends TweenError {
  readonly expected: string
  readonly actual: string

  constructor(property: string, expected: string, actual: string) {
    super('TYPE_MISMATCH', `Property '${property}' is of type '${actual}', tween expects '${expected}'.`)
    this.name = 'TypeMismatchError'
    this.expected = expected
    this.actual = actual
  }
}

/** A by-reference accessor was requested onto a member reached through a copied-by-value container. */
export class ValueTypeUnsupportedError extends TweenError {
  constructor(message: string) {
    super('VALUE_TYPE_UNSUPPORTED', message)
    this.name = 'ValueTypeUnsupportedError'
  }
}

export class ActivationFailedError extends TweenError {
  readonly plugin: string

  constructor(plugin: string, message: string, options?: { cause?: unknown }) {
    super('ACTIVATION_FAILED', `Plugin '${plugin}' could not be activated: ${message}`, options)
    this.name = 'ActivationFailedError'
    this.plugin = plugin
  }
}

/** A strong request met a strong binding whose plugin refuses to be replaced. */
export class PluginConflictError extends ActivationFailedError {
  readonly boundPlugin: string

  constructor(plugin: string, boundPlugin: string, capability: string) {
    super(plugin, `${capability} is already bound to '${boundPlugin}', which cannot be overwritten`)
    this.name = 'PluginConflictError'
    this.boundPlugin = boundPlugin
  }
}

export class ArithmeticUnsupportedError extends TweenError {
  readonly valueType: string

  constructor(valueType: string, message?: string) {
    super('ARITHMETIC_UNSUPPORTED', message ?? `No arithmetic available for value type '${valueType}'.`)
    this.name = 'ArithmeticUnsupportedError'
    this.valueType = valueType
  }
}

/** A bound hook threw while reading, writing or computing a value. */
export class HookFailedError extends TweenError {
  readonly plugin: string

  constructor(plugin: string, capability: string, cause: unknown) {
    super('HOOK_FAILED', `${capability} of plugin '${plugin}' threw: ${describeError(cause)}`, { cause })
    this.name = 'HookFailedError'
    this.plugin = plugin
  }
}

export class TweenUsageError extends TweenError {
  constructor(message: string) {
    super('USAGE', message)
    this.name = 'TweenUsageError'
  }
}

export function isTweenError(error: unknown): error is TweenError {
  return error instanceof TweenError
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message
  return String(error)
}
