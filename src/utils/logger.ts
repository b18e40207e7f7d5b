import { LOG_LEVEL_ORDER } from '../constants/defaults'
import type { LogLevel, LogSink } from '../types'

export function shouldLog(level: LogLevel, threshold: LogLevel): boolean {
  if (level === 'silent') return false
  return LOG_LEVEL_ORDER[level] >= LOG_LEVEL_ORDER[threshold]
}

export const consoleSink: LogSink = (level, message) => {
  const line = `[Tween:${level}] ${message}`
  if (level === 'error') {
    console.error(line)
  } else if (level === 'warning') {
    console.warn(line)
  } else {
    console.log(line)
  }
}

/** Short label for a target in log messages. */
export function describeTarget(target: unknown): string {
  if (target === undefined || target === null) return String(target)
  if (typeof target !== 'object') return String(target)
  const name = target.constructor?.name
  return name && name !== 'Object' ? name : 'object'
}
