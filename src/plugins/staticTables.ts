import { TweenUsageError } from '../errors'
import type { ArithmeticHook } from '../types'

export type Constructor<T extends object = object> = abstract new (...args: never[]) => T

export interface TaughtAccessor<T extends object> {
  get: (target: T) => unknown
  set: (target: T, value: unknown) => void
}

interface AccessorEntry {
  targetClass: Constructor
  get: (target: object) => unknown
  set: (target: object, value: unknown) => void
}

/**
 * Lifetime shared by the precompiled tables: populated at startup, read while
 * ticking. Writes are rejected while the owning engine holds the lock.
 */
abstract class StaticTable {
  private locks = 0

  lock(): void {
    this.locks++
  }

  unlock(): void {
    if (this.locks > 0) this.locks--
  }

  get locked(): boolean {
    return this.locks > 0
  }

  protected assertWritable(action: string): void {
    if (this.locked) {
      throw new TweenUsageError(`Cannot ${action} while the engine is ticking.`)
    }
  }

  abstract teardown(): void
}

/**
 * Accessors taught ahead of time, keyed by target class, property and value type.
 * Lookups match subclasses of a taught class.
 */
export class AccessorTable extends StaticTable {
  private entries = new Map<string, AccessorEntry[]>()

  teach<T extends object>(
    targetClass: Constructor<T>,
    property: string,
    valueType: string,
    accessor: TaughtAccessor<T>
  ): void {
    this.assertWritable(`teach '${property}'`)

    const describe = `${targetClass.name}.${property}`
    const entry: AccessorEntry = {
      targetClass,
      get: target => {
        if (!(target instanceof targetClass)) {
          throw new TweenUsageError(`Accessor for ${describe} called with a foreign target.`)
        }
        return accessor.get(target)
      },
      set: (target, value) => {
        if (!(target instanceof targetClass)) {
          throw new TweenUsageError(`Accessor for ${describe} called with a foreign target.`)
        }
        accessor.set(target, value)
      }
    }

    const key = this.key(property, valueType)
    const list = (this.entries.get(key) ?? []).filter(existing => existing.targetClass !== targetClass)
    list.push(entry)
    this.entries.set(key, list)
  }

  forget(targetClass: Constructor, property: string, valueType: string): boolean {
    this.assertWritable(`forget '${property}'`)
    const key = this.key(property, valueType)
    const list = this.entries.get(key)
    if (!list) return false
    const remaining = list.filter(entry => entry.targetClass !== targetClass)
    this.entries.set(key, remaining)
    return remaining.length !== list.length
  }

  find(target: object, property: string, valueType: string): AccessorEntry | undefined {
    const list = this.entries.get(this.key(property, valueType))
    return list?.find(entry => target instanceof entry.targetClass)
  }

  get size(): number {
    let size = 0
    this.entries.forEach(list => { size += list.length })
    return size
  }

  teardown(): void {
    this.entries.clear()
  }

  private key(property: string, valueType: string): string {
    return `${valueType}:${property}`
  }
}

/** Arithmetic enabled ahead of time, keyed by value type. */
export class ArithmeticTable extends StaticTable {
  private entries = new Map<string, ArithmeticHook>()

  enable(valueType: string, arithmetic: ArithmeticHook): void {
    this.assertWritable(`enable arithmetic for '${valueType}'`)
    this.entries.set(valueType, arithmetic)
  }

  disable(valueType: string): boolean {
    this.assertWritable(`disable arithmetic for '${valueType}'`)
    return this.entries.delete(valueType)
  }

  find(valueType: string): ArithmeticHook | undefined {
    return this.entries.get(valueType)
  }

  has(valueType: string): boolean {
    return this.entries.has(valueType)
  }

  teardown(): void {
    this.entries.clear()
  }
}
