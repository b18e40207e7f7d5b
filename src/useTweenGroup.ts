import { readonly, ref, toValue, type Ref } from 'vue'
import { tryOnScopeDispose, type MaybeRefOrGetter } from '@vueuse/core'
import { getDefaultEngine } from './animate'
import type { TweenEngine } from './engine'
import type { TweenGroup } from './group'
import type { TweenTemplate } from './options'
import type { Tween, WaitOptions } from './tween'
import type { TweenShortcutOptions } from './types'

export interface UseTweenGroupOptions {
  /** Engine to create the group on. Defaults to the shared engine. */
  engine?: TweenEngine
  template?: TweenTemplate
}

export interface UseTweenGroupReturn {
  group: TweenGroup
  /** True while the group holds tweens, refreshed after every tick. */
  isActive: Readonly<Ref<boolean>>
  to: (property: string, to: unknown, options?: TweenShortcutOptions) => Tween
  from: (property: string, from: unknown, options?: TweenShortcutOptions) => Tween
  fromTo: (property: string, from: unknown, to: unknown, options?: TweenShortcutOptions) => Tween
  by: (property: string, by: unknown, options?: TweenShortcutOptions) => Tween
  stop: (property?: string) => void
  finish: (property?: string) => void
  cancel: (property?: string) => void
  wait: (options?: WaitOptions) => Promise<void>
  cleanup: () => void
}

/**
 * Tween group bound to the current effect scope.
 * Tweens created through it default to the current value of `target`;
 * disposing the scope stops them.
 */
export function useTweenGroup(
  target?: MaybeRefOrGetter<object | undefined>,
  options: UseTweenGroupOptions = {}
): UseTweenGroupReturn {
  const engine = options.engine ?? getDefaultEngine()
  const group = engine.group(options.template)
  const isActive = ref(false)

  const offTick = engine.onAfterTick(() => {
    isActive.value = group.has()
  })

  const withTarget = (shortcut: TweenShortcutOptions = {}): TweenShortcutOptions => ({
    target: toValue(target),
    ...shortcut
  })

  const track = (tween: Tween): Tween => {
    isActive.value = true
    return tween
  }

  // Bulk controls apply to the current target only
  const current = () => toValue(target)

  let disposed = false
  const cleanup = () => {
    if (disposed) return
    disposed = true
    offTick()
    group.stop()
    isActive.value = false
  }

  tryOnScopeDispose(cleanup)

  return {
    group,
    isActive: readonly(isActive),
    to: (property, to, shortcut) => track(group.to(property, to, withTarget(shortcut))),
    from: (property, from, shortcut) => track(group.from(property, from, withTarget(shortcut))),
    fromTo: (property, from, to, shortcut) => track(group.fromTo(property, from, to, withTarget(shortcut))),
    by: (property, by, shortcut) => track(group.by(property, by, withTarget(shortcut))),
    stop: property => group.stop(current(), property),
    finish: property => group.finish(current(), property),
    cancel: property => group.cancel(current(), property),
    wait: waitOptions => group.waitForCompletion(waitOptions),
    cleanup
  }
}
