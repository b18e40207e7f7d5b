import { TweenGroup } from './group'
import { Tween } from './tween'

/**
 * Free lists of reset tweens and groups.
 * Instances are reset when they come back, so everything handed out is unused.
 */
export class TweenPool {
  private tweens: Tween[] = []
  private groups: TweenGroup[] = []
  private tweenSet = new Set<Tween>()
  private groupSet = new Set<TweenGroup>()

  getTween(): Tween {
    const tween = this.tweens.pop()
    if (!tween) return new Tween()
    this.tweenSet.delete(tween)
    return tween
  }

  returnTween(tween: Tween): void {
    if (this.tweenSet.has(tween)) return
    tween.reset()
    this.tweenSet.add(tween)
    this.tweens.push(tween)
  }

  getGroup(): TweenGroup {
    const group = this.groups.pop()
    if (!group) return new TweenGroup()
    this.groupSet.delete(group)
    return group
  }

  returnGroup(group: TweenGroup): void {
    if (this.groupSet.has(group)) return
    group.reset()
    this.groupSet.add(group)
    this.groups.push(group)
  }

  get freeTweens(): number {
    return this.tweens.length
  }

  get freeGroups(): number {
    return this.groups.length
  }

  clear(): void {
    this.tweens = []
    this.groups = []
    this.tweenSet.clear()
    this.groupSet.clear()
  }
}
