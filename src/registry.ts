import { TweenUsageError } from './errors'
import type { LogLevel, TweenPlugin } from './types'

type RegistryLog = (level: Exclude<LogLevel, 'silent'>, message: string) => void

/**
 * Tween Plugin Registry - named plugins known to an engine.
 * Priority order (high to low) defines the default chain; plugins without
 * an auto probe can only be requested explicitly, by name or by reference.
 */
export class TweenPluginRegistry {
  private plugins = new Map<string, TweenPlugin>()

  constructor(private readonly log: RegistryLog = () => {}) {}

  /** Register a plugin. Validates required fields (name, version, capabilities, probe). */
  register(plugin: TweenPlugin): void {
    // Validate required fields
    if (!plugin.name || !plugin.version || plugin.capabilities.length === 0 || (!plugin.autoProbe && !plugin.manualProbe)) {
      throw new TweenUsageError(
        `Invalid plugin: missing required fields (name, version, capabilities, probe). ` +
        `Received: ${JSON.stringify({
          name: plugin.name,
          version: plugin.version,
          capabilities: plugin.capabilities,
          hasProbe: !!(plugin.autoProbe ?? plugin.manualProbe)
        })}`
      )
    }

    // Check for duplicate registration
    if (this.plugins.has(plugin.name)) {
      this.log('warning', `Plugin '${plugin.name}' already registered, overwriting`)
    }

    this.plugins.set(plugin.name, plugin)
    this.log('debug', `[Plugin:${plugin.name}] Registered`)
  }

  /** Plugins that take part in automatic resolution, in chain order. */
  getDefaultChain(): TweenPlugin[] {
    const auto: TweenPlugin[] = []
    this.plugins.forEach(plugin => {
      if (plugin.autoProbe) auto.push(plugin)
    })
    return this.sortByPriority(auto)
  }

  private sortByPriority(plugins: TweenPlugin[]): TweenPlugin[] {
    return [...plugins].sort((a, b) => {
      const priorityA = a.priority ?? 50
      const priorityB = b.priority ?? 50
      return priorityB - priorityA // High to low
    })
  }

  getPlugin(name: string): TweenPlugin | undefined {
    return this.plugins.get(name)
  }

  hasPlugin(name: string): boolean {
    return this.plugins.has(name)
  }

  unregister(name: string): boolean {
    return this.plugins.delete(name)
  }
}
