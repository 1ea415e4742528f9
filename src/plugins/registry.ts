import type { RepoConfig } from '../repo/config.js'
import { CommandRunner } from '../core/command.js'
import { FileSystemPort } from '../core/fs.js'
import { BUILTIN_DOMAINS, Domain, ItemAttributes } from '../types.js'
import { FilesPlugin } from './files.js'
import { PackagesPlugin } from './packages.js'
import { ServicesPlugin } from './services.js'
import { StartupPlugin } from './startup.js'
import type { Plugin } from './types.js'

export type AnyPlugin = Plugin<ItemAttributes, ItemAttributes>

/**
 * Plugins in a fixed order: built-in domains first (packages, services, files, startup),
 * then extensions in registration order. A priority list moves named domains to the front.
 */
export class PluginRegistry {
  private readonly plugins = new Map<Domain, AnyPlugin>()

  register(plugin: AnyPlugin): this {
    if (this.plugins.has(plugin.domain)) {
      throw new Error(`A plugin for domain "${plugin.domain}" is already registered`)
    }
    this.plugins.set(plugin.domain, plugin)
    return this
  }

  get(domain: Domain): AnyPlugin | undefined {
    return this.plugins.get(domain)
  }

  has(domain: Domain): boolean {
    return this.plugins.has(domain)
  }

  ordered(priority: readonly Domain[] = []): AnyPlugin[] {
    const builtins: readonly string[] = BUILTIN_DOMAINS
    const all = [...this.plugins.values()]
    const defaultOrder = [
      ...BUILTIN_DOMAINS.flatMap(d => all.filter(p => p.domain === d)),
      ...all.filter(p => !builtins.includes(p.domain)),
    ]
    const first = priority.flatMap(d => defaultOrder.filter(p => p.domain === d))
    return [...first, ...defaultOrder.filter(p => !first.includes(p))]
  }
}

export interface DefaultPluginsOptions {
  runner: CommandRunner
  fs?: FileSystemPort
}

/**
 * Build the registry for a repository: every built-in plugin the config enables.
 */
export function defaultRegistry(config: RepoConfig, opts: DefaultPluginsOptions): PluginRegistry {
  const registry = new PluginRegistry()
  const enabled = new Set(config.plugins.enable)
  if (enabled.has('packages')) registry.register(new PackagesPlugin({ runner: opts.runner, sudo: config.sudo }))
  if (enabled.has('services')) registry.register(new ServicesPlugin({ runner: opts.runner, sudo: config.sudo }))
  if (enabled.has('files')) {
    registry.register(new FilesPlugin({
      roots: config.files.roots,
      maxFileBytes: config.files.maxFileBytes,
      maxFiles: config.files.maxFiles,
      fs: opts.fs,
    }))
  }
  if (enabled.has('startup')) registry.register(new StartupPlugin({ runner: opts.runner }))
  return registry
}
