import { z } from 'zod'

import { commandAvailable, CommandRunner, describeFailure, privileged } from '../core/command.js'
import { CollectionError } from '../errors.js'
import { makeFragment } from '../fragments/schema.js'
import type { Action, Fragment } from '../types.js'
import { byKey, CollectContext, failure, payloadString, Plugin, PluginResult, success } from './types.js'

export const PackageDesiredSchema = z.object({
  ensure: z.enum(['present', 'absent']).default('present'),
  version: z.string().min(1).optional(),
}).strict()

export const PackageObservedSchema = z.object({
  ensure: z.literal('present'),
  version: z.string().min(1).optional(),
}).strict()

export type PackageDesired = z.infer<typeof PackageDesiredSchema>
export type PackageObserved = z.infer<typeof PackageObservedSchema>

export interface PackagesPluginOptions {
  runner: CommandRunner
  sudo?: boolean
}

const APT_ENV = { DEBIAN_FRONTEND: 'noninteractive' }

/**
 * Debian packages through dpkg-query and apt-get.
 */
export class PackagesPlugin implements Plugin<PackageDesired, PackageObserved> {
  readonly domain = 'packages'
  readonly desiredItem = PackageDesiredSchema
  readonly observedItem = PackageObservedSchema

  private readonly runner: CommandRunner
  private readonly sudo: boolean

  constructor(opts: PackagesPluginOptions) {
    this.runner = opts.runner
    this.sudo = opts.sudo ?? false
  }

  detect(): Promise<boolean> {
    return commandAvailable(this.runner, 'dpkg-query', ['--version'])
  }

  async collect(ctx: CollectContext): Promise<Fragment<PackageObserved>> {
    const res = await this.runner.run(
      'dpkg-query',
      ['-W', '-f=${Package}\t${Version}\t${db:Status-Abbrev}\n'],
      { signal: ctx.signal },
    )
    if (res.code !== 0) throw new CollectionError(this.domain, describeFailure(res))

    const items: Record<string, PackageObserved> = {}
    for (const line of res.stdout.split('\n')) {
      const [name, version, status] = line.split('\t')
      if (!name || !status) continue
      // "ii" is installed; "rc" and friends only leave configuration behind.
      if (!status.startsWith('ii')) continue
      items[name] = version ? { ensure: 'present', version } : { ensure: 'present' }
    }
    return makeFragment(this.domain, items)
  }

  diff(desired: Fragment<PackageDesired>, observed: Fragment<PackageObserved>): Action[] {
    const installs: Action[] = []
    const removals: Action[] = []

    for (const name of Object.keys(desired.items).sort(byKey)) {
      const want = desired.items[name]
      const have = observed.items[name]
      if (want.ensure === 'absent') {
        if (have) removals.push(this.action('REMOVE', name))
        continue
      }
      if (!have || (want.version !== undefined && want.version !== have.version)) {
        installs.push(this.action('INSTALL', name, want.version))
      }
    }
    for (const name of Object.keys(observed.items).sort(byKey)) {
      if (!(name in desired.items)) removals.push(this.action('REMOVE', name))
    }
    removals.sort((a, b) => byKey(a.target, b.target))
    return [...installs, ...removals]
  }

  seed(observed: Fragment<PackageObserved>): Fragment<PackageDesired> {
    const items: Record<string, PackageDesired> = {}
    for (const name of Object.keys(observed.items).sort(byKey)) items[name] = { ensure: 'present' }
    return makeFragment(this.domain, items)
  }

  async capture(action: Action): Promise<unknown> {
    const res = await this.runner.run('dpkg-query', ['-W', '-f=${Package}\t${Version}\n', action.target])
    if (res.code !== 0) return { name: action.target, installed: false }
    const [, version] = res.stdout.trim().split('\t')
    return { name: action.target, installed: true, version }
  }

  async apply(action: Action): Promise<PluginResult> {
    let args: string[]
    if (action.verb === 'INSTALL') {
      const version = payloadString(action, 'version')
      args = ['install', '-y', version ? `${action.target}=${version}` : action.target]
    } else if (action.verb === 'REMOVE') {
      args = ['remove', '-y', action.target]
    } else {
      return failure(`Unsupported verb for packages: ${action.verb}`)
    }
    const [cmd, argv] = privileged(this.sudo, 'apt-get', args)
    const res = await this.runner.run(cmd, argv, { env: APT_ENV })
    if (res.code !== 0) return failure(describeFailure(res))
    return success(`${action.verb === 'INSTALL' ? 'Installed' : 'Removed'} ${action.target}`)
  }

  private action(verb: 'INSTALL' | 'REMOVE', name: string, version?: string): Action {
    return {
      domain: this.domain,
      verb,
      target: name,
      payload: version ? { version } : {},
      destructive: verb === 'REMOVE',
    }
  }
}
