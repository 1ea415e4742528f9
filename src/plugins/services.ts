import { z } from 'zod'

import { commandAvailable, CommandRunner, describeFailure, privileged } from '../core/command.js'
import { CollectionError } from '../errors.js'
import { makeFragment } from '../fragments/schema.js'
import type { Action, Fragment, Verb } from '../types.js'
import { byKey, CollectContext, failure, Plugin, PluginResult, success } from './types.js'

export const ServiceSchema = z.object({
  enabled: z.boolean(),
  running: z.boolean(),
}).strict()

export type ServiceState = z.infer<typeof ServiceSchema>

export interface ServicesPluginOptions {
  runner: CommandRunner
  sudo?: boolean
}

const ABSENT: ServiceState = { enabled: false, running: false }

const COMMANDS: Partial<Record<Verb, string>> = {
  ENABLE: 'enable',
  DISABLE: 'disable',
  START: 'start',
  STOP: 'stop',
}

/**
 * systemd units of type service. Template units (`name@.service`) are skipped.
 */
export class ServicesPlugin implements Plugin<ServiceState, ServiceState> {
  readonly domain = 'services'
  readonly desiredItem = ServiceSchema
  readonly observedItem = ServiceSchema

  private readonly runner: CommandRunner
  private readonly sudo: boolean

  constructor(opts: ServicesPluginOptions) {
    this.runner = opts.runner
    this.sudo = opts.sudo ?? false
  }

  detect(): Promise<boolean> {
    return commandAvailable(this.runner, 'systemctl', ['--version'])
  }

  async collect(ctx: CollectContext): Promise<Fragment<ServiceState>> {
    const list = await this.runner.run(
      'systemctl',
      ['list-unit-files', '--type=service', '--no-legend', '--no-pager'],
      { signal: ctx.signal },
    )
    if (list.code !== 0) throw new CollectionError(this.domain, describeFailure(list))

    const enabled = new Map<string, boolean>()
    for (const line of list.stdout.split('\n')) {
      const [name, state] = line.trim().split(/\s+/)
      if (!name || !state || name.includes('@.')) continue
      enabled.set(name, state === 'enabled')
    }
    const names = [...enabled.keys()].sort(byKey)
    const items: Record<string, ServiceState> = {}
    if (!names.length) return makeFragment(this.domain, items)

    // is-active exits non-zero when any unit is inactive; the per-unit lines are what matter.
    const active = await this.runner.run('systemctl', ['is-active', ...names], { signal: ctx.signal })
    const states = active.stdout.split('\n').map(s => s.trim()).filter(Boolean)
    if (states.length !== names.length) {
      throw new CollectionError(this.domain, `is-active returned ${states.length} states for ${names.length} units`)
    }
    names.forEach((name, i) => {
      items[name] = { enabled: enabled.get(name) === true, running: states[i] === 'active' }
    })
    return makeFragment(this.domain, items)
  }

  diff(desired: Fragment<ServiceState>, observed: Fragment<ServiceState>): Action[] {
    const actions: Action[] = []
    for (const name of Object.keys(desired.items).sort(byKey)) {
      const want = desired.items[name]
      const have = observed.items[name] ?? ABSENT
      if (want.enabled !== have.enabled) {
        actions.push(this.action(want.enabled ? 'ENABLE' : 'DISABLE', name))
      }
      if (want.running !== have.running) {
        actions.push(this.action(want.running ? 'START' : 'STOP', name))
      }
    }
    return actions
  }

  seed(observed: Fragment<ServiceState>): Fragment<ServiceState> {
    return makeFragment(this.domain, { ...observed.items })
  }

  async capture(action: Action): Promise<unknown> {
    const enabled = await this.runner.run('systemctl', ['is-enabled', action.target])
    const active = await this.runner.run('systemctl', ['is-active', action.target])
    return {
      name: action.target,
      enabled: enabled.stdout.trim() === 'enabled',
      running: active.stdout.trim() === 'active',
    }
  }

  async apply(action: Action): Promise<PluginResult> {
    const sub = COMMANDS[action.verb]
    if (!sub) return failure(`Unsupported verb for services: ${action.verb}`)
    const [cmd, argv] = privileged(this.sudo, 'systemctl', [sub, action.target])
    const res = await this.runner.run(cmd, argv)
    if (res.code !== 0) return failure(describeFailure(res))
    return success(`systemctl ${sub} ${action.target}`)
  }

  private action(verb: Verb, name: string): Action {
    return {
      domain: this.domain,
      verb,
      target: name,
      payload: {},
      destructive: verb === 'DISABLE' || verb === 'STOP',
    }
  }
}
