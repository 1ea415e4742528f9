import fs from 'fs-extra'
import os from 'os'
import path from 'path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { z } from 'zod'

import { Applier } from '../src/core/apply.js'
import { BackupStore } from '../src/core/backup.js'
import { ApplyError, PlanStalenessError } from '../src/errors.js'
import { PluginRegistry } from '../src/plugins/registry.js'
import { failure, Plugin, PluginResult, success } from '../src/plugins/types.js'
import type { Action, Fragment, Plan, PlanProvenance } from '../src/types.js'

const ValueSchema = z.object({ value: z.string() }).strict()
type Value = z.infer<typeof ValueSchema>

/**
 * Keeps a key/value table in memory and records every call made to it.
 */
class RecordingPlugin implements Plugin<Value, Value> {
  readonly domain = 'demo'
  readonly desiredItem = ValueSchema
  readonly observedItem = ValueSchema
  readonly table = new Map<string, string>()
  readonly calls: string[] = []
  readonly refuse = new Set<string>()
  readonly explode = new Set<string>()
  readonly unreadable = new Set<string>()
  onApply: (action: Action) => void = () => {}

  async detect(): Promise<boolean> {
    return true
  }

  async collect(): Promise<Fragment<Value>> {
    return { domain: this.domain, version: 1, items: {} }
  }

  diff(): Action[] {
    return []
  }

  seed(observed: Fragment<Value>): Fragment<Value> {
    return observed
  }

  async capture(action: Action): Promise<unknown> {
    this.calls.push(`capture ${action.target}`)
    if (this.unreadable.has(action.target)) throw new Error('permission denied')
    return { value: this.table.get(action.target) ?? null }
  }

  async apply(action: Action): Promise<PluginResult> {
    this.calls.push(`${action.verb} ${action.target}`)
    this.onApply(action)
    if (this.explode.has(action.target)) throw new Error('connection reset')
    if (this.refuse.has(action.target)) return failure(`${action.target} is read-only`)
    if (action.verb === 'DELETE') this.table.delete(action.target)
    else this.table.set(action.target, String(action.payload.value))
    return success(`${action.verb} ${action.target}`)
  }
}

const provenance: PlanProvenance = { commit: 'c'.repeat(40), fingerprint: 'f'.repeat(64) }

function act(verb: 'CREATE' | 'REPLACE' | 'DELETE', target: string, value?: string): Action {
  return {
    domain: 'demo',
    verb,
    target,
    payload: value === undefined ? {} : { value },
    destructive: verb !== 'CREATE',
  }
}

function planOf(actions: Action[]): Plan {
  return { generatedAt: '2026-10-19T12:00:00.000Z', provenance, actions, issues: [] }
}

describe('Applier', () => {
  let root: string
  let plugin: RecordingPlugin
  let registry: PluginRegistry
  let current: PlanProvenance

  const applier = () => new Applier({
    registry,
    backups: new BackupStore(root),
    currentProvenance: async () => current,
    now: () => new Date('2026-10-19T12:00:00.000Z'),
  })

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'twinplan-apply-'))
    plugin = new RecordingPlugin()
    registry = new PluginRegistry().register(plugin)
    current = provenance
  })

  afterEach(async () => {
    await fs.remove(root)
  })

  it('runs every action in order and completes', async () => {
    const a = applier()
    const summary = await a.run(planOf([act('CREATE', 'a', '1'), act('CREATE', 'b', '2')]))

    expect(summary.state).toBe('Completed')
    expect(a.state).toBe('Completed')
    expect(plugin.calls).toEqual(['CREATE a', 'CREATE b'])
    expect(summary.results.map(r => r.outcome)).toEqual(['success', 'success'])
    expect(summary).toMatchObject({ succeeded: 2, failed: 0, notStarted: [], provenance })
  })

  it('keeps going after a failure and reports PartiallyFailed', async () => {
    plugin.refuse.add('b')
    const summary = await applier().run(planOf([act('CREATE', 'a', '1'), act('CREATE', 'b', '2'), act('CREATE', 'c', '3')]))

    expect(summary.state).toBe('PartiallyFailed')
    expect(plugin.calls).toEqual(['CREATE a', 'CREATE b', 'CREATE c'])
    expect(summary.results[1]).toEqual({ action: act('CREATE', 'b', '2'), outcome: 'failure', detail: 'b is read-only' })
    expect([summary.succeeded, summary.failed]).toEqual([2, 1])
  })

  it('turns a throwing plugin into a failed result', async () => {
    plugin.explode.add('a')
    const summary = await applier().run(planOf([act('CREATE', 'a', '1')]))
    expect(summary.results[0].detail).toBe('ApplyError: connection reset')
  })

  it('backs up the target before a destructive action', async () => {
    plugin.table.set('conf', 'old')
    const summary = await applier().run(planOf([act('CREATE', 'x', '1'), act('REPLACE', 'conf', 'new')]))

    expect(plugin.calls).toEqual(['CREATE x', 'capture conf', 'REPLACE conf'])
    const ref = summary.results[1].backupRef
    expect(ref).toBe('backups/demo/20261019T120000000Z-001-conf.json')
    expect(summary.results[0].backupRef).toBeUndefined()

    const record = await new BackupStore(root).read(ref ?? '')
    expect(record.state).toEqual({ value: 'old' })
    expect(record.action).toEqual(act('REPLACE', 'conf', 'new'))
    expect(plugin.table.get('conf')).toBe('new')
  })

  it('skips the mutation when the backup cannot be taken', async () => {
    plugin.table.set('secret', 'keep')
    plugin.unreadable.add('secret')
    const summary = await applier().run(planOf([act('DELETE', 'secret'), act('CREATE', 'after', '1')]))

    expect(plugin.calls).toEqual(['capture secret', 'CREATE after'])
    expect(summary.results[0]).toEqual({
      action: act('DELETE', 'secret'),
      outcome: 'failure',
      detail: 'BackupError: Cannot capture secret: permission denied; not applied',
    })
    expect(plugin.table.get('secret')).toBe('keep')
    expect(summary.state).toBe('PartiallyFailed')
  })

  it('refuses an existing backup reference instead of overwriting it', async () => {
    plugin.table.set('conf', 'old')
    const ref = 'backups/demo/20261019T120000000Z-000-conf.json'
    await fs.outputJson(path.join(root, ref), { earlier: true })

    const summary = await applier().run(planOf([act('REPLACE', 'conf', 'new')]))
    expect(summary.results[0].outcome).toBe('failure')
    expect(summary.results[0].detail).toBe(`BackupError: Cannot write backup ${ref}: backup ${ref} already exists; not applied`)
    expect(await fs.readJson(path.join(root, ref))).toEqual({ earlier: true })
  })

  it('rejects a plan made at another commit before running anything', async () => {
    current = { ...provenance, commit: 'd'.repeat(40) }
    await expect(applier().run(planOf([act('CREATE', 'a', '1')]))).rejects.toBeInstanceOf(PlanStalenessError)
    expect(plugin.calls).toEqual([])
  })

  it('rejects a plan whose fragments changed since planning', async () => {
    current = { ...provenance, fingerprint: 'e'.repeat(64) }
    await expect(applier().run(planOf([act('CREATE', 'a', '1')]))).rejects.toThrow(/generated against fragment set f+, repository is at e+/)
    expect(plugin.calls).toEqual([])
  })

  it('stops before the next action when aborted and lists what never started', async () => {
    const controller = new AbortController()
    plugin.onApply = (action) => {
      if (action.target === 'b') controller.abort()
    }
    const actions = [act('CREATE', 'a', '1'), act('CREATE', 'b', '2'), act('CREATE', 'c', '3'), act('CREATE', 'd', '4')]
    const summary = await applier().run(planOf(actions), { signal: controller.signal })

    expect(summary.state).toBe('Cancelled')
    expect(plugin.calls).toEqual(['CREATE a', 'CREATE b'])
    expect(summary.results).toHaveLength(2)
    expect(summary.notStarted).toEqual([actions[2], actions[3]])
  })

  it('fails an action whose domain has no plugin', async () => {
    const stray: Action = { domain: 'ghost', verb: 'CREATE', target: 'x', payload: {}, destructive: false }
    const summary = await applier().run(planOf([stray]))
    expect(summary.results[0].detail).toBe('No plugin registered for domain "ghost"')
  })

  it('runs only once', async () => {
    const a = applier()
    await a.run(planOf([]))
    await expect(a.run(planOf([]))).rejects.toBeInstanceOf(ApplyError)
  })
})
