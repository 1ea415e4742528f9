import fs from 'fs-extra'
import os from 'os'
import path from 'path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { z } from 'zod'

import { openEngine, TwinEngine } from '../src/api/engine.js'
import { sha256 } from '../src/core/canonical.js'
import { BackupStore } from '../src/core/backup.js'
import { parsePlan, serializePlan } from '../src/core/plan.js'
import { EngineStateError, PlanStalenessError, VersionStoreError } from '../src/errors.js'
import { defaultRegistry } from '../src/plugins/registry.js'
import { CollectContext, Plugin, PluginResult, success } from '../src/plugins/types.js'
import { loadRepoConfig, RepoConfigInput, saveRepoConfig } from '../src/repo/config.js'
import type { Action, Fragment } from '../src/types.js'
import { fail, FakeMachine, MemoryFileSystem, MemoryVcs } from './helpers/fakes.js'

const EmptySchema = z.object({}).strict()
type Empty = z.infer<typeof EmptySchema>

/** Never finishes collecting on its own. */
class SlowPlugin implements Plugin<Empty, Empty> {
  readonly domain = 'slow'
  readonly desiredItem = EmptySchema
  readonly observedItem = EmptySchema

  async detect(): Promise<boolean> {
    return true
  }

  collect(ctx: CollectContext): Promise<Fragment<Empty>> {
    return new Promise((_, reject) => {
      ctx.signal.addEventListener('abort', () => reject(new Error('aborted')))
    })
  }

  diff(): Action[] {
    return []
  }

  seed(observed: Fragment<Empty>): Fragment<Empty> {
    return observed
  }

  async capture(): Promise<unknown> {
    return {}
  }

  async apply() {
    return { outcome: 'success' as const, detail: 'ok' }
  }
}

/** Calls back into the engine from inside apply. */
class ReentrantPlugin implements Plugin<Empty, Empty> {
  readonly domain = 'reentrant'
  readonly desiredItem = EmptySchema
  readonly observedItem = EmptySchema
  during: () => Promise<unknown> = async () => undefined
  caught: unknown

  async detect(): Promise<boolean> {
    return true
  }

  async collect(): Promise<Fragment<Empty>> {
    return { domain: this.domain, version: 1, items: {} }
  }

  diff(desired: Fragment<Empty>, observed: Fragment<Empty>): Action[] {
    return Object.keys(desired.items).sort()
      .filter(k => !(k in observed.items))
      .map((k): Action => ({ domain: this.domain, verb: 'UPDATE', target: k, payload: {}, destructive: false }))
  }

  seed(observed: Fragment<Empty>): Fragment<Empty> {
    return observed
  }

  async capture(): Promise<unknown> {
    return {}
  }

  async apply(): Promise<PluginResult> {
    try {
      await this.during()
    } catch (e) {
      this.caught = e
    }
    return success('ran')
  }
}

describe('TwinEngine', () => {
  let root: string
  let machine: FakeMachine
  let files: MemoryFileSystem
  let vcs: MemoryVcs
  let tick: number

  const now = () => new Date(Date.UTC(2026, 9, 19, 12, 0, tick++))

  async function open(config: RepoConfigInput = {}): Promise<TwinEngine> {
    await saveRepoConfig(root, { files: { roots: ['/etc/app'] }, ...config })
    return await openEngine(root, { runner: machine.runner, fs: files, vcs, now })
  }

  async function writeDesired(domain: string, items: Record<string, unknown>) {
    await fs.outputJson(path.join(root, 'desired', `${domain}.json`), { domain, version: 1, items })
  }

  async function readObserved(domain: string) {
    return await fs.readJson(path.join(root, 'observed', `${domain}.json`))
  }

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'twinplan-engine-'))
    machine = new FakeMachine()
    files = new MemoryFileSystem()
    vcs = new MemoryVcs(root)
    tick = 0
  })

  afterEach(async () => {
    await fs.remove(root)
  })

  it('seeds desired fragments from the first snapshot so a fresh twin has no drift', async () => {
    machine.packages.set('apache2', '2.4.58')
    machine.services.set('ssh.service', { enabled: true, running: true })
    machine.crontab = '@daily /opt/rotate\n'
    files.put('/etc/app/app.conf', 'port=80\n')
    const engine = await open()

    const res = await engine.init()
    expect(res.seeded).toEqual(['packages', 'services', 'files', 'startup'])
    expect(res.stale).toEqual([])
    expect(await fs.readJson(path.join(root, 'desired', 'packages.json'))).toEqual({
      domain: 'packages', version: 1, items: { apache2: { ensure: 'present' } },
    })

    expect((await engine.plan()).actions).toEqual([])
    expect(await engine.status()).toEqual({
      packages: 'in sync', services: 'in sync', files: 'in sync', startup: 'in sync',
    })
    expect(vcs.commits.map(c => c.meta.message)).toEqual([
      'snapshot: 4 domain(s) collected',
      'init: seed desired packages, services, files, startup',
    ])
  })

  it('converges packages and stops proposing changes afterwards', async () => {
    machine.packages.set('apache2', '2.4.58')
    const engine = await open()
    await engine.init()
    await writeDesired('packages', { nginx: {} })
    await engine.snapshot()

    const plan = await engine.plan()
    expect(plan.actions).toEqual([
      { domain: 'packages', verb: 'INSTALL', target: 'nginx', payload: {}, destructive: false },
      { domain: 'packages', verb: 'REMOVE', target: 'apache2', payload: {}, destructive: true },
    ])
    expect(engine.state).toBe('PlanReady')

    const summary = await engine.apply(plan)
    expect(summary.state).toBe('Completed')
    expect(engine.state).toBe('Done')
    expect([...machine.packages.keys()]).toEqual(['nginx'])
    expect(summary.results[0].backupRef).toBeUndefined()

    const ref = summary.results[1].backupRef ?? ''
    expect(ref).toMatch(/^backups\/packages\/\d{8}T\d{9}Z-001-apache2\.json$/)
    expect((await new BackupStore(root).read(ref)).state).toEqual({ name: 'apache2', installed: true, version: '2.4.58' })

    expect(vcs.commits[vcs.commits.length - 1].meta.message).toBe('apply: Completed (2 ok, 0 failed)')
    expect(summary.commit).toBe(vcs.commits[vcs.commits.length - 1].meta.commit)
    expect((await readObserved('packages')).items).toEqual({ nginx: { ensure: 'present', version: '1.0' } })

    const audit = (await fs.readFile(path.join(root, 'runs', 'audit.log.jsonl'), 'utf8')).trim().split('\n')
    expect(audit).toHaveLength(1)
    expect(JSON.parse(audit[0])).toMatchObject({ state: 'Completed', succeeded: 2, failed: 0 })

    expect((await engine.plan()).actions).toEqual([])
  })

  it('records a partial failure and keeps the successful actions', async () => {
    machine.packages.set('apache2', '2.4.58')
    machine.brokenPackages.add('ghost')
    const engine = await open()
    await engine.init()
    await writeDesired('packages', { ghost: {}, nginx: {} })
    await engine.snapshot()

    const summary = await engine.apply(await engine.plan())
    expect(summary.state).toBe('PartiallyFailed')
    expect(summary.results.map(r => `${r.action.verb} ${r.action.target} ${r.outcome}`)).toEqual([
      'INSTALL ghost failure',
      'INSTALL nginx success',
      'REMOVE apache2 success',
    ])
    expect(vcs.commits[vcs.commits.length - 1].meta.message).toBe('apply: PartiallyFailed (2 ok, 1 failed)')

    const next = await engine.plan()
    expect(next.actions.map(a => `${a.verb} ${a.target}`)).toEqual(['INSTALL ghost'])
  })

  it('backs up a replaced file with its previous content', async () => {
    files.put('/etc/app/app.conf', 'port=80\n')
    const engine = await open()
    await engine.init()
    await writeDesired('files', { '/etc/app/app.conf': { content: 'port=8080\n', mode: '0644' } })
    await engine.snapshot()

    const summary = await engine.apply(await engine.plan())
    const [result] = summary.results
    expect(result.action.verb).toBe('REPLACE')
    expect(result.outcome).toBe('success')
    expect(result.backupRef).toMatch(/^backups\/files\/\d{8}T\d{9}Z-000-etc-app-app\.conf\.json$/)

    const backup = await new BackupStore(root).read(result.backupRef ?? '')
    expect(backup.state).toEqual({
      path: '/etc/app/app.conf',
      hash: sha256('port=80\n'),
      mode: '0644',
      encoding: 'utf8',
      content: 'port=80\n',
    })
    expect(files.text('/etc/app/app.conf')).toBe('port=8080\n')
    expect((await readObserved('files')).items['/etc/app/app.conf'].hash).toBe(sha256('port=8080\n'))
  })

  it('plans byte-identically from the same snapshot and stores the plan', async () => {
    machine.packages.set('apache2', '2.4.58')
    const engine = await open()
    await engine.init()
    await writeDesired('packages', { nginx: {} })
    await engine.snapshot()

    const first = await engine.plan()
    const second = await engine.plan()
    expect(serializePlan(second)).toBe(serializePlan(first))
    expect(first.generatedAt).toBe(vcs.commits[vcs.commits.length - 1].meta.timestamp)
    expect(parsePlan(await fs.readJson(path.join(root, 'plans', 'latest.json')))).toEqual(first)
  })

  it('refuses a plan made before a reset and touches nothing', async () => {
    machine.packages.set('apache2', '2.4.58')
    const engine = await open()
    await engine.init()
    const seeded = await engine.history(1)
    await writeDesired('packages', { nginx: {} })
    await engine.snapshot()
    const plan = await engine.plan()

    const reset = await engine.resetTo(seeded[0].shortCommit)
    expect(vcs.commits[vcs.commits.length - 1].meta.message).toBe(`reset: restore fragments from ${seeded[0].commit.slice(0, 12)}`)
    expect(reset.commit).toBe(vcs.commits[vcs.commits.length - 1].meta.commit)
    expect((await fs.readJson(path.join(root, 'desired', 'packages.json'))).items).toEqual({ apache2: { ensure: 'present' } })

    await expect(engine.apply(plan)).rejects.toBeInstanceOf(PlanStalenessError)
    expect(machine.runner.commands().some(c => c.startsWith('apt-get'))).toBe(false)
    expect(engine.state).toBe('Idle')
    expect((await engine.plan()).actions).toEqual([])
  })

  it('refuses a plan when a fragment changed without a new commit', async () => {
    machine.packages.set('apache2', '2.4.58')
    const engine = await open()
    await engine.init()
    const plan = await engine.plan()
    await writeDesired('packages', {})

    await expect(engine.apply(plan)).rejects.toThrow(/generated against fragment set/)
  })

  it('rejects an unknown commit on reset', async () => {
    const engine = await open()
    await engine.init()
    await expect(engine.resetTo('deadbeef')).rejects.toThrow('Unknown commit: deadbeef')
  })

  it('lists history newest first', async () => {
    const engine = await open()
    await engine.init()
    await engine.snapshot()

    const history = await engine.history()
    expect(history.map(h => h.message)).toEqual([
      'snapshot: 4 domain(s) collected',
      'init: seed desired packages, services, files, startup',
      'snapshot: 4 domain(s) collected',
    ])
    expect(await engine.history(1)).toEqual([history[0]])
  })

  it('keeps the last good observed fragment when a collector fails', async () => {
    machine.packages.set('apache2', '2.4.58')
    const engine = await open()
    await engine.init()

    machine.dpkgBroken = true
    const res = await engine.snapshot()
    expect(res.stale).toEqual([{ domain: 'packages', reason: 'packages: exit 2: dpkg-query: database is locked' }])
    expect(vcs.commits[vcs.commits.length - 1].meta.message).toBe('snapshot: 3 domain(s) collected, stale: packages')

    const observed = await readObserved('packages')
    expect(observed.items).toEqual({ apache2: { ensure: 'present', version: '2.4.58' } })
    expect(observed.stale).toBe(true)
    expect(observed.staleReason).toBe('packages: exit 2: dpkg-query: database is locked')

    const plan = await engine.plan()
    expect(plan.issues).toEqual([{
      domain: 'packages',
      kind: 'stale',
      message: 'packages: observed state is stale (packages: exit 2: dpkg-query: database is locked)',
    }])
  })

  it('skips a domain whose tooling is missing instead of flagging it stale', async () => {
    machine.runner.on('systemctl', () => fail(127, 'systemctl: command not found'))
    const engine = await open()

    const res = await engine.init()
    expect(res.stale).toEqual([])
    expect(res.unavailable).toEqual(['services'])
    expect(res.seeded).toEqual(['packages', 'files', 'startup'])
    expect((await engine.history()).map(h => h.message)).toEqual([
      'init: seed desired packages, files, startup',
      'snapshot: 3 domain(s) collected, unavailable: services',
    ])

    const observed = await readObserved('services')
    expect(observed.items).toEqual({})
    expect(observed.unavailable).toBe(true)
    expect(machine.runner.commands().filter(c => c.startsWith('systemctl'))).toEqual(['systemctl --version'])

    await writeDesired('services', { 'ssh.service': { enabled: true, running: true } })
    await engine.snapshot()
    const plan = await engine.plan()
    expect(plan.actions).toEqual([])
    expect(plan.issues).toEqual([{ domain: 'services', kind: 'unavailable', message: 'services: not available on this host' }])
    expect((await engine.status()).services).toBe('unavailable')
  })

  it('gives up on a collector that exceeds the timeout', async () => {
    await saveRepoConfig(root, { files: { roots: ['/etc/app'] }, collect: { timeoutMs: 20 } })
    const config = await loadRepoConfig(root)
    const registry = defaultRegistry(config, { runner: machine.runner, fs: files }).register(new SlowPlugin())
    const engine = await openEngine(root, { registry, vcs, now })

    const res = await engine.snapshot()
    expect(res.stale).toEqual([{ domain: 'slow', reason: 'slow: timed out after 20ms' }])
    expect(await fs.pathExists(path.join(root, 'observed', 'slow.json'))).toBe(false)
    expect(await fs.pathExists(path.join(root, 'observed', 'packages.json'))).toBe(true)
  })

  it('refuses other operations while a plan is being applied', async () => {
    await saveRepoConfig(root, { files: { roots: ['/etc/app'] } })
    const config = await loadRepoConfig(root)
    const reentrant = new ReentrantPlugin()
    const registry = defaultRegistry(config, { runner: machine.runner, fs: files }).register(reentrant)
    const engine = await openEngine(root, { registry, vcs, now })
    await engine.init()
    await writeDesired('reentrant', { ping: {} })
    await engine.snapshot()

    const plan = await engine.plan()
    reentrant.during = () => engine.plan()
    const summary = await engine.apply(plan)

    expect(summary.state).toBe('Completed')
    expect(reentrant.caught).toBeInstanceOf(EngineStateError)
    expect(engine.state).toBe('Done')
  })

  it('reports drift and invalid fragments in status', async () => {
    const engine = await open()
    await engine.init()
    await writeDesired('packages', { nginx: {} })
    await writeDesired('services', { 'nginx.service': { enabled: 'yes', running: true } })

    expect(await engine.status()).toEqual({
      packages: 'drift', services: 'invalid', files: 'in sync', startup: 'in sync',
    })
  })

  it('refuses to run while another process holds the lock', async () => {
    const engine = await open()
    await engine.init()
    await fs.writeFile(path.join(root, '.twinplan.lock'), `${process.pid}\n`)

    await expect(engine.snapshot()).rejects.toBeInstanceOf(VersionStoreError)
    await expect(engine.snapshot()).rejects.toThrow(`Repository is locked by process ${process.pid}`)
  })

  it('takes over a lock left by a process that is gone', async () => {
    const engine = await open()
    await engine.init()
    const lock = path.join(root, '.twinplan.lock')
    await fs.writeFile(lock, '99999999\n')

    await engine.snapshot()
    expect(await fs.pathExists(lock)).toBe(false)
  })
})
