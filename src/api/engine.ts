import path from 'path'

import { RunOptions } from '../core/apply.js'
import { collectAll, CollectReport } from '../core/collect.js'
import { CommandRunner, execRunner } from '../core/command.js'
import { FileSystemPort } from '../core/fs.js'
import { writeJsonAtomic } from '../core/fs-ops.js'
import { withRepoLock } from '../core/lock.js'
import { buildPlan, fingerprint, planActions } from '../core/plan.js'
import { runApply } from '../core/runner.js'
import { EngineStateError, errorMessage, SchemaError } from '../errors.js'
import { parseObservedFragment } from '../fragments/schema.js'
import { FragmentStore } from '../fragments/store.js'
import { defaultRegistry, PluginRegistry } from '../plugins/registry.js'
import { loadRepoConfig, RepoConfig } from '../repo/config.js'
import { ensureLayout, RepoLayout, repoLayout } from '../repo/layout.js'
import { Domain, Logger, noopLogger, Plan, PlanProvenance, RunSummary, SnapshotMeta, SnapshotResult } from '../types.js'
import { GitCli, VersionControl } from '../vcs/git.js'
import { VersionStore } from '../vcs/store.js'

export type SessionState = 'Idle' | 'PlanReady' | 'Applying' | 'Done'

export type DomainStatus = 'in sync' | 'drift' | 'unmanaged' | 'invalid' | 'unknown' | 'unavailable'

export interface EngineOptions {
  config: RepoConfig
  registry: PluginRegistry
  vcs: VersionControl
  logger?: Logger
  now?: () => Date
}

export interface EngineRunSummary extends RunSummary {
  /** Commit recording the run and the observed state after it. */
  commit: string
  pushed: boolean
  warnings: string[]
}

export interface InitResult extends SnapshotResult {
  seeded: Domain[]
}

function snapshotMessage(report: CollectReport): string {
  const stale = report.stale.length ? `, stale: ${report.stale.map(s => s.domain).join(', ')}` : ''
  const unavailable = report.unavailable.length ? `, unavailable: ${report.unavailable.join(', ')}` : ''
  return `snapshot: ${report.collected.length} domain(s) collected${stale}${unavailable}`
}

/**
 * The boundary a front end talks to. The front end renders plans and obtains approval;
 * the engine never prompts.
 *
 * Session: Idle -> PlanReady (plan) -> Applying (apply) -> Done. A snapshot or reset returns to Idle.
 */
export class TwinEngine {
  readonly config: RepoConfig
  readonly layout: RepoLayout
  readonly registry: PluginRegistry
  readonly fragments: FragmentStore
  readonly versions: VersionStore
  private readonly logger: Logger
  private readonly now: () => Date
  private session: SessionState = 'Idle'

  constructor(opts: EngineOptions) {
    this.config = opts.config
    this.layout = repoLayout(opts.config.root)
    this.registry = opts.registry
    this.logger = opts.logger ?? noopLogger()
    this.now = opts.now ?? (() => new Date())
    this.fragments = new FragmentStore(this.layout)
    this.versions = new VersionStore(opts.vcs, opts.config.remote, this.logger)
  }

  get state(): SessionState {
    return this.session
  }

  /**
   * Prepare the repository, take the first snapshot and seed every desired fragment that does
   * not exist yet from what was observed, so a fresh twin starts without drift.
   */
  async init(): Promise<InitResult> {
    await ensureLayout(this.layout)
    await this.versions.init()
    const first = await this.snapshot()
    const seeded: Domain[] = []
    for (const plugin of this.registry.ordered()) {
      if (await this.fragments.read('desired', plugin.domain) !== undefined) continue
      const raw = await this.fragments.read('observed', plugin.domain)
      if (raw === undefined) continue
      const observed = parseObservedFragment(plugin.domain, raw, plugin.observedItem)
      if (observed.stale || observed.unavailable) continue
      await this.fragments.writeDesired(plugin.seed(observed))
      seeded.push(plugin.domain)
    }
    if (!seeded.length) return { ...first, seeded }
    const rec = await withRepoLock(this.layout.lockPath, () => this.versions.record(`init: seed desired ${seeded.join(', ')}`))
    return { ...first, commit: rec.head.commit, pushed: first.pushed || rec.pushed, warnings: [...first.warnings, ...rec.warnings], seeded }
  }

  /**
   * Collect every domain into observed/ and commit the full fragment set.
   */
  async snapshot(): Promise<SnapshotResult> {
    this.assertNotApplying('snapshot')
    return await withRepoLock(this.layout.lockPath, async () => {
      await ensureLayout(this.layout)
      const report = await this.collect()
      const rec = await this.versions.record(snapshotMessage(report))
      this.session = 'Idle'
      this.logger.info(`[twinplan] snapshot ${rec.head.shortCommit}`)
      return { commit: rec.head.commit, stale: report.stale, unavailable: report.unavailable, pushed: rec.pushed, warnings: rec.warnings }
    })
  }

  /**
   * Diff desired against observed at the current commit. Writes plans/latest.json.
   */
  async plan(): Promise<Plan> {
    this.assertNotApplying('plan')
    const head = await this.versions.head()
    const set = await this.fragments.readAll()
    const plan = buildPlan(this.registry, set, head.commit, head.timestamp, {
      domainPriority: this.config.domainPriority,
    })
    await writeJsonAtomic(path.join(this.layout.plansDir, 'latest.json'), plan)
    this.session = 'PlanReady'
    return plan
  }

  /**
   * Apply an approved plan, re-collect and commit the outcome. A plan generated against any
   * other commit or fragment set is refused with PlanStalenessError before any action runs.
   */
  async apply(plan: Plan, runOpts: RunOptions = {}): Promise<EngineRunSummary> {
    this.assertNotApplying('apply')
    return await withRepoLock(this.layout.lockPath, async () => {
      this.session = 'Applying'
      try {
        const { summary, warnings } = await runApply({
          plan,
          layout: this.layout,
          registry: this.registry,
          currentProvenance: () => this.provenance(),
          logger: this.logger,
          now: this.now,
          runOpts,
        })
        const report = await this.collect()
        for (const s of report.stale) warnings.push(`${s.domain} could not be re-collected: ${s.reason}`)
        const rec = await this.versions.record(`apply: ${summary.state} (${summary.succeeded} ok, ${summary.failed} failed)`)
        this.session = 'Done'
        return { ...summary, commit: rec.head.commit, pushed: rec.pushed, warnings: [...warnings, ...rec.warnings] }
      } catch (e) {
        this.session = 'Idle'
        throw e
      }
    })
  }

  /** Newest first. */
  async history(limit = 20): Promise<SnapshotMeta[]> {
    return await this.versions.history(limit)
  }

  /**
   * Bring back the fragment set of an earlier snapshot as a new commit. The machine is not
   * touched; plan and apply again to converge it.
   */
  async resetTo(commitId: string): Promise<SnapshotResult> {
    this.assertNotApplying('reset')
    return await withRepoLock(this.layout.lockPath, async () => {
      const rec = await this.versions.resetTo(commitId)
      this.session = 'Idle'
      this.logger.info(`[twinplan] reset to ${commitId} as ${rec.head.shortCommit}`)
      return { commit: rec.head.commit, stale: [], unavailable: [], pushed: rec.pushed, warnings: rec.warnings }
    })
  }

  /** Fragment changes between two snapshots, as a unified diff. */
  async changes(from: string, to: string): Promise<string> {
    return await this.versions.diff(from, to)
  }

  async pull(): Promise<void> {
    this.assertNotApplying('pull')
    await withRepoLock(this.layout.lockPath, () => this.versions.pull())
    this.session = 'Idle'
  }

  /**
   * Drift per registered domain, without writing a plan.
   */
  async status(): Promise<Record<Domain, DomainStatus>> {
    const set = await this.fragments.readAll()
    const out: Record<Domain, DomainStatus> = {}
    const { actions, issues } = planActions(this.registry, set)
    for (const plugin of this.registry.ordered()) {
      const d = plugin.domain
      if (set.desired[d] === undefined) out[d] = 'unmanaged'
      else if (issues.some(i => i.domain === d && i.kind === 'schema')) out[d] = 'invalid'
      else if (set.observed[d] === undefined) out[d] = 'unknown'
      else if (issues.some(i => i.domain === d && i.kind === 'unavailable')) out[d] = 'unavailable'
      else out[d] = actions.some(a => a.domain === d) ? 'drift' : 'in sync'
    }
    return out
  }

  async provenance(): Promise<PlanProvenance> {
    const head = await this.versions.head()
    return { commit: head.commit, fingerprint: fingerprint(await this.fragments.readAll()) }
  }

  private async collect(): Promise<CollectReport> {
    return await collectAll(this.registry, this.fragments, {
      timeoutMs: this.config.collect.timeoutMs,
      logger: this.logger,
      now: this.now,
    })
  }

  private assertNotApplying(what: string) {
    if (this.session === 'Applying') {
      throw new EngineStateError(`Cannot ${what} while a plan is being applied`)
    }
  }
}

export interface OpenEngineOptions {
  runner?: CommandRunner
  fs?: FileSystemPort
  vcs?: VersionControl
  registry?: PluginRegistry
  logger?: Logger
  now?: () => Date
}

/**
 * Load the repository config and wire the built-in plugins and git.
 */
export async function openEngine(root: string, opts: OpenEngineOptions = {}): Promise<TwinEngine> {
  const config = await loadRepoConfig(root)
  const runner = opts.runner ?? execRunner()
  return new TwinEngine({
    config,
    registry: opts.registry ?? defaultRegistry(config, { runner, fs: opts.fs }),
    vcs: opts.vcs ?? new GitCli(config.root, runner),
    logger: opts.logger,
    now: opts.now,
  })
}

export function describeError(e: unknown): string {
  if (e instanceof SchemaError) return `${e.name}: ${e.issues.join('; ')}`
  return e instanceof Error ? `${e.name}: ${e.message}` : errorMessage(e)
}
