import { ApplyError, BackupError, errorMessage, PlanStalenessError } from '../errors.js'
import type { PluginRegistry } from '../plugins/registry.js'
import { Action, ActionResult, Logger, noopLogger, Plan, PlanProvenance, RunState, RunSummary } from '../types.js'
import { backupRefFor, BackupStore } from './backup.js'

function durationMs(start: number) {
  return Date.now() - start
}

export interface ApplierOptions {
  registry: PluginRegistry
  backups: BackupStore
  /** Where the repository stands now; compared with the plan's provenance before anything runs. */
  currentProvenance: () => Promise<PlanProvenance>
  logger?: Logger
  now?: () => Date
}

export interface RunOptions {
  /** Aborting stops before the next action. Applied actions are kept. */
  signal?: AbortSignal
}

/**
 * Executes a plan verbatim. It never re-plans and never decides what to do:
 * destructiveness, order and payloads all come from the plan.
 */
export class Applier {
  private runState: RunState = 'Pending'
  private readonly logger: Logger
  private readonly now: () => Date

  constructor(private readonly opts: ApplierOptions) {
    this.logger = opts.logger ?? noopLogger()
    this.now = opts.now ?? (() => new Date())
  }

  get state(): RunState {
    return this.runState
  }

  async run(plan: Plan, runOpts: RunOptions = {}): Promise<RunSummary> {
    if (this.runState !== 'Pending') {
      throw new ApplyError(`An applier runs once; this one is ${this.runState}`)
    }
    const current = await this.opts.currentProvenance()
    if (current.commit !== plan.provenance.commit) {
      throw new PlanStalenessError(plan.provenance.commit, current.commit)
    }
    if (current.fingerprint !== plan.provenance.fingerprint) {
      throw new PlanStalenessError(plan.provenance.fingerprint, current.fingerprint, 'fragment set')
    }

    const startTs = Date.now()
    const started = this.now()
    this.runState = 'Running'
    const results: ActionResult[] = []
    const notStarted: Action[] = []

    for (const [index, action] of plan.actions.entries()) {
      if (runOpts.signal?.aborted) {
        notStarted.push(...plan.actions.slice(index))
        break
      }
      const result = await this.applyOne(action, index, started)
      results.push(result)
      if (result.outcome === 'failure') {
        this.logger.error(`[twinplan] ${action.domain} ${action.verb} ${action.target} failed: ${result.detail}`)
      } else {
        this.logger.info(`[twinplan] ${action.domain} ${action.verb} ${action.target}`)
      }
    }

    const failed = results.filter(r => r.outcome === 'failure').length
    this.runState = notStarted.length ? 'Cancelled' : failed ? 'PartiallyFailed' : 'Completed'
    return {
      state: this.runState,
      provenance: plan.provenance,
      startedAt: started.toISOString(),
      finishedAt: this.now().toISOString(),
      durationMs: durationMs(startTs),
      results,
      notStarted,
      succeeded: results.length - failed,
      failed,
    }
  }

  private async applyOne(action: Action, index: number, runStartedAt: Date): Promise<ActionResult> {
    const plugin = this.opts.registry.get(action.domain)
    if (!plugin) {
      return { action, outcome: 'failure', detail: `No plugin registered for domain "${action.domain}"` }
    }

    let backupRef: string | undefined
    if (action.destructive) {
      try {
        const state = await plugin.capture(action)
        backupRef = await this.opts.backups.write(backupRefFor(action, index, runStartedAt), {
          action,
          capturedAt: this.now().toISOString(),
          state,
        })
      } catch (e) {
        const err = e instanceof BackupError ? e : new BackupError(`Cannot capture ${action.target}: ${errorMessage(e)}`)
        return { action, outcome: 'failure', detail: `${err.name}: ${err.message}; not applied` }
      }
    }

    try {
      const res = await plugin.apply(action)
      return backupRef ? { action, ...res, backupRef } : { action, ...res }
    } catch (e) {
      const err = new ApplyError(errorMessage(e))
      const out: ActionResult = { action, outcome: 'failure', detail: `${err.name}: ${err.message}` }
      if (backupRef) out.backupRef = backupRef
      return out
    }
  }
}
