import path from 'path'

import type { PluginRegistry } from '../plugins/registry.js'
import type { RepoLayout } from '../repo/layout.js'
import type { Logger, Plan, PlanProvenance, RunSummary } from '../types.js'
import { Applier, RunOptions } from './apply.js'
import { defaultAuditLogPath, tryAppendAudit } from './audit.js'
import { BackupStore, fileStamp } from './backup.js'
import { writeJsonAtomic } from './fs-ops.js'

export interface RunApplyInput {
  plan: Plan
  layout: RepoLayout
  registry: PluginRegistry
  currentProvenance: () => Promise<PlanProvenance>
  logger?: Logger
  now?: () => Date
  runOpts?: RunOptions
}

export interface RunApplyOutput {
  summary: RunSummary
  /** Repository-relative path of the stored summary. */
  summaryRef: string
  warnings: string[]
}

/**
 * Apply a plan, then store its summary under runs/ and append the audit line.
 * Staleness errors propagate before anything is written.
 */
export async function runApply(input: RunApplyInput): Promise<RunApplyOutput> {
  const applier = new Applier({
    registry: input.registry,
    backups: new BackupStore(input.layout.root),
    currentProvenance: input.currentProvenance,
    logger: input.logger,
    now: input.now,
  })
  const summary = await applier.run(input.plan, input.runOpts)
  const warnings: string[] = []

  const name = `${fileStamp(new Date(summary.startedAt))}.json`
  await writeJsonAtomic(path.join(input.layout.runsDir, name), summary)
  await tryAppendAudit(defaultAuditLogPath(input.layout.runsDir), summary, warnings)

  input.logger?.info(`[twinplan] apply ${summary.state} (${summary.durationMs}ms)`)
  return { summary, summaryRef: path.posix.join('runs', name), warnings }
}
