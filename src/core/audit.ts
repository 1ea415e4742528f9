import fs from 'fs-extra'
import path from 'path'

import { errorMessage } from '../errors.js'
import type { RunSummary } from '../types.js'

export const AUDIT_LOG = 'audit.log.jsonl'

export function defaultAuditLogPath(runsDir: string) {
  return path.join(runsDir, AUDIT_LOG)
}

export async function appendAudit(logPath: string, summary: RunSummary) {
  await fs.ensureDir(path.dirname(logPath))
  const line = JSON.stringify({
    state: summary.state,
    commit: summary.provenance.commit,
    startedAt: summary.startedAt,
    finishedAt: summary.finishedAt,
    succeeded: summary.succeeded,
    failed: summary.failed,
    notStarted: summary.notStarted.length,
    results: summary.results.map(r => ({
      domain: r.action.domain,
      verb: r.action.verb,
      target: r.action.target,
      outcome: r.outcome,
      backupRef: r.backupRef,
    })),
  }) + '\n'
  await fs.appendFile(logPath, line, 'utf8')
}

/**
 * Audit is best effort: a failed append becomes a warning, never a failed run.
 */
export async function tryAppendAudit(logPath: string, summary: RunSummary, warnings: string[]): Promise<void> {
  try {
    await appendAudit(logPath, summary)
  } catch (e) {
    warnings.push(`Failed to write audit log: ${errorMessage(e)}`)
  }
}
