import type { Plan, RunSummary } from '../types.js'

export function formatPlan(plan: Plan): string {
  const lines: string[] = []
  for (const issue of plan.issues) {
    lines.push(`! ${issue.kind}: ${issue.message}`)
  }
  if (!plan.actions.length) {
    lines.push('No changes.')
    return lines.join('\n')
  }
  for (const a of plan.actions) {
    lines.push(`- [${a.domain}] ${a.verb} ${a.target}${a.destructive ? ' (backup first)' : ''}`)
  }
  return lines.join('\n')
}

export function formatSummary(summary: RunSummary): string {
  const lines = [`${summary.state}: ${summary.succeeded} succeeded, ${summary.failed} failed`]
  for (const r of summary.results) {
    const mark = r.outcome === 'success' ? 'ok  ' : 'FAIL'
    lines.push(`${mark} [${r.action.domain}] ${r.action.verb} ${r.action.target}: ${r.detail}`)
  }
  for (const a of summary.notStarted) {
    lines.push(`skip [${a.domain}] ${a.verb} ${a.target}: cancelled before start`)
  }
  return lines.join('\n')
}
