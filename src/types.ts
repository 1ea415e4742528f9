export type Domain = string

export const BUILTIN_DOMAINS = ['packages', 'services', 'files', 'startup'] as const

export type Verb =
  | 'INSTALL'
  | 'REMOVE'
  | 'ENABLE'
  | 'DISABLE'
  | 'START'
  | 'STOP'
  | 'CREATE'
  | 'REPLACE'
  | 'DELETE'
  | 'UPDATE'

export type ItemAttributes = Record<string, unknown>

export interface Fragment<Item extends ItemAttributes = ItemAttributes> {
  domain: Domain
  version: 1
  items: Record<string, Item>
}

export interface ObservedFragment<Item extends ItemAttributes = ItemAttributes> extends Fragment<Item> {
  collectedAt: string
  /**
   * Set when the last collection failed and these items are the last good ones.
   */
  stale?: boolean
  staleReason?: string
  /** Set when the plugin's tooling is missing on this host; items are then empty. */
  unavailable?: boolean
}

export interface Action {
  readonly domain: Domain
  readonly verb: Verb
  readonly target: string
  readonly payload: Readonly<ItemAttributes>
  /**
   * Decided by the plugin diff. The applier backs up the target before mutating when set.
   */
  readonly destructive: boolean
}

export interface PlanProvenance {
  /** Version store commit the fragments were read at. */
  commit: string
  /** SHA-256 over the canonical desired+observed fragment set. */
  fingerprint: string
}

export interface PlanIssue {
  domain: Domain
  kind: 'schema' | 'stale' | 'unavailable'
  message: string
}

export interface Plan {
  generatedAt: string
  provenance: PlanProvenance
  actions: Action[]
  issues: PlanIssue[]
}

export type Outcome = 'success' | 'failure'

export interface ActionResult {
  action: Action
  outcome: Outcome
  detail: string
  backupRef?: string
}

export type RunState = 'Pending' | 'Running' | 'Completed' | 'PartiallyFailed' | 'Cancelled'

export interface RunSummary {
  state: RunState
  provenance: PlanProvenance
  startedAt: string
  finishedAt: string
  durationMs: number
  results: ActionResult[]
  notStarted: Action[]
  succeeded: number
  failed: number
}

export interface SnapshotMeta {
  commit: string
  shortCommit: string
  timestamp: string
  message: string
}

export interface SnapshotResult {
  commit: string
  /** Domains whose observed fragment is the last good one. */
  stale: Array<{ domain: Domain; reason: string }>
  /** Domains skipped because their plugin is not available on this host. */
  unavailable: Domain[]
  pushed: boolean
  warnings: string[]
}

export interface Logger {
  info(msg: string): void
  warn(msg: string): void
  error(msg: string): void
}

export function noopLogger(): Logger {
  return {
    info: () => {},
    warn: () => {},
    error: () => {},
  }
}
