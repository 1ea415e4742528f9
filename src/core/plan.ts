import { z } from 'zod'

import { SchemaError } from '../errors.js'
import { parseFragment, parseObservedFragment } from '../fragments/schema.js'
import type { FragmentSet } from '../fragments/store.js'
import type { PluginRegistry } from '../plugins/registry.js'
import type { Action, Domain, Fragment, ObservedFragment, Plan, PlanIssue, PlanProvenance } from '../types.js'
import { canonicalJson, sha256 } from './canonical.js'

export interface PlanOptions {
  /** Domains to plan first, in this order. */
  domainPriority?: readonly Domain[]
}

export interface PlannedActions {
  actions: Action[]
  issues: PlanIssue[]
}

/**
 * Diff every registered domain that has both a desired and an observed fragment.
 * A domain whose desired fragment is invalid contributes a schema issue and no actions.
 * A domain with no desired fragment is unmanaged and contributes nothing.
 * A domain observed as unavailable on this host contributes an issue and no actions.
 */
export function planActions(registry: PluginRegistry, set: FragmentSet, opts: PlanOptions = {}): PlannedActions {
  const actions: Action[] = []
  const issues: PlanIssue[] = []

  for (const plugin of registry.ordered(opts.domainPriority)) {
    const domain = plugin.domain
    const rawDesired = set.desired[domain]
    if (rawDesired === undefined) continue

    let desired: Fragment
    try {
      desired = parseFragment(domain, rawDesired, plugin.desiredItem)
    } catch (e) {
      if (!(e instanceof SchemaError)) throw e
      issues.push({ domain, kind: 'schema', message: e.message })
      continue
    }

    const rawObserved = set.observed[domain]
    if (rawObserved === undefined) {
      issues.push({ domain, kind: 'stale', message: `${domain}: nothing observed yet; take a snapshot first` })
      continue
    }
    let observed: ObservedFragment
    try {
      observed = parseObservedFragment(domain, rawObserved, plugin.observedItem)
    } catch (e) {
      if (!(e instanceof SchemaError)) throw e
      issues.push({ domain, kind: 'schema', message: `observed ${e.message}` })
      continue
    }
    if (observed.unavailable) {
      issues.push({ domain, kind: 'unavailable', message: `${domain}: not available on this host` })
      continue
    }
    if (observed.stale) {
      issues.push({ domain, kind: 'stale', message: `${domain}: observed state is stale (${observed.staleReason ?? 'unknown reason'})` })
    }

    actions.push(...plugin.diff(desired, observed))
  }

  return { actions, issues }
}

export function fingerprint(set: FragmentSet): string {
  return sha256(canonicalJson(set))
}

/**
 * The plan for a fragment set read at `commit`, stamped with that commit's time.
 * Planning the same snapshot twice serializes identically.
 */
export function buildPlan(registry: PluginRegistry, set: FragmentSet, commit: string, committedAt: string, opts: PlanOptions = {}): Plan {
  const provenance: PlanProvenance = { commit, fingerprint: fingerprint(set) }
  const { actions, issues } = planActions(registry, set, opts)
  return { generatedAt: committedAt, provenance, actions, issues }
}

export function serializePlan(plan: Plan): string {
  return canonicalJson(plan)
}

export function sameProvenance(a: PlanProvenance, b: PlanProvenance): boolean {
  return a.commit === b.commit && a.fingerprint === b.fingerprint
}

const ActionSchema = z.object({
  domain: z.string().min(1),
  verb: z.enum(['INSTALL', 'REMOVE', 'ENABLE', 'DISABLE', 'START', 'STOP', 'CREATE', 'REPLACE', 'DELETE', 'UPDATE']),
  target: z.string().min(1),
  payload: z.record(z.unknown()),
  destructive: z.boolean(),
})

const PlanSchema = z.object({
  generatedAt: z.string(),
  provenance: z.object({ commit: z.string().min(1), fingerprint: z.string().min(1) }),
  actions: z.array(ActionSchema),
  issues: z.array(z.object({
    domain: z.string(),
    kind: z.enum(['schema', 'stale', 'unavailable']),
    message: z.string(),
  })),
})

/**
 * Read back a stored plan, e.g. plans/latest.json after a front end showed it for approval.
 */
export function parsePlan(raw: unknown): Plan {
  const parsed = PlanSchema.safeParse(raw)
  if (!parsed.success) {
    throw new SchemaError('plan', parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`))
  }
  return parsed.data
}
