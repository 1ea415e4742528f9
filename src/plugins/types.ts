import type { ItemSchema } from '../fragments/schema.js'
import type { Action, Domain, Fragment, ItemAttributes, Logger, Outcome } from '../types.js'

export interface CollectContext {
  signal: AbortSignal
  logger: Logger
}

export interface PluginResult {
  outcome: Outcome
  detail: string
}

/**
 * One configuration domain. Registered once at startup and driven polymorphically.
 *
 * - `detect` tells whether the plugin's tooling exists on this host. An undetected plugin is
 *   neither collected nor planned.
 * - `collect` reads live state and never mutates it. It may throw; the orchestrator contains it.
 * - `diff` is pure: the same fragments always give the same actions in the same order.
 * - `seed` turns an observed fragment into a desired one, for a freshly initialised twin.
 * - `capture` returns the pre-state of a destructive action's target, for the backup.
 * - `apply` performs exactly one mutation and reports failure in its result.
 */
export interface Plugin<Desired extends ItemAttributes = ItemAttributes, Observed extends ItemAttributes = ItemAttributes> {
  readonly domain: Domain
  readonly desiredItem: ItemSchema<Desired>
  readonly observedItem: ItemSchema<Observed>
  detect(): Promise<boolean>
  collect(ctx: CollectContext): Promise<Fragment<Observed>>
  diff(desired: Fragment<Desired>, observed: Fragment<Observed>): Action[]
  seed(observed: Fragment<Observed>): Fragment<Desired>
  capture(action: Action): Promise<unknown>
  apply(action: Action): Promise<PluginResult>
}

export function success(detail: string): PluginResult {
  return { outcome: 'success', detail }
}

export function failure(detail: string): PluginResult {
  return { outcome: 'failure', detail }
}

export function byKey(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0
}

export function payloadString(action: Action, key: string): string | undefined {
  const v = action.payload[key]
  return typeof v === 'string' ? v : undefined
}
