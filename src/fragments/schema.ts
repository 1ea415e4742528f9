import { z } from 'zod'

import { SchemaError } from '../errors.js'
import type { Domain, Fragment, ItemAttributes, ObservedFragment } from '../types.js'

export type ItemSchema<Item extends ItemAttributes> = z.ZodType<Item, z.ZodTypeDef, unknown>

function envelope<Item extends ItemAttributes>(item: ItemSchema<Item>) {
  return z.object({
    domain: z.string().min(1),
    version: z.literal(1),
    items: z.record(z.string().min(1), item),
  })
}

function observedEnvelope<Item extends ItemAttributes>(item: ItemSchema<Item>) {
  return envelope(item).extend({
    collectedAt: z.string().min(1),
    stale: z.boolean().optional(),
    staleReason: z.string().optional(),
    unavailable: z.boolean().optional(),
  })
}

function issuesOf(error: z.ZodError): string[] {
  return error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`)
}

function checkDomain(domain: Domain, actual: string) {
  if (actual !== domain) {
    throw new SchemaError(domain, [`domain: expected "${domain}", got "${actual}"`])
  }
}

/**
 * Validate a desired fragment document. Nothing is coerced: any violation is a SchemaError.
 */
export function parseFragment<Item extends ItemAttributes>(domain: Domain, raw: unknown, item: ItemSchema<Item>): Fragment<Item> {
  const parsed = envelope(item).safeParse(raw)
  if (!parsed.success) throw new SchemaError(domain, issuesOf(parsed.error))
  checkDomain(domain, parsed.data.domain)
  return { domain, version: 1, items: parsed.data.items }
}

export function parseObservedFragment<Item extends ItemAttributes>(domain: Domain, raw: unknown, item: ItemSchema<Item>): ObservedFragment<Item> {
  const parsed = observedEnvelope(item).safeParse(raw)
  if (!parsed.success) throw new SchemaError(domain, issuesOf(parsed.error))
  checkDomain(domain, parsed.data.domain)
  const out: ObservedFragment<Item> = {
    domain,
    version: 1,
    items: parsed.data.items,
    collectedAt: parsed.data.collectedAt,
  }
  if (parsed.data.stale) {
    out.stale = true
    out.staleReason = parsed.data.staleReason
  }
  if (parsed.data.unavailable) out.unavailable = true
  return out
}

export function makeFragment<Item extends ItemAttributes>(domain: Domain, items: Record<string, Item>): Fragment<Item> {
  return { domain, version: 1, items }
}
