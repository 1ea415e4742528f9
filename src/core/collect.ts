import { CollectionError, errorMessage, SchemaError } from '../errors.js'
import { parseFragment, parseObservedFragment } from '../fragments/schema.js'
import type { FragmentStore } from '../fragments/store.js'
import type { AnyPlugin, PluginRegistry } from '../plugins/registry.js'
import { Domain, Fragment, Logger, noopLogger, ObservedFragment } from '../types.js'

export interface CollectOptions {
  timeoutMs: number
  logger?: Logger
  now?: () => Date
}

export interface CollectReport {
  collected: Domain[]
  stale: Array<{ domain: Domain; reason: string }>
  unavailable: Domain[]
}

async function collectWithTimeout(plugin: AnyPlugin, timeoutMs: number, logger: Logger): Promise<Fragment> {
  const controller = new AbortController()
  let timer: NodeJS.Timeout | undefined
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      // Reject before aborting so the timeout, not the collector's reaction to it, is reported.
      reject(new CollectionError(plugin.domain, `timed out after ${timeoutMs}ms`))
      controller.abort()
    }, timeoutMs)
  })
  try {
    return await Promise.race([plugin.collect({ signal: controller.signal, logger }), timeout])
  } finally {
    clearTimeout(timer)
  }
}

/**
 * Run every plugin's collect in registry order and replace the observed fragments.
 * A failing plugin keeps its last good observed fragment, flagged stale; the others carry on.
 * A plugin whose tooling is not detected gets an empty observed fragment marked unavailable.
 */
export async function collectAll(registry: PluginRegistry, store: FragmentStore, opts: CollectOptions): Promise<CollectReport> {
  const logger = opts.logger ?? noopLogger()
  const now = opts.now ?? (() => new Date())
  const report: CollectReport = { collected: [], stale: [], unavailable: [] }

  for (const plugin of registry.ordered()) {
    try {
      if (!await plugin.detect()) {
        logger.info(`[twinplan] ${plugin.domain} is not available on this host; skipped`)
        report.unavailable.push(plugin.domain)
        await store.writeObserved({ domain: plugin.domain, version: 1, items: {}, collectedAt: now().toISOString(), unavailable: true })
        continue
      }
      const fragment = await collectWithTimeout(plugin, opts.timeoutMs, logger)
      // Same schema the planner reads it back with; a plugin that emits garbage goes stale.
      const checked = parseFragment(plugin.domain, fragment, plugin.observedItem)
      await store.writeObserved({ ...checked, collectedAt: now().toISOString() })
      report.collected.push(plugin.domain)
    } catch (e) {
      const reason = errorMessage(e)
      logger.warn(`[twinplan] collect ${plugin.domain} failed: ${reason}`)
      report.stale.push({ domain: plugin.domain, reason })
      await markStale(store, plugin, reason, logger)
    }
  }
  return report
}

async function markStale(store: FragmentStore, plugin: AnyPlugin, reason: string, logger: Logger): Promise<void> {
  const previous = await store.read('observed', plugin.domain)
  if (previous === undefined) return
  let last: ObservedFragment
  try {
    last = parseObservedFragment(plugin.domain, previous, plugin.observedItem)
  } catch (e) {
    if (!(e instanceof SchemaError)) throw e
    logger.warn(`[twinplan] previous observed ${plugin.domain} fragment is unreadable: ${e.message}`)
    return
  }
  await store.writeObserved({ ...last, stale: true, staleReason: reason })
}
