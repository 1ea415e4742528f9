export type {
  Action,
  ActionResult,
  Domain,
  Fragment,
  ItemAttributes,
  Logger,
  ObservedFragment,
  Outcome,
  Plan,
  PlanIssue,
  PlanProvenance,
  RunState,
  RunSummary,
  SnapshotMeta,
  SnapshotResult,
  Verb,
} from './types.js'
export { BUILTIN_DOMAINS, noopLogger } from './types.js'
export * from './errors.js'

export type { DomainStatus, EngineOptions, EngineRunSummary, InitResult, OpenEngineOptions, SessionState } from './api/engine.js'
export { openEngine, TwinEngine } from './api/engine.js'

export type { CollectContext, Plugin, PluginResult } from './plugins/types.js'
export type { AnyPlugin } from './plugins/registry.js'
export { defaultRegistry, PluginRegistry } from './plugins/registry.js'
export { PackagesPlugin } from './plugins/packages.js'
export { ServicesPlugin } from './plugins/services.js'
export { FilesPlugin } from './plugins/files.js'
export { StartupPlugin } from './plugins/startup.js'

export type { CommandResult, CommandRunner, RunOptions } from './core/command.js'
export { execRunner } from './core/command.js'
export type { FileSystemPort } from './core/fs.js'
export { Applier } from './core/apply.js'
export { collectAll } from './core/collect.js'
export { buildPlan, fingerprint, parsePlan, planActions, serializePlan } from './core/plan.js'
export { formatPlan, formatSummary } from './core/format-plan.js'

export type { VersionControl } from './vcs/git.js'
export { GitCli } from './vcs/git.js'
export { VersionStore } from './vcs/store.js'

export type { RepoConfig } from './repo/config.js'
export { loadRepoConfig, parseRepoConfig } from './repo/config.js'
export { parseFragment, parseObservedFragment } from './fragments/schema.js'
