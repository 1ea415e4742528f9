import type { Domain } from './types.js'

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message
  return String(e)
}

export class TwinError extends Error {
  constructor(message: string) {
    super(message)
    this.name = new.target.name
  }
}

/** A plugin could not read live state. Recoverable: the domain goes stale. */
export class CollectionError extends TwinError {
  domain: Domain
  constructor(domain: Domain, message: string) {
    super(`${domain}: ${message}`)
    this.domain = domain
  }
}

/** A fragment failed validation against its domain schema. */
export class SchemaError extends TwinError {
  domain: Domain
  issues: string[]
  constructor(domain: Domain, issues: string[]) {
    super(`Invalid ${domain} fragment: ${issues.join('; ')}`)
    this.domain = domain
    this.issues = issues
  }
}

export class PlanStalenessError extends TwinError {
  expected: string
  actual: string
  constructor(expected: string, actual: string, what = 'commit') {
    super(`Plan is stale: generated against ${what} ${expected}, repository is at ${actual}. Regenerate the plan.`)
    this.expected = expected
    this.actual = actual
  }
}

export class BackupError extends TwinError {}

export class ApplyError extends TwinError {}

/** Commit, lock or history failure. Aborts the whole operation. */
export class VersionStoreError extends TwinError {}

export class RemotePushError extends TwinError {}

export class ConfigError extends TwinError {}

export class EngineStateError extends TwinError {}
