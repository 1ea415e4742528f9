import { errorMessage, RemotePushError, VersionStoreError } from '../errors.js'
import { Logger, noopLogger, SnapshotMeta } from '../types.js'
import type { VersionControl } from './git.js'

/** Paths a time-machine reset brings back. Plans, runs and backups stay as they are. */
export const FRAGMENT_PATHS = ['desired', 'observed']

export interface RemoteSettings {
  name: string
  branch: string
  url?: string
}

export interface RecordResult {
  head: SnapshotMeta
  pushed: boolean
  warnings: string[]
}

/**
 * Append-only history of the twin repository. Local commits are authoritative;
 * the remote is a best-effort mirror.
 */
export class VersionStore {
  private readonly logger: Logger

  constructor(private readonly vcs: VersionControl, private readonly remote: RemoteSettings, logger?: Logger) {
    this.logger = logger ?? noopLogger()
  }

  async init(): Promise<void> {
    if (!await this.vcs.isRepository()) await this.vcs.init(this.remote.branch)
    await this.vcs.ensureIdentity()
    if (this.remote.url && !await this.vcs.hasRemote(this.remote.name)) {
      await this.vcs.addRemote(this.remote.name, this.remote.url)
    }
  }

  /**
   * Stage everything and append exactly one commit, then try the remote.
   */
  async record(message: string): Promise<RecordResult> {
    await this.vcs.stageAll()
    const head = await this.vcs.commit(message)
    const warnings: string[] = []
    const pushed = await this.pushBestEffort(warnings)
    return { head, pushed, warnings }
  }

  async head(): Promise<SnapshotMeta> {
    const head = await this.vcs.head()
    if (!head) throw new VersionStoreError('The twin repository has no snapshot yet')
    return head
  }

  /** Newest first. */
  async history(limit = 20): Promise<SnapshotMeta[]> {
    return await this.vcs.log(limit)
  }

  /**
   * Replace the fragment set with the one recorded at `ref` and record that as a new commit.
   * History is extended, never rewritten.
   */
  async resetTo(ref: string): Promise<RecordResult> {
    const commit = await this.vcs.resolve(ref)
    if (!commit) throw new VersionStoreError(`Unknown commit: ${ref}`)
    // Stage first so fragments created since the last commit are removed too.
    await this.vcs.stageAll()
    await this.vcs.restore(commit, FRAGMENT_PATHS)
    return await this.record(`reset: restore fragments from ${commit.slice(0, 12)}`)
  }

  async diff(from: string, to: string): Promise<string> {
    return await this.vcs.diff(from, to, FRAGMENT_PATHS)
  }

  async pull(): Promise<void> {
    if (!await this.vcs.hasRemote(this.remote.name)) {
      throw new VersionStoreError(`No remote named ${this.remote.name}`)
    }
    await this.vcs.pullFastForward(this.remote.name, this.remote.branch)
  }

  private async pushBestEffort(warnings: string[]): Promise<boolean> {
    if (!await this.vcs.hasRemote(this.remote.name)) return false
    let last: unknown
    for (let attempt = 0; attempt < 2; attempt++) {
      try {
        await this.vcs.push(this.remote.name, this.remote.branch)
        return true
      } catch (e) {
        last = e
      }
    }
    const err = new RemotePushError(`Push to ${this.remote.name}/${this.remote.branch} failed: ${errorMessage(last)}`)
    this.logger.warn(`[twinplan] ${err.message}`)
    warnings.push(err.message)
    return false
  }
}
