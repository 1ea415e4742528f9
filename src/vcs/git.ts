import { CommandResult, CommandRunner, describeFailure } from '../core/command.js'
import { VersionStoreError } from '../errors.js'
import type { SnapshotMeta } from '../types.js'

/**
 * The version-control commands the engine consumes. `GitCli` drives the git binary;
 * tests use an in-memory implementation.
 */
export interface VersionControl {
  isRepository(): Promise<boolean>
  init(branch: string): Promise<void>
  ensureIdentity(): Promise<void>
  stageAll(): Promise<void>
  /** Always creates a commit, even when nothing changed. Returns the new HEAD. */
  commit(message: string): Promise<SnapshotMeta>
  head(): Promise<SnapshotMeta | undefined>
  log(limit: number): Promise<SnapshotMeta[]>
  /** Full id of a commit-ish, or undefined if it does not name a commit. */
  resolve(ref: string): Promise<string | undefined>
  /**
   * Make `paths` in the working tree and index match `commit`, deleting files `commit` lacks.
   */
  restore(commit: string, paths: string[]): Promise<void>
  diff(from: string, to: string, paths?: string[]): Promise<string>
  hasRemote(name: string): Promise<boolean>
  addRemote(name: string, url: string): Promise<void>
  push(remote: string, branch: string): Promise<void>
  pullFastForward(remote: string, branch: string): Promise<void>
}

const FIELD = '\x1f'
const RECORD = '\x1e'
const LOG_FORMAT = `--format=%H${FIELD}%h${FIELD}%cI${FIELD}%s${RECORD}`

export const DEFAULT_IDENTITY = { name: 'twinplan', email: 'twinplan@localhost' }

export function parseLog(stdout: string): SnapshotMeta[] {
  const out: SnapshotMeta[] = []
  for (const record of stdout.split(RECORD)) {
    const [commit, shortCommit, timestamp, message] = record.trim().split(FIELD)
    if (!commit || !shortCommit || !timestamp) continue
    out.push({ commit, shortCommit, timestamp, message: message ?? '' })
  }
  return out
}

export class GitCli implements VersionControl {
  constructor(private readonly root: string, private readonly runner: CommandRunner) {}

  private exec(args: string[]): Promise<CommandResult> {
    return this.runner.run('git', args, { cwd: this.root })
  }

  private async git(args: string[]): Promise<string> {
    const res = await this.exec(args)
    if (res.code !== 0) throw new VersionStoreError(`git ${args[0]} failed: ${describeFailure(res)}`)
    return res.stdout
  }

  async isRepository(): Promise<boolean> {
    const res = await this.exec(['rev-parse', '--is-inside-work-tree'])
    return res.code === 0 && res.stdout.trim() === 'true'
  }

  async init(branch: string): Promise<void> {
    await this.git(['init', '-q'])
    await this.git(['symbolic-ref', 'HEAD', `refs/heads/${branch}`])
  }

  async ensureIdentity(): Promise<void> {
    const email = await this.exec(['config', 'user.email'])
    if (email.code === 0 && email.stdout.trim()) return
    await this.git(['config', 'user.email', DEFAULT_IDENTITY.email])
    await this.git(['config', 'user.name', DEFAULT_IDENTITY.name])
  }

  async stageAll(): Promise<void> {
    await this.git(['add', '-A'])
  }

  async commit(message: string): Promise<SnapshotMeta> {
    await this.git(['commit', '-q', '--allow-empty', '-m', message])
    const head = await this.head()
    if (!head) throw new VersionStoreError('Commit succeeded but HEAD is unborn')
    return head
  }

  async head(): Promise<SnapshotMeta | undefined> {
    const res = await this.exec(['rev-parse', '--verify', '-q', 'HEAD'])
    if (res.code !== 0) return undefined
    const [head] = await this.log(1)
    return head
  }

  async log(limit: number): Promise<SnapshotMeta[]> {
    const res = await this.exec(['log', `-n${limit}`, LOG_FORMAT])
    // An unborn branch has no log.
    if (res.code !== 0) return []
    return parseLog(res.stdout)
  }

  async resolve(ref: string): Promise<string | undefined> {
    const res = await this.exec(['rev-parse', '--verify', '-q', `${ref}^{commit}`])
    return res.code === 0 ? res.stdout.trim() : undefined
  }

  async restore(commit: string, paths: string[]): Promise<void> {
    const tree = await this.git(['ls-tree', '--name-only', commit, '--', ...paths])
    const present = new Set(tree.split('\n').map(s => s.trim()).filter(Boolean))
    const missing = paths.filter(p => !present.has(p))
    if (missing.length) await this.git(['rm', '-r', '-q', '--ignore-unmatch', '--', ...missing])
    if (present.size) {
      await this.git(['restore', `--source=${commit}`, '--staged', '--worktree', '--', ...paths.filter(p => present.has(p))])
    }
  }

  async diff(from: string, to: string, paths: string[] = []): Promise<string> {
    return await this.git(['diff', from, to, '--', ...paths])
  }

  async hasRemote(name: string): Promise<boolean> {
    const res = await this.exec(['remote'])
    return res.code === 0 && res.stdout.split('\n').map(s => s.trim()).includes(name)
  }

  async addRemote(name: string, url: string): Promise<void> {
    await this.git(['remote', 'add', name, url])
  }

  async push(remote: string, branch: string): Promise<void> {
    await this.git(['push', '-q', remote, branch])
  }

  async pullFastForward(remote: string, branch: string): Promise<void> {
    await this.git(['pull', '-q', '--ff-only', remote, branch])
  }
}
