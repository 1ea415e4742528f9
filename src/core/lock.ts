import fs from 'fs-extra'

import { errorMessage, VersionStoreError } from '../errors.js'

function isProcessRunning(pid: number): boolean {
  try {
    process.kill(pid, 0)
    return true
  } catch (e) {
    // EPERM: the process exists but belongs to someone else.
    return e instanceof Error && 'code' in e && e.code === 'EPERM'
  }
}

async function tryCreate(lockPath: string): Promise<boolean> {
  try {
    await fs.writeFile(lockPath, `${process.pid}\n`, { flag: 'wx' })
    return true
  } catch (e) {
    if (e instanceof Error && 'code' in e && e.code === 'EEXIST') return false
    throw new VersionStoreError(`Cannot create lock ${lockPath}: ${errorMessage(e)}`)
  }
}

async function ownerOf(lockPath: string): Promise<number | undefined> {
  try {
    const pid = parseInt((await fs.readFile(lockPath, 'utf8')).trim(), 10)
    return Number.isNaN(pid) ? undefined : pid
  } catch {
    return undefined
  }
}

/**
 * Advisory exclusive lock over the twin repository, held for one snapshot, apply or reset.
 * A lock left by a dead process is taken over.
 */
export async function withRepoLock<T>(lockPath: string, fn: () => Promise<T>): Promise<T> {
  if (!await tryCreate(lockPath)) {
    const owner = await ownerOf(lockPath)
    if (owner !== undefined && isProcessRunning(owner)) {
      throw new VersionStoreError(`Repository is locked by process ${owner} (${lockPath})`)
    }
    await fs.remove(lockPath)
    if (!await tryCreate(lockPath)) {
      throw new VersionStoreError(`Repository lock ${lockPath} was taken concurrently`)
    }
  }
  try {
    return await fn()
  } finally {
    await fs.remove(lockPath)
  }
}
