import fs from 'fs-extra'
import path from 'path'

import { BackupError, errorMessage } from '../errors.js'
import type { Action } from '../types.js'
import { writeJsonAtomic } from './fs-ops.js'

export interface BackupRecord {
  action: Action
  capturedAt: string
  state: unknown
}

/**
 * Compact UTC stamp usable in file names: 20261019T183200123Z.
 */
export function fileStamp(d: Date): string {
  return d.toISOString().replace(/[-:]/g, '').replace('.', '')
}

function slug(target: string): string {
  const s = target.replace(/[^A-Za-z0-9._-]+/g, '-').replace(/^-+|-+$/g, '')
  return (s || 'target').slice(0, 80)
}

/**
 * Reference for the backup of the action at `index` in a run started at `runStartedAt`.
 * The same run, index and target always give the same reference.
 */
export function backupRefFor(action: Action, index: number, runStartedAt: Date): string {
  const seq = String(index).padStart(3, '0')
  return path.posix.join('backups', action.domain, `${fileStamp(runStartedAt)}-${seq}-${slug(action.target)}.json`)
}

/**
 * Keeps the pre-state of destructive actions inside the twin repository, so that it is
 * committed together with the run that replaced it.
 */
export class BackupStore {
  constructor(private readonly root: string) {}

  /**
   * Write the record under its reference. Refuses to overwrite an existing backup.
   */
  async write(ref: string, record: BackupRecord): Promise<string> {
    const abs = this.resolve(ref)
    try {
      if (await fs.pathExists(abs)) throw new Error(`backup ${ref} already exists`)
      await writeJsonAtomic(abs, record)
    } catch (e) {
      throw new BackupError(`Cannot write backup ${ref}: ${errorMessage(e)}`)
    }
    return ref
  }

  async read(ref: string): Promise<BackupRecord> {
    const raw: BackupRecord = await fs.readJson(this.resolve(ref))
    return raw
  }

  resolve(ref: string): string {
    return path.join(this.root, ...ref.split('/'))
  }
}
