import { createHash } from 'crypto'
import type { Dirent } from 'fs'
import fs from 'fs-extra'
import path from 'path'
import { pipeline } from 'stream/promises'

import { errorMessage } from '../errors.js'
import { removePath, writeFileAtomic } from './fs-ops.js'

export interface FileStat {
  size: number
  /** Permission bits only. */
  mode: number
}

/** Called for a directory the walk could not enter. */
export type SkipHandler = (p: string, reason: string) => void

/**
 * File system access used by the files plugin. Tests swap in an in-memory implementation.
 */
export interface FileSystemPort {
  isDirectory(p: string): Promise<boolean>
  /**
   * Regular files under root, absolute and sorted. Symlinks are not followed.
   * Unreadable subdirectories are reported through `onSkip` and left out.
   * Stops and throws once more than `maxFiles` have been found.
   */
  listFiles(root: string, maxFiles: number, onSkip?: SkipHandler): Promise<string[]>
  stat(p: string): Promise<FileStat | undefined>
  readFile(p: string): Promise<Buffer>
  /** SHA-256 of the file, streamed. */
  hashFile(p: string): Promise<string>
  writeFile(p: string, content: string | Buffer, mode?: number): Promise<void>
  remove(p: string): Promise<void>
}

async function walk(dir: string, out: string[], maxFiles: number, onSkip: SkipHandler, isRoot: boolean): Promise<void> {
  let entries: Dirent[]
  try {
    entries = await fs.readdir(dir, { withFileTypes: true })
  } catch (e) {
    if (isRoot) throw e
    onSkip(dir, errorMessage(e))
    return
  }
  for (const entry of entries) {
    const p = path.join(dir, entry.name)
    if (entry.isDirectory()) {
      if (entry.name === '.git') continue
      await walk(p, out, maxFiles, onSkip, false)
    } else if (entry.isFile()) {
      out.push(p)
      if (out.length > maxFiles) {
        throw new Error(`more than ${maxFiles} files under ${dir}`)
      }
    }
  }
}

export const nodeFileSystem: FileSystemPort = {
  async isDirectory(p) {
    try {
      return (await fs.stat(p)).isDirectory()
    } catch (e) {
      if (e instanceof Error && 'code' in e && e.code === 'ENOENT') return false
      throw e
    }
  },
  async listFiles(root, maxFiles, onSkip = () => {}) {
    const out: string[] = []
    await walk(path.resolve(root), out, maxFiles, onSkip, true)
    return out.sort()
  },
  async stat(p) {
    try {
      const st = await fs.lstat(p)
      if (!st.isFile()) return undefined
      return { size: st.size, mode: st.mode & 0o7777 }
    } catch (e) {
      if (e instanceof Error && 'code' in e && e.code === 'ENOENT') return undefined
      throw e
    }
  },
  readFile: (p) => fs.readFile(p),
  async hashFile(p) {
    const hash = createHash('sha256')
    await pipeline(fs.createReadStream(p), hash)
    return hash.digest('hex')
  },
  writeFile: writeFileAtomic,
  remove: removePath,
}
