import fs from 'fs-extra'
import path from 'path'

export type Namespace = 'desired' | 'observed'

export const LOCK_FILE = '.twinplan.lock'

export interface RepoLayout {
  root: string
  configPath: string
  desiredDir: string
  observedDir: string
  plansDir: string
  runsDir: string
  backupsDir: string
  lockPath: string
}

export function repoLayout(root: string): RepoLayout {
  const abs = path.resolve(root)
  return {
    root: abs,
    configPath: path.join(abs, 'config.json'),
    desiredDir: path.join(abs, 'desired'),
    observedDir: path.join(abs, 'observed'),
    plansDir: path.join(abs, 'plans'),
    runsDir: path.join(abs, 'runs'),
    backupsDir: path.join(abs, 'backups'),
    lockPath: path.join(abs, LOCK_FILE),
  }
}

export function fragmentPath(layout: RepoLayout, ns: Namespace, domain: string): string {
  return path.join(ns === 'desired' ? layout.desiredDir : layout.observedDir, `${domain}.json`)
}

/**
 * Create the directory skeleton and make sure `.gitignore` lists the lock file.
 * Existing content is left alone; the lock entry is appended when missing.
 */
export async function ensureLayout(layout: RepoLayout): Promise<void> {
  for (const dir of [layout.desiredDir, layout.observedDir, layout.plansDir, layout.runsDir, layout.backupsDir]) {
    await fs.ensureDir(dir)
  }
  const ignorePath = path.join(layout.root, '.gitignore')
  const current = await fs.pathExists(ignorePath) ? await fs.readFile(ignorePath, 'utf8') : ''
  if (current.split(/\r?\n/).some(line => line.trim() === LOCK_FILE)) return
  const sep = current === '' || current.endsWith('\n') ? '' : '\n'
  await fs.appendFile(ignorePath, `${sep}${LOCK_FILE}\n`, 'utf8')
}
