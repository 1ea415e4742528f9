import fs from 'fs-extra'
import path from 'path'

function rand() {
  return Math.random().toString(16).slice(2)
}

export function tmpPathFor(targetAbs: string) {
  return `${targetAbs}.tmp.${rand()}`
}

export async function ensureParentDir(p: string) {
  await fs.ensureDir(path.dirname(p))
}

/**
 * Write to a temp file beside the target, then rename over it.
 * The temp file is removed if anything fails before the rename.
 */
export async function writeFileAtomic(targetAbs: string, content: string | Buffer, mode?: number) {
  await ensureParentDir(targetAbs)
  const tmp = tmpPathFor(targetAbs)
  try {
    await fs.writeFile(tmp, content)
    if (mode !== undefined) await fs.chmod(tmp, mode)
    await fs.rename(tmp, targetAbs)
  } catch (e) {
    await fs.remove(tmp)
    throw e
  }
}

export async function writeJsonAtomic(targetAbs: string, value: unknown, spaces = 2) {
  await writeFileAtomic(targetAbs, JSON.stringify(value, null, spaces) + '\n')
}

export async function removePath(p: string) {
  await fs.remove(p)
}
