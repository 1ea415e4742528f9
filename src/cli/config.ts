import fs from 'fs-extra'
import os from 'os'
import path from 'path'
import { z } from 'zod'

import { writeJsonAtomic } from '../core/fs-ops.js'
import { ConfigError, errorMessage } from '../errors.js'

/**
 * Per-user CLI settings, kept outside any twin repository.
 */
export const GlobalConfigSchema = z.object({
  /** Twin repository used when a command gets no `--repo`. */
  repoPath: z.string().min(1).refine(p => path.isAbsolute(p), 'must be an absolute path').optional(),
})

export type GlobalConfig = z.infer<typeof GlobalConfigSchema>

export interface GlobalConfigLocation {
  env?: NodeJS.ProcessEnv
  /** Used when XDG_CONFIG_HOME is unset. Defaults to os.homedir(). */
  homeDir?: string
}

/** `$XDG_CONFIG_HOME/twinplan/config.json`, falling back to `~/.config`. */
export function globalConfigPath(loc: GlobalConfigLocation = {}): string {
  const env = loc.env ?? process.env
  const base = env.XDG_CONFIG_HOME || path.join(loc.homeDir ?? os.homedir(), '.config')
  return path.join(base, 'twinplan', 'config.json')
}

export async function loadGlobalConfig(loc: GlobalConfigLocation = {}): Promise<GlobalConfig> {
  const file = globalConfigPath(loc)
  if (!await fs.pathExists(file)) return {}
  let json: unknown
  try {
    json = await fs.readJson(file)
  } catch (e) {
    throw new ConfigError(`Cannot read ${file}: ${errorMessage(e)}`)
  }
  const parsed = GlobalConfigSchema.safeParse(json)
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`)
    throw new ConfigError(`Invalid ${file}: ${issues.join('; ')}. Run \`twinplan repo clear\` to reset it.`)
  }
  return parsed.data
}

async function saveGlobalConfig(config: GlobalConfig, loc: GlobalConfigLocation): Promise<void> {
  await writeJsonAtomic(globalConfigPath(loc), GlobalConfigSchema.parse(config))
}

/** Remember `repoPath` (resolved against the working directory) as the default repository. */
export async function rememberRepo(repoPath: string, loc: GlobalConfigLocation = {}): Promise<string> {
  const abs = path.resolve(repoPath)
  await saveGlobalConfig({ repoPath: abs }, loc)
  return abs
}

export async function defaultRepo(loc: GlobalConfigLocation = {}): Promise<string | undefined> {
  return (await loadGlobalConfig(loc)).repoPath
}

/**
 * Drop the default repository. Works on a file that no longer validates, so it doubles as
 * the way out of a broken config.
 */
export async function forgetRepo(loc: GlobalConfigLocation = {}): Promise<void> {
  if (!await fs.pathExists(globalConfigPath(loc))) return
  await saveGlobalConfig({}, loc)
}
