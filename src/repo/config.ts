import fs from 'fs-extra'
import path from 'path'
import { z } from 'zod'

import { ConfigError, errorMessage } from '../errors.js'
import { BUILTIN_DOMAINS } from '../types.js'
import { repoLayout } from './layout.js'

export const RepoConfigSchema = z.object({
  plugins: z.object({
    enable: z.array(z.string().min(1)).default([...BUILTIN_DOMAINS]),
  }).default({}),
  files: z.object({
    /** Directories mirrored by the files plugin. `/` is never walked. */
    roots: z.array(z.string().min(1)).default([]),
    maxFileBytes: z.number().int().positive().default(1024 * 1024),
    maxFiles: z.number().int().positive().default(5000),
  }).default({}),
  collect: z.object({
    timeoutMs: z.number().int().positive().default(60_000),
  }).default({}),
  remote: z.object({
    name: z.string().min(1).default('origin'),
    branch: z.string().min(1).default('main'),
    url: z.string().min(1).optional(),
  }).default({}),
  /** Prefix package and service mutations with `sudo -n`. */
  sudo: z.boolean().default(false),
  /**
   * Domains listed here are planned first, in this order. The rest keep the default order.
   */
  domainPriority: z.array(z.string().min(1)).default([]),
})

export type RepoConfigInput = z.input<typeof RepoConfigSchema>

export interface RepoConfig extends Readonly<z.infer<typeof RepoConfigSchema>> {
  readonly root: string
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object') {
    for (const v of Object.values(value)) deepFreeze(v)
    Object.freeze(value)
  }
  return value
}

export function parseRepoConfig(root: string, raw: unknown): RepoConfig {
  const parsed = RepoConfigSchema.safeParse(raw ?? {})
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`)
    throw new ConfigError(`Invalid config: ${issues.join('; ')}`)
  }
  return deepFreeze({ ...parsed.data, root: path.resolve(root) })
}

export function defaultRepoConfig(root: string): RepoConfig {
  return parseRepoConfig(root, {})
}

export async function loadRepoConfig(root: string): Promise<RepoConfig> {
  const { configPath } = repoLayout(root)
  if (!await fs.pathExists(configPath)) return defaultRepoConfig(root)
  let json: unknown
  try {
    json = await fs.readJson(configPath)
  } catch (e) {
    throw new ConfigError(`Cannot read ${configPath}: ${errorMessage(e)}`)
  }
  return parseRepoConfig(root, json)
}

export async function saveRepoConfig(root: string, config: RepoConfigInput): Promise<void> {
  const { configPath } = repoLayout(root)
  await fs.ensureDir(path.dirname(configPath))
  await fs.writeJson(configPath, config, { spaces: 2 })
}
