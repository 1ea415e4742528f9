import path from 'path'
import { z } from 'zod'

import { sha256 } from '../core/canonical.js'
import { FileSystemPort, nodeFileSystem } from '../core/fs.js'
import { CollectionError, errorMessage } from '../errors.js'
import { makeFragment } from '../fragments/schema.js'
import type { Action, Fragment } from '../types.js'
import { byKey, CollectContext, failure, payloadString, Plugin, PluginResult, success } from './types.js'

const MODE = z.string().regex(/^0?[0-7]{3,4}$/, 'expected an octal mode such as "0644"')

const PresentFileSchema = z.object({
  ensure: z.literal('present').optional(),
  content: z.string(),
  hash: z.string().regex(/^[0-9a-f]{64}$/).optional(),
  mode: MODE.optional(),
}).strict().superRefine((f, ctx) => {
  if (f.hash !== undefined && f.hash !== sha256(f.content)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['hash'], message: 'hash does not match content' })
  }
})

const AbsentFileSchema = z.object({
  ensure: z.literal('absent'),
}).strict()

export const FileDesiredSchema = z.union([PresentFileSchema, AbsentFileSchema])

export const FileObservedSchema = z.object({
  hash: z.string(),
  size: z.number().int().nonnegative(),
  mode: MODE.optional(),
  /** Present for text files under the size cap. */
  content: z.string().optional(),
}).strict()

export type FileDesired = z.infer<typeof FileDesiredSchema>
export type FileObserved = z.infer<typeof FileObservedSchema>

export interface FilesPluginOptions {
  roots: readonly string[]
  maxFileBytes: number
  maxFiles: number
  fs?: FileSystemPort
}

function isText(buf: Buffer): boolean {
  return !buf.subarray(0, 8000).includes(0)
}

function formatMode(mode: number): string {
  return mode.toString(8).padStart(4, '0')
}

function parseMode(mode: string | undefined): number | undefined {
  return mode === undefined ? undefined : parseInt(mode, 8)
}

/** An undeclared mode never differs. */
function modeDiffers(want: string | undefined, have: string | undefined): boolean {
  return want !== undefined && parseMode(want) !== parseMode(have)
}

/**
 * Mirrors regular files under the configured roots, keyed by absolute path.
 * Files missing from the desired fragment are left alone.
 */
export class FilesPlugin implements Plugin<FileDesired, FileObserved> {
  readonly domain = 'files'
  readonly desiredItem = FileDesiredSchema
  readonly observedItem = FileObservedSchema

  private readonly fs: FileSystemPort

  constructor(private readonly opts: FilesPluginOptions) {
    this.fs = opts.fs ?? nodeFileSystem
  }

  async detect(): Promise<boolean> {
    return true
  }

  /**
   * Missing roots, unreadable directories and unreadable files are logged and skipped,
   * so one bad path never turns the whole domain stale. Only the file cap fails collection.
   * Files over `maxFileBytes` are hashed as a stream and their content is not kept.
   */
  async collect(ctx: CollectContext): Promise<Fragment<FileObserved>> {
    const items: Record<string, FileObserved> = {}
    let count = 0
    for (const root of this.opts.roots) {
      const abs = path.resolve(root)
      if (abs === path.parse(abs).root) {
        ctx.logger.warn(`[twinplan] files: refusing to walk filesystem root ${abs}`)
        continue
      }
      if (!await this.fs.isDirectory(abs)) {
        ctx.logger.warn(`[twinplan] files: root ${abs} is not a directory; skipped`)
        continue
      }
      let files: string[]
      try {
        files = await this.fs.listFiles(abs, this.opts.maxFiles - count, (dir, reason) => {
          ctx.logger.warn(`[twinplan] files: skipped ${dir}: ${reason}`)
        })
      } catch (e) {
        throw new CollectionError(this.domain, `cannot walk ${abs}: ${errorMessage(e)}`)
      }
      for (const file of files) {
        if (ctx.signal.aborted) throw new CollectionError(this.domain, 'collection aborted')
        try {
          const item = await this.observe(file)
          if (!item) continue
          items[file] = item
          count++
        } catch (e) {
          ctx.logger.warn(`[twinplan] files: skipped ${file}: ${errorMessage(e)}`)
        }
      }
    }
    return makeFragment(this.domain, items)
  }

  private async observe(file: string): Promise<FileObserved | undefined> {
    const st = await this.fs.stat(file)
    if (!st) return undefined
    const mode = formatMode(st.mode)
    if (st.size > this.opts.maxFileBytes) {
      return { hash: await this.fs.hashFile(file), size: st.size, mode }
    }
    const buf = await this.fs.readFile(file)
    const item: FileObserved = { hash: sha256(buf), size: st.size, mode }
    if (isText(buf)) item.content = buf.toString('utf8')
    return item
  }

  diff(desired: Fragment<FileDesired>, observed: Fragment<FileObserved>): Action[] {
    const actions: Action[] = []
    for (const p of Object.keys(desired.items).sort(byKey)) {
      const want = desired.items[p]
      const have: FileObserved | undefined = observed.items[p]
      if (want.ensure === 'absent') {
        if (have) actions.push({ domain: this.domain, verb: 'DELETE', target: p, payload: {}, destructive: true })
        continue
      }
      const hash = sha256(want.content)
      const payload = want.mode ? { content: want.content, hash, mode: want.mode } : { content: want.content, hash }
      if (!have) {
        actions.push({ domain: this.domain, verb: 'CREATE', target: p, payload, destructive: false })
      } else if (have.hash !== hash || modeDiffers(want.mode, have.mode)) {
        actions.push({ domain: this.domain, verb: 'REPLACE', target: p, payload, destructive: true })
      }
    }
    return actions
  }

  /**
   * Only text files can be declared; binary and oversized files stay observed-only.
   */
  seed(observed: Fragment<FileObserved>): Fragment<FileDesired> {
    const items: Record<string, FileDesired> = {}
    for (const p of Object.keys(observed.items).sort(byKey)) {
      const { content, mode } = observed.items[p]
      if (content === undefined) continue
      items[p] = mode ? { content, mode } : { content }
    }
    return makeFragment(this.domain, items)
  }

  async capture(action: Action): Promise<unknown> {
    const st = await this.fs.stat(action.target)
    if (!st) throw new Error(`${action.target} does not exist`)
    const buf = await this.fs.readFile(action.target)
    const text = isText(buf)
    return {
      path: action.target,
      hash: sha256(buf),
      mode: formatMode(st.mode),
      encoding: text ? 'utf8' : 'base64',
      content: buf.toString(text ? 'utf8' : 'base64'),
    }
  }

  async apply(action: Action): Promise<PluginResult> {
    const target = action.target
    switch (action.verb) {
      case 'CREATE':
      case 'REPLACE': {
        const content = payloadString(action, 'content')
        if (content === undefined) return failure(`${action.verb} ${target}: payload has no content`)
        // A file that appeared after planning has no backup; never overwrite it.
        if (action.verb === 'CREATE' && await this.fs.stat(target)) {
          return failure(`${target} already exists; regenerate the plan`)
        }
        await this.fs.writeFile(target, content, parseMode(payloadString(action, 'mode')))
        return success(`${action.verb === 'CREATE' ? 'Created' : 'Replaced'} ${target}`)
      }
      case 'DELETE':
        await this.fs.remove(target)
        return success(`Deleted ${target}`)
      default:
        return failure(`Unsupported verb for files: ${action.verb}`)
    }
  }
}
