import { z } from 'zod'

import { commandAvailable, CommandRunner, describeFailure } from '../core/command.js'
import { CollectionError } from '../errors.js'
import { makeFragment } from '../fragments/schema.js'
import type { Action, Fragment } from '../types.js'
import { CollectContext, failure, payloadString, Plugin, PluginResult, success } from './types.js'

export const CRONTAB_KEY = 'crontab'

export const CrontabSchema = z.object({
  content: z.string(),
}).strict()

export type Crontab = z.infer<typeof CrontabSchema>

export interface StartupPluginOptions {
  runner: CommandRunner
}

function contentOf(fragment: Fragment<Crontab>): string {
  const content = fragment.items[CRONTAB_KEY]?.content ?? ''
  // crontab(1) wants a final newline and `crontab -l` always prints one.
  return content === '' || content.endsWith('\n') ? content : content + '\n'
}

/**
 * The invoking user's crontab, handled as one block: any difference replaces the whole table.
 */
export class StartupPlugin implements Plugin<Crontab, Crontab> {
  readonly domain = 'startup'
  readonly desiredItem = CrontabSchema
  readonly observedItem = CrontabSchema

  private readonly runner: CommandRunner

  constructor(opts: StartupPluginOptions) {
    this.runner = opts.runner
  }

  /** `crontab -l` exits 1 without a table; only a missing binary counts. */
  detect(): Promise<boolean> {
    return commandAvailable(this.runner, 'crontab', ['-l'])
  }

  async collect(ctx: CollectContext): Promise<Fragment<Crontab>> {
    return makeFragment(this.domain, { [CRONTAB_KEY]: { content: await this.read(ctx.signal) } })
  }

  diff(desired: Fragment<Crontab>, observed: Fragment<Crontab>): Action[] {
    const want = contentOf(desired)
    const have = contentOf(observed)
    if (want === have) return []
    return [{
      domain: this.domain,
      verb: 'UPDATE',
      target: CRONTAB_KEY,
      payload: { content: want },
      destructive: have !== '',
    }]
  }

  seed(observed: Fragment<Crontab>): Fragment<Crontab> {
    return makeFragment(this.domain, { ...observed.items })
  }

  async capture(): Promise<unknown> {
    return { content: await this.read() }
  }

  async apply(action: Action): Promise<PluginResult> {
    if (action.verb !== 'UPDATE') return failure(`Unsupported verb for startup: ${action.verb}`)
    const content = payloadString(action, 'content')
    if (content === undefined) return failure('UPDATE crontab: payload has no content')

    const res = content === ''
      ? await this.runner.run('crontab', ['-r'])
      : await this.runner.run('crontab', ['-'], { input: content })
    if (res.code !== 0) return failure(describeFailure(res))
    return success(content === '' ? 'Removed crontab' : 'Installed crontab')
  }

  private async read(signal?: AbortSignal): Promise<string> {
    const res = await this.runner.run('crontab', ['-l'], { signal })
    if (res.code === 0) return res.stdout
    if (/no crontab/i.test(res.stderr)) return ''
    throw new CollectionError(this.domain, describeFailure(res))
  }
}
