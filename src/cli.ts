#!/usr/bin/env node
import fs from 'fs-extra'
import path from 'path'
import { fileURLToPath } from 'url'

import { describeError, openEngine } from './api/engine.js'
import { formatPlan, formatSummary } from './core/format-plan.js'
import { parsePlan } from './core/plan.js'
import { saveRepoConfig } from './repo/config.js'
import { repoLayout } from './repo/layout.js'
import type { Logger } from './types.js'
import { defaultRepo, forgetRepo, rememberRepo } from './cli/config.js'

type Argv = string[]

class CliExit extends Error {
  exitCode: number
  constructor(message: string, exitCode = 1) {
    super(message)
    this.exitCode = exitCode
  }
}

function die(msg: string, code = 1): never {
  throw new CliExit(msg, code)
}

function popFlagValue(args: Argv, names: string[]): string | undefined {
  for (let i = 0; i < args.length; i++) {
    const a = args[i]
    if (!names.includes(a)) continue
    const v = args[i + 1]
    if (!v || v.startsWith('-')) return undefined
    args.splice(i, 2)
    return v
  }
  return undefined
}

function hasFlag(args: Argv, names: string[]): boolean {
  const idx = args.findIndex(a => names.includes(a))
  if (idx >= 0) {
    args.splice(idx, 1)
    return true
  }
  return false
}

function stderrLogger(): Logger {
  const write = (msg: string) => { process.stderr.write(msg + '\n') }
  return { info: write, warn: write, error: write }
}

async function resolveRepoPath(args: Argv): Promise<string> {
  const r = popFlagValue(args, ['-r', '--repo'])
  if (r) return path.resolve(r)
  const d = await defaultRepo()
  if (d) return d
  die('No twin repository specified. Please run `twinplan repo set <path>` or pass `--repo <path>`.')
}

function print(value: unknown) {
  process.stdout.write(JSON.stringify(value, null, 2) + '\n')
}

function printHelp(): void {
  const msg = `
twinplan

Usage:
  twinplan repo set <path>
  twinplan repo show
  twinplan repo clear

  twinplan init [--remote <url>] [-r <repo>]
  twinplan snapshot [-r <repo>]
  twinplan plan [--text] [-r <repo>]
  twinplan apply [--yes] [--from <plan.json>] [-r <repo>]
  twinplan status [-r <repo>]
  twinplan history [-n <count>] [-r <repo>]
  twinplan diff <from> <to> [-r <repo>]
  twinplan reset <commit> [-r <repo>]
  twinplan pull [-r <repo>]

Options:
  --verbose   log progress to stderr
`
  process.stdout.write(msg.trimStart())
  process.stdout.write('\n')
}

function noExtra(args: Argv) {
  if (args.length) die(`Unknown arguments: ${args.join(' ')}`)
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  try {
    const args = [...argv]
    if (args.length === 0 || hasFlag(args, ['-h', '--help'])) {
      printHelp()
      return 0
    }

    const cmd = args.shift()
    if (!cmd) {
      printHelp()
      return 1
    }

    if (cmd === 'repo') {
      const sub = args.shift()
      if (sub === 'set') {
        const p = args.shift()
        if (!p) die('repo set requires a path')
        const abs = await rememberRepo(p)
        process.stdout.write(abs + '\n')
        return 0
      }
      if (sub === 'show') {
        const p = await defaultRepo()
        if (!p) die('No default twin repository set. Run `twinplan repo set <path>`.', 2)
        process.stdout.write(p + '\n')
        return 0
      }
      if (sub === 'clear') {
        await forgetRepo()
        return 0
      }
      die('Unknown repo subcommand. Expected: set|show|clear')
    }

    const logger = hasFlag(args, ['--verbose']) ? stderrLogger() : undefined
    const root = await resolveRepoPath(args)

    if (cmd === 'init') {
      const remote = popFlagValue(args, ['--remote'])
      noExtra(args)
      const { configPath } = repoLayout(root)
      if (!await fs.pathExists(configPath)) {
        await saveRepoConfig(root, remote ? { remote: { url: remote } } : {})
      }
      const engine = await openEngine(root, { logger })
      print(await engine.init())
      return 0
    }

    if (cmd === 'snapshot') {
      noExtra(args)
      const engine = await openEngine(root, { logger })
      const res = await engine.snapshot()
      print(res)
      return res.stale.length ? 1 : 0
    }

    if (cmd === 'plan') {
      const text = hasFlag(args, ['--text'])
      noExtra(args)
      const engine = await openEngine(root, { logger })
      const plan = await engine.plan()
      if (text) process.stdout.write(formatPlan(plan) + '\n')
      else print(plan)
      return 0
    }

    if (cmd === 'apply') {
      const yes = hasFlag(args, ['-y', '--yes'])
      const from = popFlagValue(args, ['--from'])
      noExtra(args)
      const engine = await openEngine(root, { logger })
      const plan = from ? parsePlan(await fs.readJson(path.resolve(from))) : await engine.plan()
      if (!plan.actions.length) {
        process.stdout.write(formatPlan(plan) + '\n')
        return 0
      }
      if (!yes) {
        process.stdout.write(formatPlan(plan) + '\n\nRe-run with --yes to apply this plan.\n')
        return 2
      }
      const controller = new AbortController()
      const onSigint = () => controller.abort()
      process.once('SIGINT', onSigint)
      try {
        const summary = await engine.apply(plan, { signal: controller.signal })
        process.stderr.write(formatSummary(summary) + '\n')
        print(summary)
        return summary.state === 'Completed' ? 0 : 1
      } finally {
        process.removeListener('SIGINT', onSigint)
      }
    }

    if (cmd === 'status') {
      noExtra(args)
      const engine = await openEngine(root, { logger })
      const status = await engine.status()
      for (const [domain, s] of Object.entries(status)) {
        process.stdout.write(`${domain}: ${s}\n`)
      }
      return Object.values(status).some(s => s === 'drift' || s === 'invalid') ? 1 : 0
    }

    if (cmd === 'history') {
      const n = popFlagValue(args, ['-n'])
      noExtra(args)
      const limit = n === undefined ? 20 : parseInt(n, 10)
      if (!Number.isInteger(limit) || limit <= 0) die(`Invalid -n: ${n}`)
      const engine = await openEngine(root, { logger })
      print(await engine.history(limit))
      return 0
    }

    if (cmd === 'diff') {
      const from = args.shift()
      const to = args.shift()
      if (!from || !to) die('diff requires <from> <to>')
      noExtra(args)
      const engine = await openEngine(root, { logger })
      process.stdout.write(await engine.changes(from, to))
      return 0
    }

    if (cmd === 'reset') {
      const commit = args.shift()
      if (!commit) die('reset requires <commit>')
      noExtra(args)
      const engine = await openEngine(root, { logger })
      print(await engine.resetTo(commit))
      return 0
    }

    if (cmd === 'pull') {
      noExtra(args)
      const engine = await openEngine(root, { logger })
      await engine.pull()
      return 0
    }

    die(`Unknown command: ${cmd}`)
  } catch (e) {
    if (e instanceof CliExit) {
      const msg = e.message || 'Command failed'
      process.stderr.write(msg.endsWith('\n') ? msg : msg + '\n')
      return e.exitCode
    }
    process.stderr.write(describeError(e) + '\n')
    return 1
  }
}

// Only run when executed as a script, not when imported (e.g., tests).
const isEntry =
  process.argv[1] &&
  path.resolve(process.argv[1]) === path.resolve(fileURLToPath(import.meta.url))

if (isEntry) {
  main().then(
    (code) => process.exit(code),
    (err: unknown) => {
      const msg = err instanceof Error && err.stack ? err.stack : String(err)
      process.stderr.write(msg.endsWith('\n') ? msg : msg + '\n')
      process.exit(1)
    },
  )
}
