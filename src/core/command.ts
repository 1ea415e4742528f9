import { execFile } from 'child_process'

export interface CommandResult {
  code: number
  stdout: string
  stderr: string
}

export interface RunOptions {
  cwd?: string
  env?: NodeJS.ProcessEnv
  /** Written to the child's stdin, which is then closed. */
  input?: string
  timeoutMs?: number
  signal?: AbortSignal
}

/**
 * The only way plugins and the git client reach the operating system.
 * A non-zero exit is a result, not an error. Spawn failures, timeouts and aborts reject.
 */
export interface CommandRunner {
  run(cmd: string, args: string[], opts?: RunOptions): Promise<CommandResult>
}

export interface ExecRunnerOptions {
  /** Upper bound on captured stdout/stderr, in bytes. */
  maxBuffer?: number
  timeoutMs?: number
}

export function execRunner(defaults: ExecRunnerOptions = {}): CommandRunner {
  return {
    run(cmd, args, opts = {}) {
      return new Promise<CommandResult>((resolve, reject) => {
        const child = execFile(cmd, args, {
          cwd: opts.cwd,
          env: opts.env ? { ...process.env, ...opts.env } : process.env,
          timeout: opts.timeoutMs ?? defaults.timeoutMs ?? 0,
          maxBuffer: defaults.maxBuffer ?? 16 * 1024 * 1024,
          signal: opts.signal,
          encoding: 'utf8',
        }, (err, stdout, stderr) => {
          if (!err) {
            resolve({ code: 0, stdout, stderr })
            return
          }
          if (typeof err.code === 'number' && !err.killed) {
            resolve({ code: err.code, stdout, stderr })
            return
          }
          const why = err.killed ? `terminated (${err.signal ?? 'timeout'})` : err.message
          reject(new Error(`${cmd} ${args.join(' ')}: ${why}`))
        })
        if (opts.input !== undefined) {
          child.stdin?.end(opts.input)
        }
      })
    },
  }
}

/**
 * Prefix a command with sudo when the plugin runs unprivileged.
 */
export function privileged(sudo: boolean, cmd: string, args: string[]): [string, string[]] {
  return sudo ? ['sudo', ['-n', cmd, ...args]] : [cmd, args]
}

/**
 * Whether `cmd` can be run at all. Only a spawn failure or exit 127 counts as missing;
 * any other exit means the tool is there.
 */
export async function commandAvailable(runner: CommandRunner, cmd: string, args: string[]): Promise<boolean> {
  try {
    return (await runner.run(cmd, args)).code !== 127
  } catch {
    return false
  }
}

export function describeFailure(res: CommandResult): string {
  const text = (res.stderr || res.stdout).trim()
  return text ? `exit ${res.code}: ${text}` : `exit ${res.code}`
}
