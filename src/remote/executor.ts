/**
 * Rollout — Remote Executor
 *
 * Runs commands on remote hosts with the system `ssh` client and copies
 * files with `scp`. Transport failures are reported apart from a command's
 * own non-zero exit. Background mode starts the command and hands back a
 * task whose result settles when the remote side finishes.
 */

import type { ProcessResult, ProcessRunner } from '../exec/process.js'
import type { ExecFailure, ExecResult } from '../exec/local.js'
import type { Inventory, SshTarget } from '../infra/types.js'
import { sshTarget } from '../infra/inventory.js'
import { errorMessage } from '../errors.js'

export type SshSettings = {
  options: string[]
  connect_timeout: number
}

export type ExecuteOptions = {
  /** Overrides the executor's default action timeout */
  timeoutSec?: number
  background?: boolean
}

/** A command started in the background. `result` never rejects. */
export type RemoteTask = {
  host: string
  command: string
  result: Promise<ExecResult>
}

/** ssh reserves 255 for its own errors */
const SSH_TRANSPORT_EXIT = 255

const AUTH_PATTERN = /permission denied|host key verification failed|too many authentication failures/i
const CONNECTION_PATTERN = /could not resolve|connection refused|connection timed out|no route to host|connection closed|network is unreachable/i

export class RemoteExecutor {
  constructor(
    private readonly runner: ProcessRunner,
    private readonly inventory: Inventory,
    private readonly ssh: SshSettings,
    private readonly timeoutSec: number,
  ) {}

  execute(host: string, command: string, options: ExecuteOptions & { background: true }): RemoteTask
  execute(host: string, command: string, options?: ExecuteOptions & { background?: false }): Promise<ExecResult>
  execute(host: string, command: string, options: ExecuteOptions = {}): RemoteTask | Promise<ExecResult> {
    const argv = this.sshArgv(host, command)
    const timeoutSec = options.timeoutSec ?? this.timeoutSec
    const result = this.runner(argv, { timeoutMs: timeoutSec * 1000, detached: options.background ?? false })
      .then(
        (proc) => classify(proc, `'${command}' on ${host}`, timeoutSec, 'ssh'),
        (err: unknown): ExecResult => ({
          ok: false,
          failure: 'spawn',
          exitCode: null,
          stdout: '',
          stderr: '',
          error: `ssh could not be started for '${command}' on ${host}: ${errorMessage(err)}`,
        }),
      )

    if (options.background) {
      return { host, command, result }
    }
    return result
  }

  /** Copy a local file into the remote user's home directory */
  async upload(host: string, localPath: string, timeoutSec: number = this.timeoutSec): Promise<ExecResult> {
    const proc = await this.runner(this.scpArgv(host, localPath), { timeoutMs: timeoutSec * 1000 })
    return classify(proc, `copying ${localPath} to ${host}`, timeoutSec, 'scp')
  }

  sshArgv(host: string, command: string): string[] {
    const target = sshTarget(this.inventory, host)
    const argv = ['ssh', ...this.commonOptions(target)]
    if (target.port !== undefined) argv.push('-p', String(target.port))
    argv.push(destination(target), command)
    return argv
  }

  scpArgv(host: string, localPath: string): string[] {
    const target = sshTarget(this.inventory, host)
    const argv = ['scp', ...this.commonOptions(target)]
    if (target.port !== undefined) argv.push('-P', String(target.port))
    argv.push(localPath, `${destination(target)}:`)
    return argv
  }

  private commonOptions(target: SshTarget): string[] {
    const options = [...this.ssh.options, '-o', `ConnectTimeout=${this.ssh.connect_timeout}`]
    if (target.key) options.push('-i', target.key)
    return options
  }
}

function destination(target: SshTarget): string {
  return target.user ? `${target.user}@${target.address}` : target.address
}

function transportFailure(stderr: string): ExecFailure | null {
  if (AUTH_PATTERN.test(stderr)) return 'auth'
  if (CONNECTION_PATTERN.test(stderr)) return 'connection'
  return null
}

function classify(proc: ProcessResult, what: string, timeoutSec: number, client: 'ssh' | 'scp'): ExecResult {
  const { stdout, stderr } = proc

  if (proc.spawnError !== undefined) {
    return { ok: false, failure: 'spawn', exitCode: null, stdout, stderr, error: `${client} could not be started for ${what}: ${proc.spawnError}` }
  }
  if (proc.timedOut) {
    return { ok: false, failure: 'timeout', exitCode: null, stdout, stderr, error: `${what} timed out after ${timeoutSec}s` }
  }
  if (proc.exitCode === 0) {
    return { ok: true, exitCode: 0, stdout, stderr }
  }

  // scp exits 1 for transport and file errors alike, so only stderr tells them apart
  const transport = client === 'ssh' && proc.exitCode === SSH_TRANSPORT_EXIT
    ? (transportFailure(stderr) ?? 'connection')
    : client === 'scp' ? transportFailure(stderr) : null

  const lastLine = stderr.split('\n').pop()
  const detail = lastLine ? `: ${lastLine}` : ''

  if (transport === 'auth') {
    return { ok: false, failure: 'auth', exitCode: proc.exitCode, stdout, stderr, error: `authentication failed for ${what}${detail}` }
  }
  if (transport === 'connection') {
    return { ok: false, failure: 'connection', exitCode: proc.exitCode, stdout, stderr, error: `connection failed for ${what}${detail}` }
  }
  return { ok: false, failure: 'exit', exitCode: proc.exitCode, stdout, stderr, error: `${what} exited with ${proc.exitCode}${detail}` }
}
