/**
 * Rollout — Local Executor
 *
 * Runs shell commands on this machine via `bash -c`. The result types are
 * shared with the remote executor.
 */

import type { ProcessRunner } from './process.js'

/**
 * - exit: the command ran and returned non-zero
 * - timeout: killed after the action timeout
 * - spawn: the program could not be started
 * - connection / auth: the SSH transport failed before the command ran
 */
export type ExecFailure = 'exit' | 'timeout' | 'spawn' | 'connection' | 'auth'

export type ExecSuccess = {
  ok: true
  exitCode: 0
  stdout: string
  stderr: string
}

export type ExecFailed = {
  ok: false
  failure: ExecFailure
  exitCode: number | null
  stdout: string
  stderr: string
  error: string
}

export type ExecResult = ExecSuccess | ExecFailed

export class LocalExecutor {
  constructor(
    private readonly runner: ProcessRunner,
    private readonly timeoutSec: number,
  ) {}

  async execute(command: string, timeoutSec: number = this.timeoutSec): Promise<ExecResult> {
    const proc = await this.runner(['bash', '-c', command], { timeoutMs: timeoutSec * 1000 })
    const { stdout, stderr } = proc

    if (proc.spawnError !== undefined) {
      return { ok: false, failure: 'spawn', exitCode: null, stdout, stderr, error: `failed to execute '${command}': ${proc.spawnError}` }
    }
    if (proc.timedOut) {
      return { ok: false, failure: 'timeout', exitCode: null, stdout, stderr, error: `'${command}' timed out after ${timeoutSec}s` }
    }
    if (proc.exitCode !== 0) {
      const detail = stderr ? `: ${stderr.split('\n').pop()}` : ''
      return { ok: false, failure: 'exit', exitCode: proc.exitCode, stdout, stderr, error: `'${command}' exited with ${proc.exitCode}${detail}` }
    }
    return { ok: true, exitCode: 0, stdout, stderr }
  }
}
