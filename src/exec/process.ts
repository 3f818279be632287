/**
 * Rollout — Process Runner
 *
 * Spawns a program, captures stdout/stderr and the exit code.
 * If the timeout expires the child is killed and `timedOut` is set
 * with whatever partial output was captured.
 */

import { spawn } from 'node:child_process'

export type ProcessOptions = {
  /** Milliseconds before the child is killed. No timeout when omitted. */
  timeoutMs?: number
  /** Put the child in its own process group */
  detached?: boolean
  cwd?: string
}

export type ProcessResult = {
  exitCode: number | null
  stdout: string
  stderr: string
  timedOut: boolean
  /** Set when the program could not be started at all */
  spawnError?: string
}

export type ProcessRunner = (argv: readonly string[], options?: ProcessOptions) => Promise<ProcessResult>

export const runProcess: ProcessRunner = (argv, options = {}) => {
  const [file, ...args] = argv
  if (!file) {
    return Promise.resolve({ exitCode: null, stdout: '', stderr: '', timedOut: false, spawnError: 'empty command' })
  }

  return new Promise((resolve) => {
    const stdout: Buffer[] = []
    const stderr: Buffer[] = []
    let timer: NodeJS.Timeout | undefined
    let settled = false

    const settle = (result: ProcessResult) => {
      if (settled) return
      settled = true
      clearTimeout(timer)
      resolve(result)
    }

    const child = spawn(file, args, {
      cwd: options.cwd,
      detached: options.detached ?? false,
      stdio: ['ignore', 'pipe', 'pipe'],
    })

    const text = (chunks: Buffer[]) => Buffer.concat(chunks).toString('utf-8').trim()

    child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk))
    child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk))

    // Grandchildren may keep the pipes open after the kill, so settle right away
    if (options.timeoutMs !== undefined) {
      timer = setTimeout(() => {
        child.kill('SIGKILL')
        settle({ exitCode: null, stdout: text(stdout), stderr: text(stderr), timedOut: true })
      }, options.timeoutMs)
    }

    child.on('error', (err) => {
      settle({ exitCode: null, stdout: text(stdout), stderr: text(stderr), timedOut: false, spawnError: err.message })
    })

    child.on('close', (code) => {
      settle({ exitCode: code, stdout: text(stdout), stderr: text(stderr), timedOut: false })
    })
  })
}
