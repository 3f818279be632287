/**
 * Rollout — Logger
 *
 * Every line goes to stderr and, once a log file is attached, is appended
 * to it as well. The file is shared across runs; each run starts with a
 * separator line.
 */

import { mkdirSync, appendFileSync } from 'node:fs'
import { dirname } from 'node:path'

export type LineSink = {
  write(chunk: string): unknown
}

export const RULE = '='.repeat(80)
export const RUN_SEPARATOR = '#'.repeat(80)

export class Logger {
  private logFile: string | null = null

  constructor(private readonly stream: LineSink = process.stderr) {}

  /** Start duplicating output into `path`, appending a run separator */
  attach(path: string): void {
    mkdirSync(dirname(path), { recursive: true })
    appendFileSync(path, `\n${RUN_SEPARATOR}\n`, 'utf-8')
    this.logFile = path
  }

  get file(): string | null {
    return this.logFile
  }

  info(message: string): void {
    this.line(`INFO: ${message}`)
  }

  warn(message: string): void {
    this.line(`WARNING: ${message}`)
  }

  error(message: string): void {
    this.line(`ERROR: ${message}`)
  }

  /** Phase summary: an INFO line closed by a rule */
  summary(message: string): void {
    this.info(message)
    this.line(RULE)
  }

  /** Log file only */
  record(text: string): void {
    if (this.logFile) appendFileSync(this.logFile, text.endsWith('\n') ? text : `${text}\n`, 'utf-8')
  }

  private line(text: string): void {
    this.stream.write(`${text}\n`)
    this.record(text)
  }
}
