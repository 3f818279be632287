/**
 * Rollout — Errors
 *
 * Only the CLI entry point turns these into exit codes.
 */

export type ErrorKind = 'usage' | 'privilege' | 'prerequisite' | 'action' | 'config' | 'internal'

export abstract class RolloutError extends Error {
  abstract readonly kind: ErrorKind

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/** Bad arguments. Raised before any side effect. */
export class UsageError extends RolloutError {
  readonly kind = 'usage'
}

export class PrivilegeError extends RolloutError {
  readonly kind = 'privilege'
}

/** A fatal prerequisite phase: unresolvable host, no passwordless SSH, wrong filesystem. */
export class PrerequisiteError extends RolloutError {
  readonly kind = 'prerequisite'

  constructor(
    message: string,
    readonly phase: string,
    readonly failures: readonly string[],
  ) {
    super(message)
  }
}

/** One step failed on one host. Counted, never fatal. */
export class ActionError extends RolloutError {
  readonly kind = 'action'

  constructor(
    message: string,
    readonly host: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
  }
}

export class ConfigError extends RolloutError {
  readonly kind = 'config'

  constructor(
    message: string,
    readonly file: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
  }
}

/** Anything thrown that is not a RolloutError, caught at the top of a run */
export class InternalError extends RolloutError {
  readonly kind = 'internal'
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
