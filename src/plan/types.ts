/**
 * Rollout — Plan Types
 */

import type { ActionError } from '../errors.js'

export type Role = 'master' | 'remote'

export type HostStatus = 'unknown' | 'resolvable' | 'unresolvable' | 'reachable' | 'unreachable'

export type Host = {
  name: string
  role: Role
  status: HostStatus
  lastError?: string
}

export type ActionName = 'checkResolvable' | 'checkFilesystem' | 'checkSsh' | 'install' | 'configure'

export type ActionOutcome = 'pending' | 'success' | 'failed' | 'skipped'

export type Action = {
  name: ActionName
  host: string
  /** Mount point, for checkFilesystem */
  path?: string
  outcome: ActionOutcome
  error?: ActionError
}

export type PhaseId = 'resolve' | 'filesystem' | 'ssh' | 'fanout' | 'install' | 'configure'

/** Orchestrator state while a phase runs */
export type Stage = 'checking' | 'installing' | 'configuring'

export type Phase = {
  id: PhaseId
  stage: Stage
  /** Logged when the phase starts */
  title: string
  /** Logged with the error count when the phase ends */
  summary: string
  /** Set on prerequisite phases: any failure aborts the run with this message */
  fatal?: string
  /** Actions run concurrently (each on its own host) */
  parallel: boolean
  actions: Action[]
}

export type Plan = {
  role: Role
  master: string
  remotes: string[]
  /** The host this process runs on */
  localHost: string
  phases: Phase[]
}
