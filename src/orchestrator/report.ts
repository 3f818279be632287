/**
 * Rollout — Run Report
 */

import type { RolloutError } from '../errors.js'
import type { Action, Host, PhaseId, Role } from '../plan/types.js'

export type RunState =
  | 'start'
  | 'validating'
  | 'checking'
  | 'installing'
  | 'configuring'
  | 'done'
  | 'failed'
  | 'usage'

export type PhaseSummary = {
  id: PhaseId
  summary: string
  errors: number
}

export type HostSummary = Host & {
  errors: number
}

export type RunReport = {
  readonly role: Role | null
  readonly state: RunState
  /** Every state the run passed through, in order */
  readonly transitions: readonly RunState[]
  readonly phases: readonly PhaseSummary[]
  readonly hosts: readonly HostSummary[]
  readonly actions: readonly Action[]
  readonly totalErrors: number
  readonly fatal: RolloutError | null
}

/** 0: done without errors, 2: done with action errors, 1: anything fatal */
export function exitCode(report: RunReport): number {
  if (report.state !== 'done') return 1
  return report.totalErrors === 0 ? 0 : 2
}

export function freezeReport(report: RunReport): RunReport {
  return Object.freeze({
    ...report,
    transitions: Object.freeze([...report.transitions]),
    phases: Object.freeze(report.phases.map((phase) => Object.freeze({ ...phase }))),
    hosts: Object.freeze(report.hosts.map((host) => Object.freeze({ ...host }))),
    actions: Object.freeze(report.actions.map((action) => Object.freeze({ ...action }))),
  })
}
