/**
 * Rollout — Orchestrator
 *
 * Start → Validating → Checking → Installing → Configuring → Done | Failed
 *
 * Usage and privilege errors end the run before anything is logged to file
 * or executed. Prerequisite phases abort the run on any failure; install and
 * configure failures are counted per phase and per host, and only stop the
 * failing host's later actions.
 */

import type { RolloutConfig } from '../config/types.js'
import type { RunContext } from '../context.js'
import { ActionError, InternalError, PrerequisiteError, PrivilegeError, RolloutError, errorMessage } from '../errors.js'
import { LocalExecutor } from '../exec/local.js'
import type { ProcessRunner } from '../exec/process.js'
import type { Inventory } from '../infra/types.js'
import type { Logger } from '../log/logger.js'
import { RolloutPlanner } from '../plan/planner.js'
import type { Action, Host, HostStatus, Phase, Plan } from '../plan/types.js'
import { HostProbe } from '../probe/host-probe.js'
import type { Resolver } from '../probe/resolver.js'
import { Provisioner } from '../provision/provisioner.js'
import type { ConfigureOutcome } from '../provision/provisioner.js'
import { RemoteExecutor } from '../remote/executor.js'
import { parseInvocation } from './invocation.js'
import type { Invocation } from './invocation.js'
import { freezeReport } from './report.js'
import type { HostSummary, PhaseSummary, RunReport, RunState } from './report.js'

export type OrchestratorDeps = {
  runner: ProcessRunner
  resolver: Resolver
  logger: Logger
  /** Log file the run appends to */
  logFile: string
  loadConfig: () => RolloutConfig
  loadInventory: () => Inventory
  isPrivileged: () => boolean
  /** Short host name of this machine */
  hostname: () => string
  clock: () => Date
  cwd: string
  /** e.g. "linux x64", for the run header */
  platform: string
}

function timestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z')
}

export class Orchestrator {
  private _state: RunState = 'start'
  private readonly transitions: RunState[] = ['start']
  private readonly phases: PhaseSummary[] = []
  private readonly hosts = new Map<string, Host>()
  private readonly hostErrors = new Map<string, number>()
  private readonly failedHosts = new Set<string>()
  private plan: Plan | null = null

  constructor(private readonly deps: OrchestratorDeps) {}

  get state(): RunState {
    return this._state
  }

  async run(argv: readonly string[]): Promise<RunReport> {
    const { logger } = this.deps
    let invocation: Invocation | null = null

    try {
      this.transition('validating')
      try {
        invocation = parseInvocation(argv)
      } catch (err) {
        if (err instanceof RolloutError) this.transition('usage')
        throw err
      }
      if (!this.deps.isPrivileged()) {
        throw new PrivilegeError("user is not root - run this as the 'root' user")
      }

      const ctx = this.prepare(invocation)
      await this.execute(ctx)

      logger.summary(`software is installed, deployed, and started on ${invocation.role}`)
      this.transition('done')
      return this.report(invocation, null)
    } catch (err) {
      const fatal = err instanceof RolloutError
        ? err
        : new InternalError(`unexpected failure: ${errorMessage(err)}`, { cause: err })
      logger.error(fatal.message)
      if (this._state !== 'usage') this.transition('failed')
      return this.report(invocation, fatal)
    }
  }

  // ── Setup ─────────────────────────────────────────────────────────────────

  private prepare(invocation: Invocation): RunContext {
    const { logger, clock } = this.deps
    const startedAt = clock()

    logger.attach(this.deps.logFile)
    logger.info(`rollout  date:${timestamp(startedAt)}  platform:${this.deps.platform}`)
    logger.info(`installing as '${invocation.role}' role with master ${invocation.master} with remotes: ${invocation.remotes.join(' ')}`)

    const config = this.deps.loadConfig()
    const inventory = this.deps.loadInventory()
    const shortHostname = this.deps.hostname()
    const localHost = invocation.role === 'master' ? invocation.master : shortHostname

    const ctx: RunContext = {
      ...invocation,
      localHost,
      shortHostname,
      initialCwd: this.deps.cwd,
      config,
      inventory,
      logger,
      startedAt,
    }

    this.plan = new RolloutPlanner(config).plan(invocation.role, invocation.master, invocation.remotes, localHost)
    ctx.remotes = this.plan.remotes

    this.hosts.set(invocation.master, { name: invocation.master, role: 'master', status: 'unknown' })
    for (const remote of this.plan.remotes) {
      this.hosts.set(remote, { name: remote, role: 'remote', status: 'unknown' })
    }
    if (!this.hosts.has(localHost)) {
      this.hosts.set(localHost, { name: localHost, role: invocation.role, status: 'unknown' })
    }

    return ctx
  }

  // ── Phases ────────────────────────────────────────────────────────────────

  private async execute(ctx: RunContext): Promise<void> {
    const { runner, resolver, logger, clock } = this.deps
    const { config } = ctx
    const plan = this.plan
    if (!plan) throw new Error('run has no plan')

    const local = new LocalExecutor(runner, config.timeouts.action)
    const remote = new RemoteExecutor(runner, ctx.inventory, config.ssh, config.timeouts.action)
    const probe = new HostProbe(resolver, ctx.inventory, local, remote, logger, config.timeouts.probe)
    const provisioner = new Provisioner(ctx, local, remote, resolver, clock)

    for (const phase of plan.phases) {
      this.transition(phase.stage)
      logger.info(phase.title)

      switch (phase.id) {
        case 'resolve': {
          const failed = await probe.checkResolvable(phase.actions.map((a) => a.host))
          this.settleChecks(phase, failed, 'resolvable', 'unresolvable', 'host is not resolvable')
          break
        }
        case 'filesystem': {
          const failed = await probe.checkFilesystems(phase.actions.map((a) => a.path ?? ''), config.filesystem.type)
          for (const action of phase.actions) {
            const path = action.path ?? ''
            this.settle(action, failed.has(path) ? new ActionError(`${path} is not a ${config.filesystem.type} mount`, action.host) : null)
          }
          break
        }
        case 'ssh': {
          const failed = await probe.checkReachable(phase.actions.map((a) => a.host))
          this.settleChecks(phase, failed, 'reachable', 'unreachable', 'no passwordless ssh')
          break
        }
        case 'fanout':
          await Promise.all(phase.actions.map((action) => this.runAction(action, () => provisioner.installRemote(action.host))))
          break
        case 'install':
          for (const action of phase.actions) {
            await this.runAction(action, () => provisioner.installLocal())
          }
          break
        case 'configure':
          for (const action of phase.actions) {
            await this.runAction(action, () =>
              ctx.role === 'master' ? provisioner.configureMaster() : provisioner.configureRemote(),
            )
          }
          break
      }

      this.finishPhase(phase)
    }
  }

  private finishPhase(phase: Phase): void {
    const failed = phase.actions.filter((a) => a.outcome === 'failed')
    this.phases.push({ id: phase.id, summary: phase.summary, errors: failed.length })
    this.deps.logger.summary(`${phase.summary} - found ${failed.length} errors`)

    if (phase.fatal && failed.length > 0) {
      const targets = failed.map((a) => a.path ?? a.host)
      throw new PrerequisiteError(`${phase.fatal}: ${targets.join(', ')}`, phase.id, targets)
    }
  }

  private settleChecks(phase: Phase, failed: Set<string>, good: HostStatus, bad: HostStatus, reason: string): void {
    for (const action of phase.actions) {
      const ok = !failed.has(action.host)
      this.setStatus(action.host, ok ? good : bad)
      this.settle(action, ok ? null : new ActionError(`${action.host}: ${reason}`, action.host))
    }
  }

  /** Run one mutating action unless its host already failed */
  private async runAction(action: Action, step: () => Promise<void | ConfigureOutcome>): Promise<void> {
    if (this.failedHosts.has(action.host)) {
      action.outcome = 'skipped'
      this.deps.logger.warn(`skipping ${action.name} on ${action.host} after an earlier failure`)
      return
    }

    try {
      const outcome = await step()
      if (outcome === 'skipped') {
        action.outcome = 'skipped'
        return
      }
      this.settle(action, null)
    } catch (err) {
      const error = err instanceof ActionError
        ? err
        : new ActionError(`${action.name} failed on ${action.host}: ${errorMessage(err)}`, action.host, { cause: err })
      this.deps.logger.error(error.message)
      this.settle(action, error)
    }
  }

  private settle(action: Action, error: ActionError | null): void {
    if (!error) {
      action.outcome = 'success'
      return
    }
    action.outcome = 'failed'
    action.error = error
    this.failedHosts.add(action.host)
    this.hostErrors.set(action.host, (this.hostErrors.get(action.host) ?? 0) + 1)
    const host = this.hosts.get(action.host)
    if (host) host.lastError = error.message
  }

  private setStatus(name: string, status: HostStatus): void {
    const host = this.hosts.get(name)
    if (host) host.status = status
  }

  // ── State ─────────────────────────────────────────────────────────────────

  private transition(next: RunState): void {
    if (this._state === next) return
    this._state = next
    this.transitions.push(next)
  }

  private report(invocation: Invocation | null, fatal: RolloutError | null): RunReport {
    const hosts: HostSummary[] = [...this.hosts.values()].map((host) => ({
      ...host,
      errors: this.hostErrors.get(host.name) ?? 0,
    }))

    return freezeReport({
      role: invocation?.role ?? null,
      state: this._state,
      transitions: this.transitions,
      phases: this.phases,
      hosts,
      actions: this.plan?.phases.flatMap((phase) => phase.actions) ?? [],
      totalErrors: this.phases.reduce((sum, phase) => sum + phase.errors, 0),
      fatal,
    })
  }
}
