/**
 * Rollout — Provisioner
 *
 * The mutating steps: install, configure, and launching the remote role
 * on each remote host. Failures surface as ActionError for the host.
 */

import { resolve } from 'node:path'
import type { RunContext } from '../context.js'
import { ActionError, errorMessage } from '../errors.js'
import type { LocalExecutor } from '../exec/local.js'
import { shellJoin } from '../exec/quote.js'
import { sshTarget } from '../infra/inventory.js'
import type { RemoteExecutor } from '../remote/executor.js'
import type { Resolver } from '../probe/resolver.js'
import { editDefaultsFile } from './defaults-file.js'
import type { ConfigPatch, EditResult } from './defaults-file.js'

export type ConfigureOutcome = 'configured' | 'skipped'

export class Provisioner {
  constructor(
    private readonly ctx: RunContext,
    private readonly local: LocalExecutor,
    private readonly remote: RemoteExecutor,
    private readonly resolver: Resolver,
    private readonly clock: () => Date,
  ) {}

  /** Run the configured install commands here, stopping at the first failure */
  async installLocal(): Promise<void> {
    const { config, localHost } = this.ctx
    await this.runAll(config.install.commands, localHost)
  }

  /**
   * Copy the configured files to `host`, then run the remote role there and
   * wait for it to report back through its exit status.
   */
  async installRemote(host: string): Promise<void> {
    const { logger, config, master, remotes, initialCwd } = this.ctx

    for (const file of config.fanout.upload.map((path) => resolve(initialCwd, path))) {
      const copied = await this.remote.upload(host, file)
      if (!copied.ok) throw new ActionError(copied.error, host)
    }

    const command = shellJoin([config.fanout.remote_command, 'remote', master, ...remotes])
    const task = this.remote.execute(host, command, { background: true })
    logger.info(`launched '${command}' on ${host}`)

    const result = await task.result
    const output = [result.stdout, result.stderr].filter(Boolean).join('\n')
    if (output) logger.record(`---- output from ${host} ----\n${output}\n---- end of output from ${host} ----`)

    if (!result.ok) throw new ActionError(result.error, host)
    logger.info(`remote install finished on ${host}`)
  }

  async configureMaster(): Promise<ConfigureOutcome> {
    const { config, localHost, shortHostname } = this.ctx

    this.edit(config.service.defaults_file, [
      { op: 'enable', key: 'HOME' },
      { op: 'set', key: 'SERVICED_FS_TYPE', value: config.filesystem.type },
      { op: 'set', key: 'SERVICED_REGISTRY', value: '1' },
      { op: 'set', key: 'SERVICED_AGENT', value: '1' },
      { op: 'set', key: 'SERVICED_MASTER', value: '1' },
    ])

    this.edit(config.runtime.defaults_file, [
      { op: 'set', key: 'DOCKER_OPTS', value: `"--insecure-registry ${shortHostname}:${config.runtime.registry_port}"` },
    ])

    await this.runAll(config.runtime.restart, localHost)
    await this.runAll(config.service.restart, localHost)
    return 'configured'
  }

  /**
   * Point this remote at the master. Skipped entirely when the master does
   * not resolve, whether the lookup finds nothing or fails outright.
   */
  async configureRemote(): Promise<ConfigureOutcome> {
    const { logger, config, master, localHost, inventory } = this.ctx

    let masterIp: string | null
    let reason = ''
    try {
      masterIp = await this.resolver(sshTarget(inventory, master).address)
    } catch (err) {
      masterIp = null
      reason = `: ${errorMessage(err)}`
    }
    if (masterIp === null) {
      logger.warn(`master ${master} does not resolve${reason} - leaving ${config.service.defaults_file} unchanged`)
      return 'skipped'
    }

    this.edit(config.service.defaults_file, [
      { op: 'enable', key: 'HOME' },
      { op: 'set', key: 'SERVICED_REGISTRY', value: '1' },
      { op: 'set', key: 'SERVICED_AGENT', value: '1' },
      { op: 'set', key: 'SERVICED_MASTER', value: '0' },
      { op: 'set', key: 'SERVICED_MASTER_IP', value: masterIp },
      { op: 'enableReferencing', variable: 'SERVICED_MASTER_IP' },
    ])

    await this.runAll(config.service.restart, localHost)
    return 'configured'
  }

  private edit(path: string, patches: ConfigPatch[]): void {
    const { logger, localHost } = this.ctx
    let result: EditResult
    try {
      result = editDefaultsFile(path, patches, this.clock())
    } catch (err) {
      throw new ActionError(`could not edit ${path}: ${errorMessage(err)}`, localHost, { cause: err })
    }
    logger.info(`edited ${path} (backup: ${result.backupPath}): ${result.changed.join(', ') || 'no changes'}`)
    if (result.missing.length) {
      logger.warn(`${path} has no setting for: ${result.missing.join(', ')}`)
    }
  }

  private async runAll(commands: readonly string[], host: string): Promise<void> {
    for (const command of commands) {
      this.ctx.logger.info(`running: ${command}`)
      const result = await this.local.execute(command)
      if (!result.ok) throw new ActionError(result.error, host)
    }
  }
}
