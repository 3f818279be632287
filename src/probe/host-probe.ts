/**
 * Rollout — Host Probe
 *
 * Read-only prerequisite checks. Every host or path is checked and logged
 * on its own; a failure never stops the loop. Callers get the failing set
 * back and decide whether to abort.
 */

import { errorMessage } from '../errors.js'
import type { Logger } from '../log/logger.js'
import type { LocalExecutor } from '../exec/local.js'
import { shellQuote } from '../exec/quote.js'
import { sshTarget } from '../infra/inventory.js'
import type { Inventory } from '../infra/types.js'
import type { RemoteExecutor } from '../remote/executor.js'
import type { Resolver } from './resolver.js'

export class HostProbe {
  constructor(
    private readonly resolver: Resolver,
    private readonly inventory: Inventory,
    private readonly local: LocalExecutor,
    private readonly remote: RemoteExecutor,
    private readonly logger: Logger,
    private readonly timeoutSec: number,
  ) {}

  /**
   * Hosts that do not resolve to an address. A host listed in the inventory
   * is looked up by its inventory address.
   */
  async checkResolvable(hosts: readonly string[]): Promise<Set<string>> {
    const failed = new Set<string>()

    for (const host of hosts) {
      const target = sshTarget(this.inventory, host).address
      const label = target === host ? host : `${host} (${target})`

      let address: string | null
      try {
        address = await this.resolver(target)
      } catch (err) {
        this.logger.error(`host ${label} is not resolvable: ${errorMessage(err)}`)
        failed.add(host)
        continue
      }

      if (address === null) {
        this.logger.error(`host ${label} is not resolvable`)
        failed.add(host)
        continue
      }
      this.logger.info(`host ${label} is a valid host (${address})`)
    }

    return failed
  }

  /** Hosts that do not accept a passwordless SSH login */
  async checkReachable(hosts: readonly string[]): Promise<Set<string>> {
    const failed = new Set<string>()

    for (const host of hosts) {
      const result = await this.remote.execute(host, 'id', { timeoutSec: this.timeoutSec })
      if (!result.ok) {
        this.logger.error(`host ${host} has no passwordless ssh: ${result.error}`)
        failed.add(host)
        continue
      }
      this.logger.info(`host ${host} accepts passwordless ssh`)
    }

    return failed
  }

  /** True when `path` is a mount point of type `expectedType` */
  async checkFilesystem(path: string, expectedType: string): Promise<boolean> {
    this.logger.info(`checking that path ${path} is of the required type: ${expectedType}`)

    const result = await this.local.execute(`findmnt -n -o FSTYPE --mountpoint ${shellQuote(path)}`, this.timeoutSec)
    if (!result.ok) {
      this.logger.error(`no filesystem is mounted at path: ${path}`)
      return false
    }

    const actual = result.stdout.trim()
    if (actual !== expectedType) {
      this.logger.error(`filesystem at path: ${path} is ${actual || 'unknown'}, not ${expectedType}`)
      return false
    }
    return true
  }

  /** Paths that fail `checkFilesystem` */
  async checkFilesystems(paths: readonly string[], expectedType: string): Promise<Set<string>> {
    const failed = new Set<string>()
    for (const path of paths) {
      if (!(await this.checkFilesystem(path, expectedType))) failed.add(path)
    }
    return failed
  }
}
