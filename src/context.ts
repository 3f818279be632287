/**
 * Rollout — Run Context
 *
 * Everything a run needs, passed explicitly to each component.
 */

import type { RolloutConfig } from './config/types.js'
import type { Inventory } from './infra/types.js'
import type { Logger } from './log/logger.js'
import type { Role } from './plan/types.js'

export type RunContext = {
  role: Role
  master: string
  remotes: string[]
  /** Name the plan uses for this machine: the master argument, or the short host name on a remote */
  localHost: string
  /** `hostname -s` of this machine */
  shortHostname: string
  /** Working directory at startup */
  initialCwd: string
  config: RolloutConfig
  inventory: Inventory
  logger: Logger
  startedAt: Date
}
