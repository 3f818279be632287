/**
 * Rollout — Command Line
 */

import { UsageError } from '../errors.js'
import type { Role } from '../plan/types.js'

export type Invocation = {
  role: Role
  master: string
  remotes: string[]
}

export const USAGE = `Usage: rollout master MASTER_HOSTNAME REMOTE_HOSTNAME [OTHER_REMOTE_HOSTNAMES...]
       rollout remote MASTER_HOSTNAME REMOTE_HOSTNAME [OTHER_REMOTE_HOSTNAMES...]
    provision a master and its remote host(s)

Example(s):
    rollout master cmaster cremote1 cremote2   # run as root on the master host
        # will:
        #    check that every host resolves and accepts passwordless ssh
        #    install/configure software on the remotes via ssh
        #    install/configure software on the master

    The remote role is started on each remote by the master.

Log files are stored in $HOME/rollout/
`

const HOST_NAME = /^[A-Za-z0-9_][A-Za-z0-9._-]*$/

function isRole(value: string): value is Role {
  return value === 'master' || value === 'remote'
}

export function wantsHelp(argv: readonly string[]): boolean {
  return argv.includes('--help') || argv.includes('-h')
}

/** Positional arguments: ROLE MASTER REMOTE [REMOTE...] */
export function parseInvocation(argv: readonly string[]): Invocation {
  if (argv.length < 3) {
    throw new UsageError(`expected a role, a master and at least one remote - got ${argv.length} argument(s)`)
  }

  const [role, master, ...remotes] = argv
  if (!isRole(role)) {
    throw new UsageError(`unknown role '${role}' - expected 'master' or 'remote'`)
  }

  for (const host of [master, ...remotes]) {
    if (!HOST_NAME.test(host)) {
      throw new UsageError(`invalid host name '${host}'`)
    }
  }

  return { role, master, remotes }
}
