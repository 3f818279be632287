/**
 * Rollout — Host Inventory
 *
 * Optional ~/rollout/hosts.yaml mapping the names given on the command line
 * to SSH addresses, ports, users and keys. Names not listed are used as-is.
 */

import { readFileSync, existsSync } from 'node:fs'
import { homedir } from 'node:os'
import { parse as parseYaml } from 'yaml'
import { rolloutHome } from '../config/paths.js'
import { ConfigError, errorMessage } from '../errors.js'
import { inventoryFileSchema } from './types.js'
import type { Inventory, SshTarget } from './types.js'

export const INVENTORY_PATH = rolloutHome('hosts.yaml')

export function emptyInventory(): Inventory {
  return { hosts: new Map() }
}

export function loadInventory(path: string = INVENTORY_PATH): Inventory {
  const inventory = emptyInventory()
  if (!existsSync(path)) return inventory

  let parsed: unknown
  try {
    parsed = parseYaml(readFileSync(path, 'utf-8'))
  } catch (err) {
    throw new ConfigError(`could not parse ${path}: ${errorMessage(err)}`, path, { cause: err })
  }
  if (parsed === null || parsed === undefined) return inventory

  const result = inventoryFileSchema.safeParse(parsed)
  if (!result.success) {
    const issue = result.error.issues[0]
    throw new ConfigError(`invalid host entry '${issue.path.join('.')}' in ${path}: ${issue.message}`, path)
  }

  for (const [name, host] of Object.entries(result.data.hosts ?? {})) {
    inventory.hosts.set(name, host)
  }
  return inventory
}

/** Resolve a command-line host name to an SSH target */
export function sshTarget(inventory: Inventory, name: string): SshTarget {
  const entry = inventory.hosts.get(name)
  if (!entry) return { name, address: name }

  return {
    name,
    address: entry.host,
    port: entry.port,
    user: entry.user,
    key: entry.key?.replace(/^~(?=\/|$)/, homedir()),
  }
}
