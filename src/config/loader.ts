/**
 * Rollout — Config Loader
 *
 * Loads ~/rollout/config.yaml and merges it over the defaults.
 * A missing file means defaults; a malformed one is fatal.
 */

import { readFileSync, existsSync } from 'node:fs'
import { parse as parseYaml } from 'yaml'
import { DEFAULT_CONFIG } from './defaults.js'
import { rolloutConfigSchema } from './types.js'
import type { RolloutConfig } from './types.js'
import { rolloutHome } from './paths.js'
import { ConfigError, errorMessage } from '../errors.js'

export const CONFIG_PATH = rolloutHome('config.yaml')

type Tree = Record<string, unknown>

function isTree(value: unknown): value is Tree {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/** Deep merge b into a (b wins, arrays replace) */
export function deepMerge(a: Tree, b: Tree): Tree {
  const result: Tree = { ...a }
  for (const [key, val] of Object.entries(b)) {
    const base = a[key]
    if (isTree(val) && isTree(base)) {
      result[key] = deepMerge(base, val)
    } else if (val !== undefined && val !== null) {
      result[key] = val
    }
  }
  return result
}

/** Load config from a YAML file, merged with defaults */
export function loadConfig(path: string = CONFIG_PATH): RolloutConfig {
  if (!existsSync(path)) {
    return DEFAULT_CONFIG
  }

  let parsed: unknown
  try {
    parsed = parseYaml(readFileSync(path, 'utf-8'))
  } catch (err) {
    throw new ConfigError(`could not parse ${path}: ${errorMessage(err)}`, path, { cause: err })
  }

  // An empty file parses to null
  if (parsed === null || parsed === undefined) return DEFAULT_CONFIG
  if (!isTree(parsed)) {
    throw new ConfigError(`${path} must contain a mapping at the top level`, path)
  }

  const result = rolloutConfigSchema.safeParse(deepMerge(DEFAULT_CONFIG, parsed))
  if (!result.success) {
    const issue = result.error.issues[0]
    const where = issue.path.join('.') || '(root)'
    throw new ConfigError(`invalid value for '${where}' in ${path}: ${issue.message}`, path)
  }
  return result.data
}
