/**
 * Rollout — Paths
 *
 * Everything the tool writes lives under the invoking user's home:
 *
 *   rolloutHome()                 → ~/rollout
 *   rolloutHome('rollout.log')    → ~/rollout/rollout.log
 *   rolloutHome('config.yaml')    → ~/rollout/config.yaml
 */

import { join } from 'node:path'
import { homedir } from 'node:os'

export function rolloutHome(...segments: string[]): string {
  const base = join(process.env.HOME || homedir(), 'rollout')
  return segments.length ? join(base, ...segments) : base
}
