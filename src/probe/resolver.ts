/**
 * Rollout — Name Resolution
 */

import { lookup } from 'node:dns/promises'

/**
 * Resolves a host name to an IPv4 address, or null when it has none. Any
 * other lookup failure is thrown; callers count it as unresolvable.
 */
export type Resolver = (host: string) => Promise<string | null>

const NOT_FOUND = new Set(['ENOTFOUND', 'EAI_NONAME', 'EAI_NODATA', 'EAI_AGAIN', 'ENODATA'])

function errorCode(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null || !('code' in err)) return undefined
  return typeof err.code === 'string' ? err.code : undefined
}

export const dnsResolver: Resolver = async (host) => {
  try {
    const { address } = await lookup(host, { family: 4 })
    return address
  } catch (err) {
    const code = errorCode(err)
    if (code !== undefined && NOT_FOUND.has(code)) return null
    throw err
  }
}
