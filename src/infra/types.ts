/**
 * Rollout — Inventory Types
 */

import { z } from 'zod'

export const inventoryHostSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().positive().optional(),
  user: z.string().min(1).optional(),
  key: z.string().min(1).optional(),
})

/** Raw shape of ~/rollout/hosts.yaml */
export const inventoryFileSchema = z.object({
  hosts: z.record(z.string(), inventoryHostSchema).optional(),
})

export type InventoryHost = z.infer<typeof inventoryHostSchema>

/** How to reach a host over SSH */
export type SshTarget = {
  name: string
  address: string
  port?: number
  user?: string
  key?: string
}

export type Inventory = {
  hosts: Map<string, InventoryHost>
}
