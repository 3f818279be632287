/**
 * Rollout — Config Types
 */

import { z } from 'zod'

const commandList = z.array(z.string().min(1))

export const rolloutConfigSchema = z.object({
  filesystem: z.object({
    type: z.string().min(1),
    master_paths: z.array(z.string().min(1)),
    remote_paths: z.array(z.string().min(1)),
  }),
  install: z.object({
    commands: commandList,
  }),
  service: z.object({
    defaults_file: z.string().min(1),
    restart: commandList,
  }),
  runtime: z.object({
    defaults_file: z.string().min(1),
    restart: commandList,
    registry_port: z.number().int().positive(),
  }),
  ssh: z.object({
    options: z.array(z.string()),
    connect_timeout: z.number().int().positive(),
  }),
  fanout: z.object({
    remote_command: z.string().min(1),
    upload: z.array(z.string().min(1)),
    /** Also copy the running entry script to each remote */
  }),
  // seconds
  timeouts: z.object({
    action: z.number().positive(),
    probe: z.number().positive(),
  }),
})

export type RolloutConfig = z.infer<typeof rolloutConfigSchema>
