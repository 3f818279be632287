/**
 * Rollout — Config Defaults
 */

import type { RolloutConfig } from './types.js'

export const DEFAULT_CONFIG: RolloutConfig = {
  filesystem: {
    type: 'btrfs',
    master_paths: ['/var/lib/docker', '/opt/serviced/var'],
    remote_paths: ['/var/lib/docker'],
  },
  install: {
    commands: [
      'apt-get update',
      'apt-get install -y ntp',
      'apt-get install -y serviced',
    ],
  },
  service: {
    defaults_file: '/etc/default/serviced',
    restart: ['systemctl restart serviced'],
  },
  runtime: {
    defaults_file: '/etc/default/docker',
    restart: ['systemctl restart docker'],
    registry_port: 5000,
  },
  ssh: {
    options: ['-o', 'BatchMode=yes', '-o', 'StrictHostKeyChecking=accept-new'],
    connect_timeout: 10,
  },
  fanout: {
    remote_command: 'rollout',
    upload: [],
  },
  timeouts: {
    action: 1800,
    probe: 30,
  },
}
