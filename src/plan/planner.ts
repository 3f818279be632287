/**
 * Rollout — Planner
 *
 * Turns a role into the ordered phases the orchestrator runs.
 *
 *   master: resolve → filesystem → ssh → fanout → install → configure
 *   remote: resolve → filesystem → install → configure
 */

import type { RolloutConfig } from '../config/types.js'
import type { Action, ActionName, Phase, Plan, Role } from './types.js'

function action(name: ActionName, host: string, path?: string): Action {
  return path === undefined ? { name, host, outcome: 'pending' } : { name, host, path, outcome: 'pending' }
}

export class RolloutPlanner {
  constructor(private readonly config: RolloutConfig) {}

  plan(role: Role, master: string, remotes: readonly string[], localHost: string): Plan {
    const uniqueRemotes = [...new Set(remotes)].filter((host) => host !== master)
    const allHosts = [master, ...uniqueRemotes]
    const { filesystem } = this.config

    const resolve: Phase = {
      id: 'resolve',
      stage: 'checking',
      title: `Checking that hosts are resolvable: ${allHosts.join(' ')}`,
      summary: 'checked that hosts are resolvable',
      fatal: 'failed to satisfy resolvable hosts prereq',
      parallel: false,
      actions: allHosts.map((host) => action('checkResolvable', host)),
    }

    const paths = role === 'master' ? filesystem.master_paths : filesystem.remote_paths
    const filesystems: Phase = {
      id: 'filesystem',
      stage: 'checking',
      title: `Checking ${filesystem.type} filesystems`,
      summary: 'checked filesystems',
      fatal: 'failed to satisfy filesystem prereq',
      parallel: false,
      actions: paths.map((path) => action('checkFilesystem', localHost, path)),
    }

    const install: Phase = {
      id: 'install',
      stage: 'installing',
      title: 'Installing software',
      summary: 'installed software',
      parallel: false,
      actions: [action('install', localHost)],
    }

    const configure: Phase = {
      id: 'configure',
      stage: 'configuring',
      title: `Configuring ${role}`,
      summary: `configured ${role}`,
      parallel: false,
      actions: [action('configure', localHost)],
    }

    if (role === 'remote') {
      return { role, master, remotes: uniqueRemotes, localHost, phases: [resolve, filesystems, install, configure] }
    }

    const ssh: Phase = {
      id: 'ssh',
      stage: 'checking',
      title: `Checking that hosts have passwordless ssh: ${allHosts.join(' ')}`,
      summary: 'checked that hosts have passwordless ssh',
      fatal: 'failed to satisfy passwordless ssh prereq',
      parallel: false,
      actions: allHosts.map((host) => action('checkSsh', host)),
    }

    const fanout: Phase = {
      id: 'fanout',
      stage: 'installing',
      title: `Installing remotes with master: ${master} and remotes: ${uniqueRemotes.join(' ')}`,
      summary: 'installed remotes',
      parallel: true,
      actions: uniqueRemotes.map((host) => action('install', host)),
    }

    return { role, master, remotes: uniqueRemotes, localHost, phases: [resolve, filesystems, ssh, fanout, install, configure] }
  }
}
