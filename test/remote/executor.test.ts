import { describe, it, expect } from 'vitest'
import { RemoteExecutor } from '../../src/remote/executor.js'
import { emptyInventory } from '../../src/infra/inventory.js'
import type { Inventory } from '../../src/infra/types.js'
import { DEFAULT_CONFIG } from '../../src/config/defaults.js'
import { fakeRunner } from '../_helpers/fakes.js'
import type { Responder } from '../_helpers/fakes.js'

const SSH_OPTIONS = ['-o', 'BatchMode=yes', '-o', 'StrictHostKeyChecking=accept-new', '-o', 'ConnectTimeout=10']

function inventoryWithKeyedHost(): Inventory {
  const inventory = emptyInventory()
  inventory.hosts.set('r1', { host: '10.0.0.5', port: 2222, user: 'ops', key: '/keys/id_ed25519' })
  return inventory
}

function executor(respond?: Responder, inventory: Inventory = emptyInventory()) {
  const fake = fakeRunner(respond)
  return { ...fake, remote: new RemoteExecutor(fake.runner, inventory, DEFAULT_CONFIG.ssh, 1800) }
}

describe('RemoteExecutor argv', () => {
  it('builds a plain ssh call for hosts outside the inventory', () => {
    const { remote } = executor()
    expect(remote.sshArgv('r2', 'id')).toEqual(['ssh', ...SSH_OPTIONS, 'r2', 'id'])
  })

  it('applies inventory address, port, user and key', () => {
    const { remote } = executor(undefined, inventoryWithKeyedHost())
    expect(remote.sshArgv('r1', 'id')).toEqual([
      'ssh', ...SSH_OPTIONS, '-i', '/keys/id_ed25519', '-p', '2222', 'ops@10.0.0.5', 'id',
    ])
    expect(remote.scpArgv('r1', '/tmp/bundle.tgz')).toEqual([
      'scp', ...SSH_OPTIONS, '-i', '/keys/id_ed25519', '-P', '2222', '/tmp/bundle.tgz', 'ops@10.0.0.5:',
    ])
  })
})

describe('RemoteExecutor.execute', () => {
  it('returns output of a successful command', async () => {
    const { remote, calls } = executor(() => ({ stdout: 'uid=0(root)' }))
    const result = await remote.execute('r1', 'id')
    expect(result).toEqual({ ok: true, exitCode: 0, stdout: 'uid=0(root)', stderr: '' })
    expect(calls[0].options).toEqual({ timeoutMs: 1_800_000, detached: false })
  })

  it('honours a per-call timeout', async () => {
    const { remote, calls } = executor()
    await remote.execute('r1', 'id', { timeoutSec: 5 })
    expect(calls[0].options.timeoutMs).toBe(5000)
  })

  it('reports authentication failures', async () => {
    const { remote } = executor(() => ({ exitCode: 255, stderr: 'root@r1: Permission denied (publickey).' }))
    const result = await remote.execute('r1', 'id')
    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.failure).toBe('auth')
    expect(result.error).toBe("authentication failed for 'id' on r1: root@r1: Permission denied (publickey).")
  })

  it('reports connection failures, including silent ones', async () => {
    const refused = executor(() => ({ exitCode: 255, stderr: 'ssh: connect to host r1 port 22: Connection refused' }))
    const silent = executor(() => ({ exitCode: 255 }))

    const a = await refused.remote.execute('r1', 'id')
    const b = await silent.remote.execute('r1', 'id')
    expect(a.ok ? null : a.failure).toBe('connection')
    expect(b.ok ? null : b.failure).toBe('connection')
  })

  it('reports a non-zero exit of the command itself', async () => {
    const { remote } = executor(() => ({ exitCode: 3 }))
    const result = await remote.execute('r1', 'false')
    expect(result).toEqual({
      ok: false,
      failure: 'exit',
      exitCode: 3,
      stdout: '',
      stderr: '',
      error: "'false' on r1 exited with 3",
    })
  })

  it('reports timeouts', async () => {
    const { remote } = executor(() => ({ exitCode: null, timedOut: true }))
    const result = await remote.execute('r1', 'sleep 100', { timeoutSec: 2 })
    expect(result.ok ? null : result.error).toBe("'sleep 100' on r1 timed out after 2s")
  })

  it('reports a missing ssh client', async () => {
    const { remote } = executor(() => ({ exitCode: null, spawnError: 'spawn ssh ENOENT' }))
    const result = await remote.execute('r1', 'id')
    expect(result.ok ? null : result.failure).toBe('spawn')
  })

  it('starts background commands detached and hands back a task', async () => {
    const { remote, calls } = executor(() => ({ stdout: 'done' }))
    const task = remote.execute('r1', 'rollout remote m r1', { background: true })

    expect(task.host).toBe('r1')
    expect(task.command).toBe('rollout remote m r1')
    expect(calls[0].options.detached).toBe(true)
    await expect(task.result).resolves.toEqual({ ok: true, exitCode: 0, stdout: 'done', stderr: '' })
  })

  it('settles a background task with a failure when the runner rejects', async () => {
    const remote = new RemoteExecutor(() => Promise.reject(new Error('boom')), emptyInventory(), DEFAULT_CONFIG.ssh, 10)
    const task = remote.execute('r1', 'id', { background: true })
    const result = await task.result
    expect(result.ok ? null : result.error).toBe("ssh could not be started for 'id' on r1: boom")
  })
})

describe('RemoteExecutor.upload', () => {
  it('classifies scp transport errors by their message', async () => {
    const { remote } = executor(() => ({ exitCode: 1, stderr: 'ssh: Could not resolve hostname r9: Name or service not known' }))
    const result = await remote.upload('r9', '/tmp/bundle.tgz')
    expect(result.ok ? null : result.failure).toBe('connection')
  })

  it('treats other scp failures as a plain exit', async () => {
    const { remote } = executor(() => ({ exitCode: 1, stderr: 'scp: /tmp/bundle.tgz: No such file or directory' }))
    const result = await remote.upload('r1', '/tmp/bundle.tgz')
    expect(result.ok ? null : result.error).toBe('copying /tmp/bundle.tgz to r1 exited with 1: scp: /tmp/bundle.tgz: No such file or directory')
  })
})
