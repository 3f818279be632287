import { describe, it, expect } from 'vitest'
import { writeFileSync } from 'node:fs'
import { join } from 'node:path'
import { deepMerge, loadConfig } from '../../src/config/loader.js'
import { DEFAULT_CONFIG } from '../../src/config/defaults.js'
import { ConfigError } from '../../src/errors.js'
import { tempDir } from '../_helpers/fakes.js'

function configFile(text: string): string {
  const path = join(tempDir(), 'config.yaml')
  writeFileSync(path, text)
  return path
}

describe('loadConfig', () => {
  it('uses the defaults when there is no file', () => {
    expect(loadConfig(join(tempDir(), 'absent.yaml'))).toBe(DEFAULT_CONFIG)
  })

  it('uses the defaults for an empty file', () => {
    expect(loadConfig(configFile(''))).toBe(DEFAULT_CONFIG)
  })

  it('merges file values over the defaults', () => {
    const config = loadConfig(configFile([
      'runtime:',
      '  registry_port: 5050',
      'fanout:',
      '  upload: [rollout.tgz]',
      '',
    ].join('\n')))

    expect(config.runtime).toEqual({ ...DEFAULT_CONFIG.runtime, registry_port: 5050 })
    expect(config.fanout.upload).toEqual(['rollout.tgz'])
    expect(config.fanout.remote_command).toBe('rollout')
    expect(config.filesystem).toEqual(DEFAULT_CONFIG.filesystem)
  })

  it('rejects a value of the wrong type, naming the key', () => {
    const path = configFile('timeouts:\n  action: soon\n')
    expect(() => loadConfig(path)).toThrow(ConfigError)
    expect(() => loadConfig(path)).toThrow(`invalid value for 'timeouts.action' in ${path}`)
  })

  it('rejects a file that is not a mapping', () => {
    const path = configFile('- a\n- b\n')
    expect(() => loadConfig(path)).toThrow(`${path} must contain a mapping at the top level`)
  })

  it('rejects unparseable YAML', () => {
    const path = configFile('install: [unclosed\n')
    expect(() => loadConfig(path)).toThrow(`could not parse ${path}`)
  })
})

describe('deepMerge', () => {
  it('merges nested objects and replaces arrays', () => {
    const merged = deepMerge(
      { a: { b: 1, c: [1, 2] }, d: 'x' },
      { a: { c: [3] }, e: true },
    )
    expect(merged).toEqual({ a: { b: 1, c: [3] }, d: 'x', e: true })
  })

  it('ignores null values', () => {
    expect(deepMerge({ a: 1 }, { a: null })).toEqual({ a: 1 })
  })
})
