/**
 * Rollout — Defaults File Editor
 *
 * Reads and writes KEY=value files such as /etc/default/serviced, where
 * most settings ship commented out. Changes are expressed as typed patches;
 * every edit copies the original to a timestamped backup before writing.
 */

import { readFileSync, writeFileSync, copyFileSync, existsSync } from 'node:fs'

// ── Model ───────────────────────────────────────────────────────────────────

export type DefaultsLine =
  | { kind: 'assignment'; key: string; value: string; raw: string }
  | { kind: 'commented'; key: string; value: string; raw: string }
  | { kind: 'other'; raw: string }

export type DefaultsFile = {
  lines: DefaultsLine[]
  trailingNewline: boolean
}

export type ConfigPatch =
  /** Set KEY=value, uncommenting the first commented KEY if there is no active one */
  | { op: 'set'; key: string; value: string }
  /** Uncomment KEY and keep its shipped value */
  | { op: 'enable'; key: string }
  /** Uncomment every line whose value mentions $variable */
  | { op: 'enableReferencing'; variable: string }

export type PatchResult = {
  file: DefaultsFile
  /** Keys that were written or uncommented, in order */
  changed: string[]
  /** `enable` patches with nothing to uncomment */
  missing: string[]
}

export type EditResult = {
  backupPath: string
  changed: string[]
  missing: string[]
}

const ASSIGNMENT = /^\s*([A-Za-z_][A-Za-z0-9_]*)=(.*)$/
const COMMENTED = /^\s*#+\s*([A-Za-z_][A-Za-z0-9_]*)=(.*)$/

// ── Parse / serialize ───────────────────────────────────────────────────────

export function parseDefaults(text: string): DefaultsFile {
  const trailingNewline = text.endsWith('\n')
  const body = trailingNewline ? text.slice(0, -1) : text
  const lines = body === '' ? [] : body.split('\n').map(parseLine)
  return { lines, trailingNewline }
}

function parseLine(raw: string): DefaultsLine {
  const active = ASSIGNMENT.exec(raw)
  if (active) return { kind: 'assignment', key: active[1], value: active[2], raw }

  const commented = COMMENTED.exec(raw)
  if (commented) return { kind: 'commented', key: commented[1], value: commented[2], raw }

  return { kind: 'other', raw }
}

export function serializeDefaults(file: DefaultsFile): string {
  const text = file.lines.map((line) => line.raw).join('\n')
  return file.trailingNewline || file.lines.length === 0 ? `${text}\n` : text
}

// ── Patching ────────────────────────────────────────────────────────────────

function assignment(key: string, value: string): DefaultsLine {
  return { kind: 'assignment', key, value, raw: `${key}=${value}` }
}

function references(value: string, variable: string): boolean {
  return new RegExp(`\\$(\\{${variable}\\}|${variable}(?![A-Za-z0-9_]))`).test(value)
}

/** Apply patches in order. Pure: the input is not modified. */
export function applyPatches(file: DefaultsFile, patches: readonly ConfigPatch[]): PatchResult {
  const lines = [...file.lines]
  const changed: string[] = []
  const missing: string[] = []

  const find = (kind: 'assignment' | 'commented', key: string) =>
    lines.findIndex((line) => line.kind === kind && line.key === key)

  for (const patch of patches) {
    switch (patch.op) {
      case 'set': {
        const active = find('assignment', patch.key)
        const index = active !== -1 ? active : find('commented', patch.key)
        if (index === -1) {
          lines.push(assignment(patch.key, patch.value))
        } else {
          lines[index] = assignment(patch.key, patch.value)
        }
        changed.push(patch.key)
        break
      }
      case 'enable': {
        if (find('assignment', patch.key) !== -1) break
        const index = find('commented', patch.key)
        const line = lines[index]
        if (index === -1 || line.kind !== 'commented') {
          missing.push(patch.key)
          break
        }
        lines[index] = assignment(line.key, line.value)
        changed.push(patch.key)
        break
      }
      case 'enableReferencing': {
        lines.forEach((line, index) => {
          if (line.kind === 'commented' && references(line.value, patch.variable)) {
            lines[index] = assignment(line.key, line.value)
            changed.push(line.key)
          }
        })
        break
      }
    }
  }

  return { file: { ...file, lines }, changed, missing }
}

// ── Files ───────────────────────────────────────────────────────────────────

/** Backup suffix, e.g. 20241019-142501-UTC */
export function backupStamp(now: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0')
  const date = `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}`
  const time = `${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}`
  return `${date}-${time}-UTC`
}

function freeBackupPath(path: string, stamp: string): string {
  let candidate = `${path}.${stamp}`
  for (let n = 1; existsSync(candidate); n++) {
    candidate = `${path}.${stamp}.${n}`
  }
  return candidate
}

/**
 * Back up `path` once, then rewrite it with `patches` applied.
 * Throws if the file does not exist.
 */
export function editDefaultsFile(path: string, patches: readonly ConfigPatch[], now: Date = new Date()): EditResult {
  if (!existsSync(path)) {
    throw new Error(`config file not found: ${path}`)
  }

  const original = readFileSync(path, 'utf-8')
  const result = applyPatches(parseDefaults(original), patches)

  const backupPath = freeBackupPath(path, backupStamp(now))
  copyFileSync(path, backupPath)
  writeFileSync(path, serializeDefaults(result.file), 'utf-8')

  return { backupPath, changed: result.changed, missing: result.missing }
}
