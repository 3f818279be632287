#!/usr/bin/env node

/**
 * Rollout — Entry Point
 *
 * Parses arguments → runs the orchestrator → prints the report.
 */

import { hostname, arch } from 'node:os'
import { loadConfig } from './config/loader.js'
import { rolloutHome } from './config/paths.js'
import { loadInventory } from './infra/inventory.js'
import { Logger } from './log/logger.js'
import { runProcess } from './exec/process.js'
import { dnsResolver } from './probe/resolver.js'
import { Orchestrator } from './orchestrator/orchestrator.js'
import { USAGE, wantsHelp } from './orchestrator/invocation.js'
import { exitCode } from './orchestrator/report.js'
import { formatReport, renderMarkdown } from './ui/report.js'

const argv = process.argv.slice(2)

// ── Help ─────────────────────────────────────────────────
if (wantsHelp(argv)) {
  console.log(USAGE)
  process.exit(0)
}

const logger = new Logger(process.stderr)

const orchestrator = new Orchestrator({
  runner: runProcess,
  resolver: dnsResolver,
  logger,
  logFile: rolloutHome('rollout.log'),
  loadConfig: () => loadConfig(),
  loadInventory: () => loadInventory(),
  isPrivileged: () => process.getuid?.() === 0,
  hostname: () => hostname().split('.')[0],
  clock: () => new Date(),
  cwd: process.cwd(),
  platform: `${process.platform} ${arch()}`,
})

const report = await orchestrator.run(argv)

if (report.state === 'usage') {
  console.error(USAGE)
} else {
  const markdown = formatReport(report)
  logger.record(markdown)
  console.log(renderMarkdown(markdown))
}

process.exit(exitCode(report))
