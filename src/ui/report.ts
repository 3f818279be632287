/**
 * Rollout — Report Formatting
 *
 * The run report as Markdown, rendered to ANSI-styled terminal output
 * using marked + marked-terminal.
 */

import { Marked } from 'marked'
import { markedTerminal } from 'marked-terminal'
import type { RunReport } from '../orchestrator/report.js'

function cell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\n/g, ' ')
}

/** Markdown summary of a finished run */
export function formatReport(report: RunReport): string {
  const lines: string[] = []
  const role = report.role ?? 'unknown'

  lines.push(`# Rollout report (${role})`)
  lines.push('')
  lines.push(`**State:** ${report.state}  `)
  lines.push(`**Errors:** ${report.totalErrors}`)

  if (report.fatal) {
    lines.push('')
    lines.push(`**Fatal:** ${report.fatal.name}: ${cell(report.fatal.message)}`)
  }

  if (report.phases.length > 0) {
    lines.push('')
    lines.push('| Phase | Errors |')
    lines.push('| --- | ---: |')
    for (const phase of report.phases) {
      lines.push(`| ${phase.summary} | ${phase.errors} |`)
    }
  }

  if (report.hosts.length > 0) {
    lines.push('')
    lines.push('| Host | Role | Status | Errors | Last error |')
    lines.push('| --- | --- | --- | ---: | --- |')
    for (const host of report.hosts) {
      lines.push(`| ${host.name} | ${host.role} | ${host.status} | ${host.errors} | ${cell(host.lastError ?? '')} |`)
    }
  }

  return lines.join('\n')
}

const marked = new Marked(
  markedTerminal({
    showSectionPrefix: false,
    reflowText: false,
    width: (process.stdout.columns || 80) - 4,
    tab: 2,
  }),
)

/**
 * Render markdown text to ANSI-styled terminal string.
 * Returns the original text if parsing fails.
 */
export function renderMarkdown(text: string): string {
  let rendered: string | Promise<string>
  try {
    rendered = marked.parse(text, { async: false })
  } catch {
    return text
  }
  if (typeof rendered !== 'string') return text
  // marked-terminal may add trailing newlines; trim to one
  return rendered.replace(/\n{3,}/g, '\n\n').trimEnd()
}
