/**
 * Terminal formatting for the operator CLI. Every function returns strings;
 * the program decides where they go.
 */

import chalk from 'chalk'
import type { ComponentSummary } from '@gridwarden/component-registry'
import type { PatchState, PatchStatus, ReadingSeverity, SecurityEvent } from '@gridwarden/types'

const $ = chalk

// eslint-disable-next-line no-control-regex
const ANSI = /\x1b\[[0-9;]*m/g

export function stripAnsi(text: string): string {
  return text.replace(ANSI, '')
}

function pad(cell: string, width: number): string {
  return cell + ' '.repeat(Math.max(0, width - stripAnsi(cell).length))
}

/** First row is the header. Widths are measured without colour codes. */
export function renderTable(rows: string[][]): string[] {
  const [headers, ...data] = rows
  if (!headers || data.length === 0) return []
  const widths = headers.map((h, i) =>
    Math.max(h.length, ...data.map(r => stripAnsi(r[i] ?? '').length))
  )
  const line = (row: string[]) =>
    headers.map((_, i) => pad(row[i] ?? '', (widths[i] ?? 0) + 2)).join('').trimEnd()

  return [
    $.bold(line(headers)),
    $.gray('─'.repeat(widths.reduce((s, w) => s + w + 2, 0))),
    ...data.map(line),
  ]
}

export function fmtSeverity(severity: ReadingSeverity): string {
  const map: Record<ReadingSeverity, string> = {
    normal:   $.gray('normal'),
    info:     $.blue('info'),
    warning:  $.yellow('warning'),
    critical: $.red.bold('critical'),
  }
  return map[severity]
}

export function fmtPatchState(state: PatchState): string {
  const map: Record<PatchState, string> = {
    pending:   $.yellow('pending'),
    verifying: $.yellow('verifying'),
    applying:  $.blue('applying'),
    succeeded: $.green('succeeded'),
    rejected:  $.red('rejected'),
    failed:    $.red('failed'),
  }
  return map[state]
}

/** ISO timestamp as "YYYY-MM-DD HH:MM:SS" (UTC). */
export function fmtTime(iso: string): string {
  return iso.replace('T', ' ').slice(0, 19)
}

function contextString(event: SecurityEvent, key: string): string {
  const value = event.context[key]
  return typeof value === 'string' ? value : ''
}

export function eventRows(events: SecurityEvent[]): string[][] {
  return [
    ['Time', 'Severity', 'Category', 'Component', 'Details'],
    ...events.map(e => [
      fmtTime(e.created_at),
      fmtSeverity(e.severity),
      e.category,
      contextString(e, 'component'),
      e.details,
    ]),
  ]
}

export function componentRows(components: ComponentSummary[]): string[][] {
  return [
    ['Name', 'Category', 'Firmware', 'Criticality', 'Address', 'Latest patch'],
    ...components.map(c => [
      c.name,
      c.category,
      c.firmware_version,
      c.criticality,
      c.network_address,
      c.latest_patch ? `${c.latest_patch.target_version} ${fmtPatchState(c.latest_patch.status)}` : '-',
    ]),
  ]
}

export function historyRows(patch: PatchStatus): string[][] {
  return [
    ['At', 'From', 'To', 'Reason'],
    ...patch.history.map(h => [
      fmtTime(h.at),
      h.from ?? '-',
      fmtPatchState(h.to),
      h.reason ?? '',
    ]),
  ]
}
