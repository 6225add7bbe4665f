import { describe, expect, it } from '@jest/globals'
import type { PatchStatus, SecurityEvent } from '@gridwarden/types'
import { eventRows, fmtTime, historyRows, renderTable, stripAnsi } from '../format'

const plain = (lines: string[]) => lines.map(stripAnsi)

describe('renderTable', () => {
  it('pads columns to the widest cell', () => {
    expect(plain(renderTable([['A', 'Bee'], ['xx', 'y']]))).toEqual([
      'A   Bee',
      '─────────',
      'xx  y',
    ])
  })

  it('measures coloured cells by their visible width', () => {
    expect(plain(renderTable([['S', 'X'], ['\x1b[31mwarning\x1b[39m', '1']]))).toEqual([
      'S        X',
      '────────────',
      'warning  1',
    ])
  })

  it('prints nothing without data rows', () => {
    expect(renderTable([['Name']])).toEqual([])
  })
})

describe('row builders', () => {
  it('formats timestamps as UTC seconds', () => {
    expect(fmtTime('2026-03-01T12:34:56.789Z')).toBe('2026-03-01 12:34:56')
  })

  it('lists events with their component', () => {
    const event: SecurityEvent = {
      event_id:   'e-1',
      severity:   'critical',
      category:   'rule-violation',
      details:    'Excessive failed logins on battery-01: 9 exceeds limit 5',
      actor:      null,
      context:    { component: 'battery-01' },
      created_at: '2026-03-01T08:00:00.000Z',
      updated_at: '2026-03-01T08:00:00.000Z',
    }
    expect(eventRows([event]).map(r => r.map(stripAnsi))).toEqual([
      ['Time', 'Severity', 'Category', 'Component', 'Details'],
      ['2026-03-01 08:00:00', 'critical', 'rule-violation', 'battery-01', 'Excessive failed logins on battery-01: 9 exceeds limit 5'],
    ])
  })

  it('lists rollout history with reasons', () => {
    const patch: PatchStatus = {
      patch_id:       'p-1',
      component_id:   'c-1',
      component:      'inverter-01',
      target_version: '2.0.0',
      status:         'rejected',
      requested_by:   'ops-1',
      notes:          null,
      checksum:       'abc',
      history: [
        { from: null, to: 'pending', at: '2026-03-01T08:00:00.000Z' },
        { from: 'pending', to: 'verifying', at: '2026-03-01T08:00:01.000Z' },
        { from: 'verifying', to: 'rejected', at: '2026-03-01T08:00:02.000Z', reason: 'bad signature' },
      ],
      created_at:     '2026-03-01T08:00:00.000Z',
      updated_at:     '2026-03-01T08:00:02.000Z',
    }
    expect(historyRows(patch).slice(1).map(r => r.map(stripAnsi))).toEqual([
      ['2026-03-01 08:00:00', '-', 'pending', ''],
      ['2026-03-01 08:00:01', 'pending', 'verifying', ''],
      ['2026-03-01 08:00:02', 'verifying', 'rejected', 'bad signature'],
    ])
  })
})
