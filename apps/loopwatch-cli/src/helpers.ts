/**
 * CLI helpers: output formatting and flag parsing.
 */

import chalk from 'chalk'
import {
  ALL_SCENARIOS,
  type CompletionStatus,
  type DetectionVerdict,
  type EvaluationReport,
  type ScenarioKind,
} from '@loopwatch/types'
import { toPct } from '@loopwatch/analyzer'
import type { ScenarioSummary } from '@loopwatch/harness-core'

const $ = chalk

export const ok   = (msg: string) => console.log($.green('✓'), msg)
export const warn = (msg: string) => console.log($.yellow('⚠'), msg)
export const err  = (msg: string) => console.error($.red('✗'), msg)

export const EXIT = {
  OK:         0,
  RUN_FAILED: 1,
  FATAL:      2,
} as const

// ─── Table ────────────────────────────────────────────────────────────────────

const ANSI = /\x1b\[[0-9;]*m/g

export function visibleLength(s: string): number {
  return s.replace(ANSI, '').length
}

/** Header, rule, rows. Columns padded to the widest visible cell plus two. */
export function renderTable(rows: string[][]): string[] {
  if (rows.length < 2) return []
  const headers = rows[0]
  const data    = rows.slice(1)
  const widths  = headers.map((h, i) =>
    Math.max(visibleLength(h), ...data.map(r => visibleLength(r[i] ?? '')))
  )
  const line = (row: string[]) =>
    row.map((cell, i) => cell + ' '.repeat(Math.max(0, widths[i] + 2 - visibleLength(cell)))).join('').trimEnd()
  return [
    line(headers),
    '─'.repeat(widths.reduce((s, w) => s + w + 2, 0)),
    ...data.map(line),
  ]
}

export function table(rows: string[][]): void {
  const [header, rule, ...body] = renderTable(rows)
  if (header === undefined) return
  console.log($.bold(header))
  console.log($.gray(rule))
  body.forEach(row => console.log(row))
}

// ─── Formatting ───────────────────────────────────────────────────────────────

export function fmtMs(ms: number | null): string {
  if (ms === null) return '—'
  return ms >= 1000 ? `${(ms / 1000).toFixed(1)}s` : `${Math.round(ms)}ms`
}

export function fmtStatus(status: CompletionStatus): string {
  const map: Record<CompletionStatus, string> = {
    COMPLETED: $.green('COMPLETED'),
    TIMED_OUT: $.yellow('TIMED_OUT'),
    FAILED:    $.red('FAILED'),
  }
  return map[status]
}

export function fmtVerdict(verdict: DetectionVerdict): string {
  return verdict === 'TRUE_POSITIVE' || verdict === 'TRUE_NEGATIVE'
    ? $.green(verdict)
    : $.red(verdict)
}

export function summaryRows(summary: readonly ScenarioSummary[]): string[][] {
  return [
    ['Scenario', 'Runs', 'Agent OK', 'Agent failed', 'Timed out', 'Avg duration', 'Avg steps'],
    ...summary.map(s => [
      s.scenario,
      String(s.total),
      String(s.successes),
      String(s.failures),
      String(s.timed_out),
      fmtMs(s.avg_duration_ms),
      s.avg_steps.toFixed(1),
    ]),
  ]
}

export function printReport(report: EvaluationReport): void {
  const mark = (met: boolean) => (met ? $.green('met') : $.red('not met'))
  const { protocol } = report

  console.log()
  console.log($.bold.cyan(`  Evaluation (${protocol.mode.toLowerCase()})`))
  console.log($.cyan('  ─────────────────────────────────────'))
  console.log(`  Accuracy:  ${report.correct}/${report.total} = ${report.accuracy_pct}%  ` +
              `(target ≥ ${toPct(protocol.accuracy_target)}%: ${mark(report.accuracy_target_met)})`)
  console.log(`  Latency:   max ${fmtMs(report.max_detection_latency_ms)}, mean ${fmtMs(report.mean_detection_latency_ms)}  ` +
              `(target < ${fmtMs(protocol.latency_target_ms)}: ${mark(report.latency_target_met)})`)
  if (!report.sufficient_runs) {
    console.log(`  ${$.yellow(`Fewer than ${protocol.min_runs_per_scenario} run(s) for some scenario`)}`)
  }
  console.log()

  const scenarios = ALL_SCENARIOS.filter(s => report.per_scenario[s] !== undefined)
  if (scenarios.length > 0) {
    table([
      ['Truth', 'Runs', 'Correct', 'Accuracy', ...ALL_SCENARIOS.map(s => `→ ${s}`)],
      ...scenarios.map(s => [
        s,
        String(report.per_scenario[s]?.total ?? 0),
        String(report.per_scenario[s]?.correct ?? 0),
        `${report.per_scenario[s]?.accuracy_pct ?? 0}%`,
        ...ALL_SCENARIOS.map(p => String(report.confusion[s][p])),
      ]),
    ])
    console.log()
  }
}

// ─── Flag parsing ─────────────────────────────────────────────────────────────

export const SCENARIO_CHOICES = ['normal', 'infinite_loop', 'retry_storm', 'all'] as const

/** 'all' → every scenario; otherwise the one named (case-insensitive). */
export function parseScenarioChoice(choice: string): ScenarioKind[] | null {
  const v = choice.trim().toUpperCase()
  if (v === 'ALL') return [...ALL_SCENARIOS]
  const match = ALL_SCENARIOS.find(s => s === v)
  return match ? [match] : null
}
