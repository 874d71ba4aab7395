/**
 * Benchmark result reporter
 *
 * Prints one table per suite, operations down and matrix sides across, so a
 * lookup that should not depend on `n` reads as a flat row. Optionally writes
 * the whole run as JSON.
 */

import { writeFileSync, mkdirSync } from 'node:fs'
import { join } from 'node:path'
import type { BenchmarkResult, BenchmarkResults, OutputConfig, SuiteResult } from './types.js'
import { formatOps, formatTime, pad } from './utils.js'

const OPERATION_WIDTH = 48
const CELL_WIDTH = 11

export interface SuiteTable {
  /** Column sides, ascending; tasks without a side are not columns */
  sides: number[]
  rows: Array<{ operation: string; cells: Map<number, BenchmarkResult>; unsized?: BenchmarkResult }>
}

/**
 * Arrange results by operation (first-seen order) and side
 */
export function tabulate(results: readonly BenchmarkResult[]): SuiteTable {
  const sides = new Set<number>()
  const rows = new Map<string, SuiteTable['rows'][number]>()

  for (const result of results) {
    let row = rows.get(result.operation)
    if (!row) {
      row = { operation: result.operation, cells: new Map() }
      rows.set(result.operation, row)
    }
    if (result.n === null) {
      row.unsized = result
    } else {
      sides.add(result.n)
      row.cells.set(result.n, result)
    }
  }

  return { sides: [...sides].sort((a, b) => a - b), rows: [...rows.values()] }
}

/**
 * Throughput at the smallest side over throughput at the largest, per
 * operation measured at two or more sides
 */
export function slowdowns(table: SuiteTable): Array<{ operation: string; from: number; to: number; factor: number }> {
  const out: Array<{ operation: string; from: number; to: number; factor: number }> = []
  for (const row of table.rows) {
    const measured = table.sides.filter((n) => row.cells.has(n))
    if (measured.length < 2) continue
    const from = measured[0]
    const to = measured[measured.length - 1]
    const small = row.cells.get(from)
    const large = row.cells.get(to)
    if (!small || !large || large.opsPerSec === 0) continue
    out.push({ operation: row.operation, from, to, factor: small.opsPerSec / large.opsPerSec })
  }
  return out
}

export class Reporter {
  private startTime = 0

  constructor(private config: OutputConfig = {}) {}

  private get printing(): boolean {
    return this.config.console !== false
  }

  start(numSuites: number): void {
    this.startTime = Date.now()
    if (this.printing) {
      console.log('')
      console.log(`trimat benchmarks (${numSuites} suite${numSuites === 1 ? '' : 's'})`)
      console.log('')
    }
  }

  suiteStart(name: string, category: string): void {
    if (this.printing) {
      console.log(`[${category}] ${name}`)
    }
  }

  suiteEnd(result: SuiteResult): void {
    if (!this.printing) return

    const table = tabulate(result.benchmarks)
    const header = table.sides.map((n) => pad(`n=${n}`, CELL_WIDTH, 'right')).join('')
    console.log(`  ${pad('ops/sec', OPERATION_WIDTH)}${header}`)

    for (const row of table.rows) {
      const cells = table.sides
        .map((n) => {
          const cell = row.cells.get(n)
          return pad(cell ? formatOps(cell.opsPerSec) : '-', CELL_WIDTH, 'right')
        })
        .join('')
      const unsized = row.unsized ? `  ${formatOps(row.unsized.opsPerSec)} (${formatTime(row.unsized.meanNs)})` : ''
      console.log(`  ${pad(row.operation, OPERATION_WIDTH)}${cells}${unsized}`)
    }
    console.log(`  (${(result.duration / 1000).toFixed(1)}s)`)
    console.log('')
  }

  finish(results: BenchmarkResults): void {
    if (this.printing) {
      this.printScaling(results)
      console.log(`Total time: ${((Date.now() - this.startTime) / 1000).toFixed(1)}s`)
    }
    if (this.config.json) {
      this.writeJson(results)
    }
  }

  /**
   * Operations that lose more than a quarter of their throughput between the
   * smallest and largest side
   */
  private printScaling(results: BenchmarkResults): void {
    const flagged = results.suites
      .flatMap((suite) => slowdowns(tabulate(suite.benchmarks)))
      .filter((s) => s.factor > 1.25)

    if (flagged.length === 0) return
    console.log('Slower at larger n')
    for (const s of flagged) {
      console.log(`  ${pad(s.operation, OPERATION_WIDTH)} x${s.factor.toFixed(1)} from n=${s.from} to n=${s.to}`)
    }
    console.log('')
  }

  private writeJson(results: BenchmarkResults): void {
    const outputDir = this.config.jsonPath ?? join('benchmark', 'results')
    mkdirSync(outputDir, { recursive: true })

    const filepath = join(outputDir, `benchmark-${results.timestamp.replace(/[:.]/g, '-')}.json`)
    writeFileSync(filepath, JSON.stringify(results, null, 2))
    console.log(`Results written to: ${filepath}`)
  }
}
