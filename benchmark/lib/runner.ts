/**
 * Benchmark runner
 *
 * Suites live one directory below the benchmark root; the directory is the
 * category and each `*.bench.ts` exports a `suite`.
 */

import { join } from 'node:path'
import { readdirSync } from 'node:fs'
import { pathToFileURL } from 'node:url'
import { Logger } from '@trimat/core'
import type { BenchmarkConfig, BenchmarkResult, BenchmarkResults, BenchmarkSuite, SuiteResult } from './types.js'
import { extractTaskResult, isBenchmarkSuite } from './types.js'
import { Reporter } from './reporter.js'

const log = Logger.child('[bench]')

/** Directories under the benchmark root that hold no suites */
const NON_SUITE_DIRS = new Set(['lib', 'results'])

/**
 * `*.bench.ts` paths under `baseDir`, by category then file name
 */
export function findSuiteFiles(baseDir: string): Array<{ category: string; path: string }> {
  return readdirSync(baseDir, { withFileTypes: true })
    .filter((entry) => entry.isDirectory() && !NON_SUITE_DIRS.has(entry.name))
    .map((entry) => entry.name)
    .sort()
    .flatMap((category) =>
      readdirSync(join(baseDir, category))
        .filter((file) => file.endsWith('.bench.ts'))
        .sort()
        .map((file) => ({ category, path: join(baseDir, category, file) })),
    )
}

/**
 * Whether `suite` passes the `--category` and `--filter` options
 */
export function selects(config: BenchmarkConfig, suite: BenchmarkSuite): boolean {
  if (config.category && suite.category !== config.category) return false
  return !config.filter || suite.name.toLowerCase().includes(config.filter.toLowerCase())
}

export class BenchmarkRunner {
  private suites: BenchmarkSuite[] = []
  private reporter: Reporter

  constructor(private config: BenchmarkConfig = {}) {
    this.reporter = new Reporter(config.output)
  }

  /**
   * Import every suite file; a file that fails to load is logged and skipped
   */
  async discover(baseDir: string): Promise<void> {
    for (const { path } of findSuiteFiles(baseDir)) {
      try {
        const module: unknown = await import(pathToFileURL(path).href)
        const suite = typeof module === 'object' && module !== null && 'suite' in module ? module.suite : undefined
        if (isBenchmarkSuite(suite)) {
          this.suites.push(suite)
        } else {
          log.warn(`${path} exports no suite`)
        }
      } catch (err) {
        log.error(`failed to load ${path}`, err)
      }
    }
  }

  addSuite(suite: BenchmarkSuite): void {
    this.suites.push(suite)
  }

  async run(): Promise<BenchmarkResults> {
    const started = Date.now()
    const selected = this.suites.filter((suite) => selects(this.config, suite))
    const suites: SuiteResult[] = []

    this.reporter.start(selected.length)

    for (const suite of selected) {
      this.reporter.suiteStart(suite.name, suite.category)

      const suiteStart = Date.now()
      const bench = await suite.run(this.config)
      const result: SuiteResult = {
        name: suite.name,
        category: suite.category,
        benchmarks: bench.tasks.map(extractTaskResult).filter((r): r is BenchmarkResult => r !== null),
        duration: Date.now() - suiteStart,
      }

      suites.push(result)
      this.reporter.suiteEnd(result)
    }

    const results: BenchmarkResults = {
      timestamp: new Date(started).toISOString(),
      platform: { os: process.platform, arch: process.arch, nodeVersion: process.version },
      suites,
      totalDuration: Date.now() - started,
    }
    this.reporter.finish(results)
    return results
  }
}
