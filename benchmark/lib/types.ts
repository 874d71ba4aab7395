/**
 * Benchmark system type definitions
 */

import type { Bench, Task } from 'tinybench'

export interface BenchmarkConfig {
  /** Time in ms per benchmark (default: 1000) */
  time?: number
  /** Warm every task before measuring (default: true) */
  warmup?: boolean
  /** Matrix sides; each suite falls back to its own list */
  sides?: number[]
  output?: OutputConfig
  /** Substring of the suite name */
  filter?: string
  /** Directory name under benchmark/ */
  category?: string
}

export interface OutputConfig {
  /** Print the per-suite tables (default: true) */
  console?: boolean
  /** Write a JSON report */
  json?: boolean
  /** Directory for the JSON report (default: benchmark/results) */
  jsonPath?: string
}

/**
 * One measured task. Task names end in ` n=<side>` (optionally followed by a
 * qualifier); the side is split out so results can be tabled by `n`.
 */
export interface BenchmarkResult {
  /** Task name without the side */
  operation: string
  /** Matrix side, or null for tasks not tied to one */
  n: number | null
  opsPerSec: number
  /** Mean time per call in nanoseconds */
  meanNs: number
  p99Ns: number
  /** Relative margin of error (percentage) */
  rme: number
  samples: number
}

export interface SuiteResult {
  name: string
  category: string
  benchmarks: BenchmarkResult[]
  /** Wall time of the suite in ms */
  duration: number
}

export interface BenchmarkResults {
  /** ISO timestamp */
  timestamp: string
  platform: PlatformInfo
  suites: SuiteResult[]
  totalDuration: number
}

export interface PlatformInfo {
  os: string
  arch: string
  nodeVersion: string
}

/**
 * What a `*.bench.ts` file exports as `suite`
 */
export interface BenchmarkSuite {
  name: string
  category: string
  run(config: BenchmarkConfig): Promise<Bench>
}

const SIDE_IN_NAME = /^(.*?) n=(\d+)(.*)$/

/**
 * Split a task name such as `lower getElement n=128 (checkBounds off)` into
 * its operation and side
 */
export function parseTaskName(name: string): { operation: string; n: number | null } {
  const match = SIDE_IN_NAME.exec(name)
  if (!match) return { operation: name, n: null }
  return { operation: `${match[1]}${match[3]}`, n: Number(match[2]) }
}

/**
 * Results of a finished tinybench task, or null if it did not run
 */
export function extractTaskResult(task: Task): BenchmarkResult | null {
  const result = task.result
  if (!result) return null

  return {
    ...parseTaskName(task.name),
    opsPerSec: Math.round(result.hz),
    meanNs: result.mean * 1e6, // ms to ns
    p99Ns: result.p99 * 1e6,
    rme: result.rme,
    samples: result.samples.length,
  }
}

export function isBenchmarkSuite(value: unknown): value is BenchmarkSuite {
  return (
    typeof value === 'object' &&
    value !== null &&
    'name' in value &&
    typeof value.name === 'string' &&
    'category' in value &&
    typeof value.category === 'string' &&
    'run' in value &&
    typeof value.run === 'function'
  )
}
