/**
 * Benchmark utility functions
 */

import { Bench } from 'tinybench'
import { PackedArray, packedSize } from '@trimat/core'
import type { BenchmarkConfig } from './types.js'

/**
 * Format a duration given in nanoseconds
 */
export function formatTime(ns: number): string {
  if (ns < 1000) return `${ns.toFixed(1)}ns`
  if (ns < 1e6) return `${(ns / 1000).toFixed(1)}μs`
  return `${(ns / 1e6).toFixed(2)}ms`
}

/**
 * Format ops/sec for display
 */
export function formatOps(ops: number): string {
  if (ops >= 1000000) {
    return `${(ops / 1000000).toFixed(2)}M`
  }
  if (ops >= 1000) {
    return `${(ops / 1000).toFixed(2)}K`
  }
  return ops.toFixed(0)
}

/**
 * Pad string to width
 */
export function pad(str: string, width: number, align: 'left' | 'right' = 'left'): string {
  if (str.length >= width) return str
  const padding = ' '.repeat(width - str.length)
  return align === 'left' ? str + padding : padding + str
}

/**
 * Matrix sides, from a handful of rows to a few thousand
 */
export const STANDARD_SIDES = [16, 128, 1024, 4096]

/**
 * `"64,512"` to `[64, 512]`
 */
export function parseSides(value: string): number[] {
  const sides = value.split(',').map((part) => Number(part.trim()))
  const bad = sides.find((n) => !Number.isInteger(n) || n < 1)
  if (bad !== undefined) {
    throw new Error(`--sides expects positive integers, got ${value}`)
  }
  return sides
}

/**
 * A `Bench` configured from the CLI options
 */
export function createBench(config: BenchmarkConfig): Bench {
  return new Bench({ time: config.time ?? 1000 })
}

/**
 * Warm up (unless disabled), then measure every task
 */
export async function runBench(bench: Bench, config: BenchmarkConfig): Promise<Bench> {
  if (config.warmup ?? true) {
    await bench.warmup()
  }
  await bench.run()
  return bench
}

/**
 * Packed `Float64Array` storage for a side `n`
 */
export function float64Storage(n: number, diagonal: boolean): PackedArray<number> {
  const size = packedSize(n, diagonal)
  const data = new Float64Array(size)
  for (let k = 0; k < size; k++) data[k] = k
  return PackedArray.wrap(n, data)
}

/**
 * Deterministic coordinate stream so every run reads the same cells
 */
export function coordinateCycle(n: number, count: number): Array<[number, number]> {
  const pairs: Array<[number, number]> = []
  let seed = 17
  // Park-Miller minimal standard generator
  const next = (): number => {
    seed = (seed * 48271) % 2147483647
    return seed % n
  }
  for (let k = 0; k < count; k++) {
    pairs.push([next(), next()])
  }
  return pairs
}
