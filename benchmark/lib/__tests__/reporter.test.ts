import { describe, it, expect } from 'vitest'
import { slowdowns, tabulate } from '../reporter.js'
import { parseTaskName, type BenchmarkResult } from '../types.js'

function result(operation: string, n: number | null, opsPerSec: number): BenchmarkResult {
  return { operation, n, opsPerSec, meanNs: 1e9 / opsPerSec, p99Ns: 0, rme: 0, samples: 10 }
}

describe('parseTaskName', () => {
  it('splits the side out of the name', () => {
    expect(parseTaskName('base upper elementIndex n=16')).toEqual({ operation: 'base upper elementIndex', n: 16 })
  })

  it('keeps a qualifier that follows the side', () => {
    expect(parseTaskName('lower getElement n=128 (checkBounds off)')).toEqual({
      operation: 'lower getElement (checkBounds off)',
      n: 128,
    })
  })

  it('leaves names without a side whole', () => {
    expect(parseTaskName('wrap storage')).toEqual({ operation: 'wrap storage', n: null })
  })
})

describe('tabulate', () => {
  it('groups results by operation with sides ascending', () => {
    const table = tabulate([
      result('lower getElement', 1024, 500),
      result('upper getElement', 16, 900),
      result('lower getElement', 16, 1000),
    ])

    expect(table.sides).toEqual([16, 1024])
    expect(table.rows.map((row) => row.operation)).toEqual(['lower getElement', 'upper getElement'])
    expect(table.rows[0].cells.get(16)?.opsPerSec).toBe(1000)
    expect(table.rows[0].cells.get(1024)?.opsPerSec).toBe(500)
    expect(table.rows[1].cells.has(1024)).toBe(false)
  })

  it('keeps unsized results out of the columns', () => {
    const table = tabulate([result('wrap storage', null, 42)])

    expect(table.sides).toEqual([])
    expect(table.rows[0].unsized?.opsPerSec).toBe(42)
    expect(table.rows[0].cells.size).toBe(0)
  })
})

describe('slowdowns', () => {
  it('compares the smallest and largest measured side', () => {
    const table = tabulate([
      result('row scan', 16, 1000),
      result('row scan', 128, 700),
      result('row scan', 1024, 400),
      result('lookup', 16, 50),
    ])

    expect(slowdowns(table)).toEqual([{ operation: 'row scan', from: 16, to: 1024, factor: 2.5 }])
  })

  it('skips operations with a zero rate at the largest side', () => {
    const table = tabulate([result('stalled', 16, 10), result('stalled', 64, 0)])
    expect(slowdowns(table)).toEqual([])
  })
})
