/**
 * Row, Column and Whole-Triangle Traversal Benchmarks
 */

import { LowerTri, SimpleUpperTri, SymmetricLowerTri, SymmetricUpperTri, UpperTri } from '@trimat/core'
import type { BenchmarkSuite, BenchmarkConfig } from '../lib/types.js'
import { createBench, float64Storage, runBench } from '../lib/utils.js'

function sum(values: Iterable<number>): number {
  let acc = 0
  for (const v of values) acc += v
  return acc
}

export const suite: BenchmarkSuite = {
  name: 'Traversal',
  category: 'traversal',

  async run(config: BenchmarkConfig) {
    const bench = createBench(config)

    for (const n of config.sides ?? [64, 512]) {
      const middle = Math.floor(n / 2)

      const lower = new LowerTri(float64Storage(n, true))
      const upper = new UpperTri(float64Storage(n, true))
      const simpleUpper = new SimpleUpperTri(float64Storage(n, false))
      const symLower = new SymmetricLowerTri(float64Storage(n, false))
      const symUpper = new SymmetricUpperTri(float64Storage(n, false))

      // Rows are contiguous in lower storage, columns in neither
      bench.add(`lower row n=${n}`, () => sum(lower.getRow(middle)))
      bench.add(`lower column n=${n}`, () => sum(lower.getCol(middle)))
      bench.add(`upper row n=${n}`, () => sum(upper.getRow(middle)))
      bench.add(`upper column n=${n}`, () => sum(upper.getCol(middle)))
      bench.add(`simple upper column n=${n}`, () => sum(simpleUpper.getCol(middle)))
      bench.add(`symmetric lower row n=${n}`, () => sum(symLower.getRow(middle)))
      bench.add(`symmetric upper row n=${n}`, () => sum(symUpper.getRow(middle)))

      bench.add(`symmetric upper all rows n=${n}`, () => {
        let acc = 0
        for (let i = 0; i < n; i++) acc += sum(symUpper.rowIndices(i))
        return acc
      })

      bench.add(`lower triangleIndices n=${n}`, () => lower.triangleIndices().count())
      bench.add(`symmetric upper entries n=${n}`, () => {
        let acc = 0
        for (const [, value] of symUpper.entries()) acc += value
        return acc
      })
    }

    return runBench(bench, config)
  },
}

export default suite
