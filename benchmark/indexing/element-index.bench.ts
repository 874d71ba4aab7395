/**
 * Element Lookup Benchmarks
 *
 * Random-access getElement through each shape, plus the raw base formulas.
 */

import {
  LowerIndexing,
  LowerTri,
  SimpleLowerTri,
  SimpleUpperTri,
  SymmetricLowerTri,
  SymmetricUpperTri,
  UpperIndexing,
  UpperTri,
  trimat,
} from '@trimat/core'
import type { BenchmarkSuite, BenchmarkConfig } from '../lib/types.js'
import { STANDARD_SIDES, coordinateCycle, createBench, float64Storage, runBench } from '../lib/utils.js'

const LOOKUPS = 256

export const suite: BenchmarkSuite = {
  name: 'Element Lookup',
  category: 'indexing',

  async run(config: BenchmarkConfig) {
    const bench = createBench(config)

    for (const n of config.sides ?? STANDARD_SIDES) {
      const lookups = coordinateCycle(n, LOOKUPS)
      const below = lookups.map(([a, b]): [number, number] => [Math.max(a, b), Math.min(a, b)])
      const strictlyBelow = below.filter(([i, j]) => i !== j)
      const above = below.map(([i, j]): [number, number] => [j, i])
      const strictlyAbove = strictlyBelow.map(([i, j]): [number, number] => [j, i])

      const lower = new LowerTri(float64Storage(n, true))
      const upper = new UpperTri(float64Storage(n, true))
      const simpleLower = new SimpleLowerTri(float64Storage(n, false))
      const simpleUpper = new SimpleUpperTri(float64Storage(n, false))
      const symLower = new SymmetricLowerTri(float64Storage(n, false))
      const symUpper = new SymmetricUpperTri(float64Storage(n, false))

      bench.add(`lower getElement n=${n}`, () => {
        let acc = 0
        for (const [i, j] of below) acc += lower.getElement(i, j)
        return acc
      })

      bench.add(`upper getElement n=${n}`, () => {
        let acc = 0
        for (const [i, j] of above) acc += upper.getElement(i, j)
        return acc
      })

      bench.add(`simple lower getElement n=${n}`, () => {
        let acc = 0
        for (const [i, j] of strictlyBelow) acc += simpleLower.getElement(i, j)
        return acc
      })

      bench.add(`simple upper getElement n=${n}`, () => {
        let acc = 0
        for (const [i, j] of strictlyAbove) acc += simpleUpper.getElement(i, j)
        return acc
      })

      bench.add(`symmetric lower getElement n=${n}`, () => {
        let acc = 0
        for (const [i, j] of strictlyAbove) acc += symLower.getElement(i, j)
        return acc
      })

      bench.add(`symmetric upper getElement n=${n}`, () => {
        let acc = 0
        for (const [i, j] of strictlyBelow) acc += symUpper.getElement(i, j)
        return acc
      })

      bench.add(`base lower elementIndex n=${n}`, () => {
        let acc = 0
        for (const [i, j] of below) acc += LowerIndexing.elementIndex(i, j)
        return acc
      })

      bench.add(`base upper elementIndex n=${n}`, () => {
        let acc = 0
        for (const [i, j] of above) acc += UpperIndexing.elementIndex(i, j - i, n)
        return acc
      })
    }

    // Same lookups without the coordinate range check
    const n = 1024
    const unchecked = new SymmetricUpperTri(float64Storage(n, false))
    const lookups = coordinateCycle(n, LOOKUPS).filter(([i, j]) => i !== j)

    bench.add(
      `symmetric upper getElement n=${n} (checkBounds off)`,
      () => {
        let acc = 0
        for (const [i, j] of lookups) acc += unchecked.getElement(i, j)
        return acc
      },
      {
        beforeAll: () => {
          trimat.config({ checkBounds: false })
        },
        afterAll: () => {
          trimat.config({ checkBounds: true })
        },
      },
    )

    return runBench(bench, config)
  },
}

export default suite
