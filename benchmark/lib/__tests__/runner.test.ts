import { describe, it, expect } from 'vitest'
import { join } from 'node:path'
import { fileURLToPath } from 'node:url'
import { Bench } from 'tinybench'
import { BenchmarkRunner, findSuiteFiles, selects } from '../runner.js'
import { parseSides } from '../utils.js'
import type { BenchmarkSuite } from '../types.js'

const BENCHMARK_DIR = fileURLToPath(new URL('../..', import.meta.url))

function emptySuite(name: string, category: string): BenchmarkSuite {
  return { name, category, run: async () => new Bench() }
}

describe('parseSides', () => {
  it('reads a comma-separated list', () => {
    expect(parseSides('64, 512')).toEqual([64, 512])
    expect(parseSides('4096')).toEqual([4096])
  })

  it('rejects sides that are not positive integers', () => {
    expect(() => parseSides('0')).toThrow('--sides expects positive integers, got 0')
    expect(() => parseSides('16,1.5')).toThrow('--sides expects positive integers, got 16,1.5')
    expect(() => parseSides('16,x')).toThrow('--sides expects positive integers, got 16,x')
  })
})

describe('findSuiteFiles', () => {
  it('lists suites by category directory', () => {
    expect(findSuiteFiles(BENCHMARK_DIR)).toEqual([
      { category: 'indexing', path: join(BENCHMARK_DIR, 'indexing', 'element-index.bench.ts') },
      { category: 'traversal', path: join(BENCHMARK_DIR, 'traversal', 'rows-and-columns.bench.ts') },
    ])
  })
})

describe('selects', () => {
  const suite = emptySuite('Symmetric Rows', 'traversal')

  it('matches the category exactly', () => {
    expect(selects({ category: 'traversal' }, suite)).toBe(true)
    expect(selects({ category: 'indexing' }, suite)).toBe(false)
  })

  it('matches the filter as a case-insensitive substring', () => {
    expect(selects({ filter: 'symmetric' }, suite)).toBe(true)
    expect(selects({ filter: 'lower' }, suite)).toBe(false)
  })

  it('takes everything without options', () => {
    expect(selects({}, suite)).toBe(true)
  })
})

describe('BenchmarkRunner', () => {
  it('runs only the selected suites', async () => {
    const runner = new BenchmarkRunner({ category: 'indexing', output: { console: false } })
    runner.addSuite(emptySuite('Element Lookup', 'indexing'))
    runner.addSuite(emptySuite('Rows', 'traversal'))

    const results = await runner.run()

    expect(results.suites.map((s) => s.name)).toEqual(['Element Lookup'])
    expect(results.suites[0].benchmarks).toEqual([])
    expect(results.platform.nodeVersion).toBe(process.version)
  })
})
