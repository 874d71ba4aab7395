#!/usr/bin/env node
/**
 * Benchmark CLI entry point
 *
 * Usage:
 *   npm run bench                          # Run all benchmarks
 *   npm run bench -- --category indexing
 *   npm run bench -- --filter symmetric
 *   npm run bench -- --sides 64,4096
 *   npm run bench -- --json
 */

import { fileURLToPath } from 'node:url'
import { BenchmarkRunner } from './lib/runner.js'
import { parseSides } from './lib/utils.js'
import type { BenchmarkConfig } from './lib/types.js'

/**
 * Parse command line arguments
 */
function parseArgs(): BenchmarkConfig {
  const args = process.argv.slice(2)
  const output = { console: true, json: false }
  const config: BenchmarkConfig = {
    time: 1000,
    warmup: true,
    output,
  }

  for (let i = 0; i < args.length; i++) {
    const arg = args[i]
    const value = args[i + 1]

    if (arg === '--category' && value) {
      config.category = value
      i++
    } else if (arg === '--filter' && value) {
      config.filter = value
      i++
    } else if (arg === '--json') {
      output.json = true
    } else if (arg === '--time' && value) {
      config.time = parseInt(value, 10)
      i++
    } else if (arg === '--sides' && value) {
      config.sides = parseSides(value)
      i++
    } else if (arg === '--no-warmup') {
      config.warmup = false
    } else if (arg === '--help' || arg === '-h') {
      printHelp()
      process.exit(0)
    }
  }

  return config
}

function printHelp(): void {
  console.log(`
trimat Benchmark Suite

Usage:
  npm run bench -- [options]

Options:
  --category <name>   Filter by category (indexing, traversal)
  --filter <pattern>  Filter benchmarks by name pattern
  --json              Output results to JSON file
  --time <ms>         Time per benchmark in ms (default: 1000)
  --sides <list>      Matrix sides, comma-separated (default: per suite)
  --no-warmup         Skip warmup phase
  --help, -h          Show this help message

Examples:
  npm run bench                              # Run all benchmarks
  npm run bench -- --category traversal      # Run traversal benchmarks only
  npm run bench -- --filter symmetric        # Run symmetric-layout benchmarks
  npm run bench -- --sides 64,4096           # Compare two matrix sides
  npm run bench -- --json                    # Save results to JSON
`)
}

async function main(): Promise<void> {
  const config = parseArgs()
  const runner = new BenchmarkRunner(config)

  await runner.discover(fileURLToPath(new URL('.', import.meta.url)))
  await runner.run()
}

main().catch((err: unknown) => {
  console.error('Benchmark failed:', err)
  process.exit(1)
})
