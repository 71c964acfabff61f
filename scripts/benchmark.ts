#!/usr/bin/env tsx
/**
 * Sector Search Benchmark
 *
 * Generates a seeded airspace and runs the sector search against the
 * all-pairs brute force over the same drones, printing counts and timings.
 * Exits non-zero when the two disagree.
 *
 * Usage: npm run bench -- --drones 2000 --radius 500 --airspace 128000 --seed 1
 */

import { parseArgs } from 'node:util'
import { z } from 'zod'
import {
  countConflicts,
  formatIssues,
  generateDronePositions,
  sectorKeywords,
} from '@airspace/sector-search'
import type { SearchDiagnostics } from '@airspace/sector-search'

const { benchmark } = sectorKeywords

const argsSchema = z.object({
  drones: z.coerce.number().int().positive().default(benchmark.droneCount),
  radius: z.coerce.number().finite().positive().default(benchmark.conflictRadius),
  airspace: z.coerce.number().finite().positive().default(benchmark.airspaceSize),
  seed: z.coerce.number().int().default(benchmark.seed),
  padMult: z.coerce
    .number()
    .int()
    .min(sectorKeywords.grid.minPadMult)
    .default(sectorKeywords.defaults.padMult),
})

type BenchmarkArgs = z.infer<typeof argsSchema>

function readArgs(): BenchmarkArgs {
  const { values } = parseArgs({
    args: process.argv.slice(2),
    options: {
      drones: { type: 'string' },
      radius: { type: 'string' },
      airspace: { type: 'string' },
      seed: { type: 'string' },
      padMult: { type: 'string' },
    },
  })

  const parsed = argsSchema.safeParse(values)
  if (!parsed.success) {
    throw new Error(`Invalid arguments: ${formatIssues(parsed.error).join(', ')}`)
  }
  return parsed.data
}

// ============================================================================
// Main
// ============================================================================

function main() {
  const args = readArgs()

  console.log('🛩️  Sector Search Benchmark')
  console.log('='.repeat(60))
  console.log(`Drones:   ${args.drones}`)
  console.log(`Radius:   ${args.radius}`)
  console.log(`Airspace: ${args.airspace} × ${args.airspace}`)
  console.log(`padMult:  ${args.padMult}`)
  console.log(`Seed:     ${args.seed}\n`)

  const positions = generateDronePositions({
    count: args.drones,
    airspaceSize: args.airspace,
    seed: args.seed,
  })

  const reports: Array<SearchDiagnostics> = []

  // A limit equal to the drone count makes the debug report include the
  // brute-force comparison
  const conflicts = countConflicts(positions, {
    conflictRadius: args.radius,
    airspaceSize: args.airspace,
    padMult: args.padMult,
    limit: args.drones,
    debug: true,
    onDiagnostics: (diagnostics) => reports.push(diagnostics),
  })

  const report = reports.at(-1)
  const bruteForce = report?.bruteForce
  if (!report || !bruteForce) {
    throw new Error('Sector search produced no diagnostics')
  }

  const sectoredMs = Object.values(report.timings).reduce((a, b) => a + b, 0)

  console.log('\n' + '='.repeat(60))
  console.log(`Sector search: ${conflicts} in conflict, ${sectoredMs.toFixed(3)} ms`)
  console.log(
    `Brute force:   ${bruteForce.conflicts} in conflict, ${bruteForce.elapsedMs.toFixed(3)} ms`,
  )

  if (bruteForce.conflicts !== conflicts) {
    console.error('❌ Counts differ')
    process.exitCode = 1
    return
  }

  console.log(
    `✅ Counts match (${(bruteForce.elapsedMs / Math.max(sectoredMs, Number.EPSILON)).toFixed(1)}× faster)`,
  )
}

try {
  main()
} catch (error) {
  console.error('❌ Error:', error instanceof Error ? error.message : String(error))
  process.exitCode = 1
}
