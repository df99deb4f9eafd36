/**
 * Doctor runner: runs the preflight checks and aggregates results.
 *
 * @packageDocumentation
 */

import { checkGpg, checkGpgAgent } from './checks.js'
import type { PreflightCheck, PreflightResult } from '../types.js'

/** Options for running the doctor. */
export interface RunDoctorOptions {
  /** Engine binary to check. */
  gpgBinary?: string | undefined
}

/** A doctor check entry pairing the check function with whether it is required. */
interface CheckEntry {
  check: () => Promise<PreflightCheck>
  required: boolean
}

/** Aggregated check entry with its result. */
interface ResolvedEntry {
  required: boolean
  result: PreflightCheck
}

/**
 * Run all preflight checks and aggregate the results.
 */
export async function runDoctor(options?: RunDoctorOptions): Promise<PreflightResult> {
  const entries: CheckEntry[] = [
    { check: () => checkGpg(options?.gpgBinary), required: true },
    { check: checkGpgAgent, required: false },
  ]

  const resolved: ResolvedEntry[] = await Promise.all(
    entries.map(async ({ check, required }) => {
      const result = await check()
      return { required, result }
    }),
  )

  const ready = resolved.every(({ required, result }) => {
    if (!required) return true
    return result.status === 'ok'
  })

  const warnings: string[] = []
  const nextSteps: string[] = []

  for (const { required, result } of resolved) {
    if (result.status === 'missing') {
      if (required) {
        nextSteps.push(`Install missing required dependency: ${result.name}`)
      } else {
        warnings.push(
          `Optional dependency not found: ${result.name}${result.reason !== undefined ? ` (${result.reason})` : ''}`,
        )
      }
    } else if (result.status === 'version-unsupported') {
      const msg = `${result.name} version is unsupported${result.reason !== undefined ? `: ${result.reason}` : ''}`
      if (required) {
        nextSteps.push(`Upgrade required dependency: ${msg}`)
      } else {
        warnings.push(`Optional dependency version unsupported: ${msg}`)
      }
    }
  }

  const checks = resolved.map(({ result }) => result)

  return { checks, ready, warnings, nextSteps }
}
