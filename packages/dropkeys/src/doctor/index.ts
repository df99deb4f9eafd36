/**
 * Doctor/preflight system barrel export.
 *
 * @packageDocumentation
 */

export { runDoctor } from './runner.js'
export type { RunDoctorOptions } from './runner.js'
export type { PreflightCheckStatus, PreflightCheck, PreflightResult } from './types.js'
export { checkGpg, checkGpgAgent } from './checks.js'
