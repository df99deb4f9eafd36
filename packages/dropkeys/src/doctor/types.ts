/**
 * Doctor/preflight system types.
 */

export type { PreflightCheckStatus, PreflightCheck, PreflightResult } from '../types.js'
