/**
 * Individual preflight check functions for each system dependency.
 */

import { execCommand } from '../util/exec.js'
import { parseVersion, versionGte } from '../util/version.js'
import type { PreflightCheck } from '../types.js'
import { DEFAULT_GPG_BINARY } from '../engine/gpg-engine.js'

/**
 * Check that the engine binary is present and >= 2.1.0.
 * @internal
 */
export async function checkGpg(binary: string = DEFAULT_GPG_BINARY): Promise<PreflightCheck> {
  const name = binary
  try {
    const output = await execCommand(binary, ['--version'])
    const firstLine = output.split('\n')[0] ?? output
    const parsed = parseVersion(firstLine)
    if (!parsed) {
      return {
        name,
        status: 'version-unsupported',
        version: firstLine,
        reason: `Could not parse ${binary} version`,
      }
    }
    if (!versionGte(parsed, [2, 1, 0])) {
      return {
        name,
        status: 'version-unsupported',
        version: firstLine,
        reason: 'GnuPG >= 2.1.0 is required for loopback pinentry',
      }
    }
    return { name, status: 'ok', version: firstLine }
  } catch {
    return { name, status: 'missing', reason: `${binary} not found in PATH` }
  }
}

/**
 * Check that gpg-agent is present.
 * @internal
 */
export async function checkGpgAgent(): Promise<PreflightCheck> {
  const name = 'gpg-agent'
  try {
    const output = await execCommand('gpg-agent', ['--version'])
    const firstLine = output.split('\n')[0] ?? output
    return { name, status: 'ok', version: firstLine }
  } catch {
    return {
      name,
      status: 'missing',
      reason: 'gpg-agent not found in PATH (secret key operations need it)',
    }
  }
}
