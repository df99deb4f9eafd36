/**
 * Formatted output helpers for CLI display.
 *
 * @internal
 */

import { DecryptError, EncryptError, EngineError } from 'dropkeys'

/** Check if stdout is a TTY at call time (not module load time). */
function isTTY(): boolean {
  return process.stdout.isTTY ?? false
}

/** Wrap text in ANSI bold if stdout is a TTY. */
export function bold(text: string): string {
  return isTTY() ? `\x1b[1m${text}\x1b[22m` : text
}

/** Wrap text in ANSI dim if stdout is a TTY. */
export function dim(text: string): string {
  return isTTY() ? `\x1b[2m${text}\x1b[22m` : text
}

/**
 * Format an error for display on stderr. Engine diagnostics, when present,
 * follow on their own lines.
 */
export function formatError(err: unknown): string {
  if (err instanceof EncryptError || err instanceof DecryptError || err instanceof EngineError) {
    const diagnostics = err.diagnostics.trim()
    return diagnostics === '' ? `${err.name}: ${err.message}` : `${err.name}: ${err.message}\n${diagnostics}`
  }
  if (err instanceof Error) {
    return `${err.name}: ${err.message}`
  }
  return String(err)
}

/** Print a missing-flag error with a usage hint. Returns the exit code. */
export function usageError(message: string, usage: string): number {
  process.stderr.write(`Error: ${message}\n`)
  process.stderr.write(`Usage: ${usage}\n`)
  return 1
}
