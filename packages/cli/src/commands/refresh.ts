import { parseArgs } from 'node:util'
import { withKeyManager } from '../context.js'
import { formatError, usageError } from '../output.js'

/**
 * Re-resolve a source's fingerprint from the keyring after a key was changed
 * outside dropkeys.
 */
export async function refreshCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      identity: { type: 'string' },
      'config-dir': { type: 'string' },
    },
    strict: true,
  })

  const identity = values.identity
  if (identity === undefined) {
    return usageError('--identity is required', 'dropkeys refresh --identity <id>')
  }

  try {
    const fingerprint = await withKeyManager(values['config-dir'], (manager) =>
      manager.refreshSourceKey(identity),
    )
    process.stdout.write(`${fingerprint}\n`)
    return 0
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    return 1
  }
}
