import { parseArgs } from 'node:util'
import { withKeyManager } from '../context.js'
import { formatError, usageError } from '../output.js'

export async function fingerprintCommand(args: string[]): Promise<number> {
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
    return usageError('--identity is required', 'dropkeys fingerprint --identity <id>')
  }

  try {
    const fingerprint = await withKeyManager(values['config-dir'], (manager) =>
      manager.getSourceKeyFingerprint(identity),
    )
    process.stdout.write(`${fingerprint}\n`)
    return 0
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    return 1
  }
}
