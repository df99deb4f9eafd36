import { parseArgs } from 'node:util'
import { withKeyManager } from '../context.js'
import { formatError, usageError } from '../output.js'
import { readPassphrase } from '../stdin.js'

const USAGE = 'echo "passphrase" | dropkeys generate --identity <id>'

export async function generateCommand(args: string[]): Promise<number> {
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
    return usageError('--identity is required', USAGE)
  }

  try {
    const passphrase = await readPassphrase()
    if (passphrase.length === 0) {
      return usageError('No passphrase provided on stdin', USAGE)
    }

    const fingerprint = await withKeyManager(values['config-dir'], (manager) =>
      manager.generateSourceKeyPair({ identity, passphrase }),
    )
    process.stdout.write(`${fingerprint}\n`)
    return 0
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    return 1
  }
}
