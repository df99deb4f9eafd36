import { parseArgs } from 'node:util'
import { withKeyManager } from '../context.js'
import { formatError, usageError } from '../output.js'

const USAGE = 'dropkeys public-key (--identity <id> | --journalist)'

export async function publicKeyCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      identity: { type: 'string' },
      journalist: { type: 'boolean' },
      'config-dir': { type: 'string' },
    },
    strict: true,
  })

  const identity = values.identity
  const journalist = values.journalist === true
  if (identity === undefined && !journalist) {
    return usageError('one of --identity or --journalist is required', USAGE)
  }
  if (identity !== undefined && journalist) {
    return usageError('--identity and --journalist are mutually exclusive', USAGE)
  }

  try {
    const publicKey = await withKeyManager(values['config-dir'], (manager) =>
      identity !== undefined
        ? manager.getSourcePublicKey(identity)
        : manager.getJournalistPublicKey(),
    )
    process.stdout.write(`${publicKey}\n`)
    return 0
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    return 1
  }
}
