import { parseArgs } from 'node:util'
import { withKeyManager } from '../context.js'
import { formatError, usageError } from '../output.js'

export async function deleteCommand(args: string[]): Promise<number> {
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
    return usageError('--identity is required', 'dropkeys delete --identity <id>')
  }

  try {
    await withKeyManager(values['config-dir'], (manager) => manager.deleteSourceKeyPair(identity))
    process.stdout.write(`Key pair for "${identity}" deleted.\n`)
    return 0
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    return 1
  }
}
