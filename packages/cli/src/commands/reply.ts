import { parseArgs } from 'node:util'
import { withKeyManager } from '../context.js'
import { formatError, usageError } from '../output.js'
import { readStdin } from '../stdin.js'

const USAGE = 'echo "reply" | dropkeys reply --identity <id> --out <path>'

/** Encrypt a journalist reply for a source and the journalist. */
export async function replyCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      identity: { type: 'string' },
      out: { type: 'string' },
      'config-dir': { type: 'string' },
    },
    strict: true,
  })

  const identity = values.identity
  const outputPath = values.out
  if (identity === undefined) {
    return usageError('--identity is required', USAGE)
  }
  if (outputPath === undefined) {
    return usageError('--out is required', USAGE)
  }

  try {
    const reply = await readStdin()
    if (reply.length === 0) {
      return usageError('No reply provided on stdin', USAGE)
    }
    await withKeyManager(values['config-dir'], (manager) =>
      manager.encryptJournalistReply(identity, reply, outputPath),
    )
    process.stdout.write(`Reply encrypted to ${outputPath}\n`)
    return 0
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    return 1
  }
}
