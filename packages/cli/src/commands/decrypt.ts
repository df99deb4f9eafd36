import * as fs from 'node:fs/promises'
import { parseArgs } from 'node:util'
import { withKeyManager } from '../context.js'
import { formatError, usageError } from '../output.js'
import { readPassphrase } from '../stdin.js'

const USAGE = 'echo "passphrase" | dropkeys decrypt --identity <id> --in <path>'

/** Decrypt a reply with a source's passphrase and print it. */
export async function decryptCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      identity: { type: 'string' },
      in: { type: 'string' },
      'config-dir': { type: 'string' },
    },
    strict: true,
  })

  const identity = values.identity
  const inputPath = values.in
  if (identity === undefined) {
    return usageError('--identity is required', USAGE)
  }
  if (inputPath === undefined) {
    return usageError('--in is required', USAGE)
  }

  try {
    const passphrase = await readPassphrase()
    if (passphrase.length === 0) {
      return usageError('No passphrase provided on stdin', USAGE)
    }
    const ciphertext = await fs.readFile(inputPath)
    const reply = await withKeyManager(values['config-dir'], (manager) =>
      manager.decryptJournalistReply({ identity, passphrase }, ciphertext),
    )
    process.stdout.write(reply.endsWith('\n') ? reply : `${reply}\n`)
    return 0
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    return 1
  }
}
