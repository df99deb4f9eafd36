import { createReadStream } from 'node:fs'
import { parseArgs } from 'node:util'
import { withKeyManager } from '../context.js'
import { formatError, usageError } from '../output.js'
import { readStdin } from '../stdin.js'

const USAGE = 'dropkeys encrypt --out <path> [--file <path>]  (message on stdin without --file)'

/** Encrypt a source submission for the journalist. */
export async function encryptCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      out: { type: 'string' },
      file: { type: 'string' },
      'config-dir': { type: 'string' },
    },
    strict: true,
  })

  const outputPath = values.out
  if (outputPath === undefined) {
    return usageError('--out is required', USAGE)
  }

  try {
    const file = values.file
    if (file !== undefined) {
      await withKeyManager(values['config-dir'], (manager) =>
        manager.encryptSourceFile(createReadStream(file), outputPath),
      )
    } else {
      const message = await readStdin()
      if (message.length === 0) {
        return usageError('No message provided on stdin', USAGE)
      }
      await withKeyManager(values['config-dir'], (manager) =>
        manager.encryptSourceMessage(message, outputPath),
      )
    }
    process.stdout.write(`Submission encrypted to ${outputPath}\n`)
    return 0
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    return 1
  }
}
