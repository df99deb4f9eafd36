#!/usr/bin/env node
/**
 * CLI entry point for dropkeys.
 *
 * Each subcommand is lazy-loaded via dynamic import() to minimize startup
 * time; only the requested command's module (and its dependencies) is loaded.
 *
 * argv layout: [node, script, subcommand, ...commandArgs]
 * parseArgs consumes argv[2..] and extracts the subcommand as positionals[0].
 * commandArgs is argv[3..], everything after the subcommand.
 *
 * @internal
 */

import { parseArgs } from 'node:util'

const { positionals } = parseArgs({
  allowPositionals: true,
  strict: false,
})

const subcommand = positionals[0]
// argv[0]=node, argv[1]=script, argv[2]=subcommand, argv[3..]=commandArgs
const commandArgs = process.argv.slice(3)

function printHelp(): void {
  process.stdout.write(
    'Usage: dropkeys <command> [options]\n\n' +
      'Commands:\n' +
      '  generate     Generate a source key pair (passphrase on stdin)\n' +
      '  delete       Delete a source key pair\n' +
      '  fingerprint  Print a source key fingerprint\n' +
      '  public-key   Print a source or journalist public key\n' +
      '  encrypt      Encrypt a submission for the journalist\n' +
      '  reply        Encrypt a reply for a source and the journalist\n' +
      '  decrypt      Decrypt a reply (passphrase on stdin)\n' +
      '  refresh      Re-resolve a source key after out-of-band changes\n' +
      '  doctor       Run preflight checks\n\n' +
      'Options:\n' +
      '  --config-dir <dir>  Directory containing config.json\n',
  )
}

async function main(): Promise<number> {
  if (subcommand === undefined || subcommand === '--help' || subcommand === '-h') {
    printHelp()
    return 0
  }

  switch (subcommand) {
    case 'generate': {
      const { generateCommand } = await import('./commands/generate.js')
      return generateCommand(commandArgs)
    }
    case 'delete': {
      const { deleteCommand } = await import('./commands/delete.js')
      return deleteCommand(commandArgs)
    }
    case 'fingerprint': {
      const { fingerprintCommand } = await import('./commands/fingerprint.js')
      return fingerprintCommand(commandArgs)
    }
    case 'public-key': {
      const { publicKeyCommand } = await import('./commands/public-key.js')
      return publicKeyCommand(commandArgs)
    }
    case 'encrypt': {
      const { encryptCommand } = await import('./commands/encrypt.js')
      return encryptCommand(commandArgs)
    }
    case 'reply': {
      const { replyCommand } = await import('./commands/reply.js')
      return replyCommand(commandArgs)
    }
    case 'decrypt': {
      const { decryptCommand } = await import('./commands/decrypt.js')
      return decryptCommand(commandArgs)
    }
    case 'refresh': {
      const { refreshCommand } = await import('./commands/refresh.js')
      return refreshCommand(commandArgs)
    }
    case 'doctor': {
      const { doctorCommand } = await import('./commands/doctor.js')
      return doctorCommand(commandArgs)
    }
    default:
      process.stderr.write(`Unknown command: ${subcommand}\n`)
      printHelp()
      return 1
  }
}

main()
  .then((code) => {
    process.exitCode = code
  })
  .catch((err: unknown) => {
    process.stderr.write(`Fatal: ${err instanceof Error ? err.message : String(err)}\n`)
    process.exitCode = 1
  })
