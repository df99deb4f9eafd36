/**
 * GnuPG engine adapter.
 *
 * @remarks
 * Drives the `gpg2` binary as a subprocess through three handles:
 *
 * - the standard handle, for encryption, decryption, listing and export
 *   (`--trust-model direct`, plus `--pinentry-mode loopback` on 2.1+ so that
 *   passphrases can be supplied on stdin);
 * - the deletion handle (`--yes`, never loopback, so that deleting a secret
 *   key does not ask for its passphrase);
 * - the generation handle, which is the standard handle.
 */

import { Readable } from 'node:stream'
import { execCommand } from '../util/exec.js'
import { parseVersion, versionGte } from '../util/version.js'
import type { VersionTriple } from '../util/version.js'
import {
  DecryptError,
  EncryptError,
  EngineError,
  KeyNotFoundError,
  KeyringError,
} from '../errors.js'
import { GpgHandle } from './handle.js'
import { describeDeleteProblem, findStatus, readStatus } from './status.js'
import {
  SOURCE_KEY_CREATION_DATE,
  SOURCE_KEY_EXPIRATION_DATE,
  SOURCE_KEY_LENGTH,
  SOURCE_KEY_NAME,
  SOURCE_KEY_TYPE,
  SOURCE_KEY_UID_RE,
  compactFingerprint,
} from './types.js'
import type { EncryptRequest, EngineInput, KeyEngine, KeyGenerationRequest } from './types.js'

/** Default engine binary. */
export const DEFAULT_GPG_BINARY = 'gpg2'

/** Default `USERNAME` exported to the engine process. */
export const DEFAULT_GPG_USERNAME = 'www-data'

/** First engine version that supports `--pinentry-mode`. */
const LOOPBACK_MIN_VERSION: VersionTriple = [2, 1, 0]

const TRUST_MODEL_DIRECT = ['--trust-model', 'direct']

/** Options for {@link GpgEngine.init}. */
export interface GpgEngineOptions {
  /** Keyring directory. */
  homedir: string
  /** Engine binary. Defaults to {@link DEFAULT_GPG_BINARY}. */
  binary?: string | undefined
  /** `USERNAME` for the engine process. Defaults to {@link DEFAULT_GPG_USERNAME}. */
  username?: string | undefined
}

/** A key as reported by a colon-delimited key listing. */
export interface ListedKey {
  fingerprint: string
  uids: string[]
}

/**
 * {@link KeyEngine} backed by a local GnuPG installation.
 * @public
 */
export class GpgEngine implements KeyEngine {
  /** Detected engine version. */
  readonly version: VersionTriple
  /** Handle used for encryption, decryption, listing and export. */
  readonly standard: GpgHandle
  /** Handle used for key deletion. */
  readonly deletion: GpgHandle

  private constructor(version: VersionTriple, standard: GpgHandle, deletion: GpgHandle) {
    this.version = version
    this.standard = standard
    this.deletion = deletion
  }

  /** Handle used for key generation. */
  get generation(): GpgHandle {
    return this.standard
  }

  /**
   * Detect the engine version and build the handles.
   * @throws EngineError if the binary is missing or its version is unreadable
   */
  static async init(options: GpgEngineOptions): Promise<GpgEngine> {
    const binary = options.binary ?? DEFAULT_GPG_BINARY
    const username = options.username ?? DEFAULT_GPG_USERNAME

    let output: string
    try {
      output = await execCommand(binary, ['--version'])
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      throw new EngineError(`Could not run ${binary}`, 'version', message)
    }
    const version = parseVersion(output.split('\n')[0] ?? output)
    if (version === null) {
      throw new EngineError(`Could not parse ${binary} version`, 'version', output)
    }

    const standardOptions = versionGte(version, LOOPBACK_MIN_VERSION)
      ? ['--pinentry-mode', 'loopback', ...TRUST_MODEL_DIRECT]
      : [...TRUST_MODEL_DIRECT]

    const standard = new GpgHandle({
      binary,
      homedir: options.homedir,
      options: standardOptions,
      username,
    })
    const deletion = new GpgHandle({
      binary,
      homedir: options.homedir,
      options: ['--yes', ...TRUST_MODEL_DIRECT],
      username,
    })
    return new GpgEngine(version, standard, deletion)
  }

  async encrypt(request: EncryptRequest): Promise<Buffer> {
    const args = ['--encrypt', '--always-trust']
    for (const recipient of request.recipients) {
      args.push('--recipient', compactFingerprint(recipient))
    }
    if (request.outputPath !== undefined) {
      // Replace an existing file at the destination; batch mode refuses otherwise.
      args.push('--yes', '--output', request.outputPath)
    }

    const result = await this.standard.run(args, request.plaintext)
    const status = readStatus('encrypt', result.stderr)
    if (result.exitCode !== 0 || findStatus(status, 'END_ENCRYPTION') === undefined) {
      throw new EncryptError('Encryption failed', status.diagnostics)
    }
    return result.stdoutBytes
  }

  async decrypt(ciphertext: EngineInput, passphrase: string): Promise<Buffer> {
    const result = await this.standard.run(
      ['--passphrase-fd', '0', '--decrypt'],
      withPassphraseLine(passphrase, ciphertext),
    )
    const status = readStatus('decrypt', result.stderr)
    if (result.exitCode !== 0 || findStatus(status, 'DECRYPTION_OKAY') === undefined) {
      throw new DecryptError('Decryption failed', status.diagnostics)
    }
    return result.stdoutBytes
  }

  async generateKeyPair(request: KeyGenerationRequest): Promise<string> {
    const result = await this.generation.run(['--gen-key'], buildKeyGenerationInput(request))
    const status = readStatus('generate', result.stderr)
    const created = findStatus(status, 'KEY_CREATED')
    const fingerprint = created?.args[1]
    if (result.exitCode !== 0 || fingerprint === undefined) {
      throw new EngineError('Key generation failed', 'generate', status.diagnostics)
    }
    return fingerprint
  }

  async deleteKeyPair(fingerprint: string): Promise<void> {
    const fpr = compactFingerprint(fingerprint)
    const result = await this.deletion.run(['--delete-secret-and-public-key', fpr])
    const status = readStatus('delete', result.stderr)
    const problem = findStatus(status, 'DELETE_PROBLEM')
    if (problem === undefined && result.exitCode === 0) {
      return
    }
    if (problem?.args[0] === '1' || /not found/i.test(status.diagnostics)) {
      throw new KeyNotFoundError(`No key with fingerprint ${fpr}`)
    }
    throw new EngineError(
      `Key deletion failed: ${describeDeleteProblem(problem?.args[0])}`,
      'delete',
      status.diagnostics,
    )
  }

  async findKeyFingerprint(identity: string): Promise<string> {
    for (const key of await this.listKeys()) {
      if (key.uids.some((uid) => isSourceUid(uid, identity))) {
        return key.fingerprint
      }
    }
    throw new KeyNotFoundError(`No source key for identity ${identity}`)
  }

  async exportPublicKey(fingerprint: string): Promise<string> {
    const fpr = compactFingerprint(fingerprint)
    const result = await this.standard.run(['--armor', '--export', fpr])
    const armored = result.stdout.trim()
    if (result.exitCode !== 0 || armored === '') {
      throw new KeyNotFoundError(`No public key with fingerprint ${fpr}`)
    }
    return armored
  }

  /** List every public key in the keyring. */
  async listKeys(): Promise<ListedKey[]> {
    const result = await this.standard.run([
      '--list-keys',
      '--with-colons',
      '--fixed-list-mode',
      '--with-fingerprint',
    ])
    if (result.exitCode !== 0) {
      throw new EngineError('Key listing failed', 'list', result.stderr)
    }
    return parseColonListing(result.stdout)
  }
}

/**
 * Parse `--with-colons` listing output into keys.
 *
 * @remarks
 * Only the first `fpr` record after a `pub` record is the primary key's
 * fingerprint; later ones belong to subkeys.
 */
export function parseColonListing(output: string): ListedKey[] {
  const keys: ListedKey[] = []
  let current: ListedKey | undefined

  for (const line of output.split('\n')) {
    const fields = line.split(':')
    const recordType = fields[0]
    if (recordType === 'pub') {
      current = { fingerprint: '', uids: [] }
      keys.push(current)
    } else if (recordType === 'fpr' && current !== undefined && current.fingerprint === '') {
      current.fingerprint = fields[9] ?? ''
    } else if (recordType === 'uid' && current !== undefined) {
      current.uids.push(unescapeColonField(fields[9] ?? ''))
    }
  }

  return keys.filter((key) => key.fingerprint !== '')
}

/** Decode the `\xHH` escapes used in colon-delimited fields. */
function unescapeColonField(value: string): string {
  return value.replace(/\\x([0-9a-fA-F]{2})/g, (_match, hex: string) =>
    String.fromCharCode(parseInt(hex, 16)),
  )
}

/** Whether `uid` is a source key user ID for exactly `identity`. */
function isSourceUid(uid: string, identity: string): boolean {
  const match = SOURCE_KEY_UID_RE.exec(uid)
  return match?.[2] === identity
}

/**
 * Build the batch parameter file for key generation.
 * @throws KeyringError if a value would break out of its parameter line
 */
export function buildKeyGenerationInput(request: KeyGenerationRequest): string {
  if (/[\r\n]/.test(request.identity) || /[\r\n]/.test(request.passphrase)) {
    throw new KeyringError('Identity and passphrase must not contain line breaks')
  }
  return [
    `Key-Type: ${SOURCE_KEY_TYPE}`,
    `Key-Length: ${String(SOURCE_KEY_LENGTH)}`,
    `Name-Real: ${SOURCE_KEY_NAME}`,
    `Name-Email: ${request.identity}`,
    `Creation-Date: ${SOURCE_KEY_CREATION_DATE}`,
    `Expire-Date: ${SOURCE_KEY_EXPIRATION_DATE}`,
    `Passphrase: ${request.passphrase}`,
    '%commit',
    '',
  ].join('\n')
}

/**
 * Prefix engine input with a passphrase line, for `--passphrase-fd 0`.
 */
function withPassphraseLine(passphrase: string, input: EngineInput): EngineInput {
  const line = Buffer.from(`${passphrase}\n`)
  if (input instanceof Readable) {
    return Readable.from(prepend(line, input))
  }
  return Buffer.concat([line, typeof input === 'string' ? Buffer.from(input) : input])
}

async function* prepend(head: Buffer, rest: AsyncIterable<unknown>): AsyncGenerator<Buffer> {
  yield head
  for await (const chunk of rest) {
    if (chunk instanceof Uint8Array) {
      yield Buffer.from(chunk)
    } else {
      yield Buffer.from(String(chunk))
    }
  }
}
