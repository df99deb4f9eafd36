/**
 * In-process stand-in for the OpenPGP engine.
 */

import * as fs from 'node:fs/promises'
import { Readable } from 'node:stream'
import {
  DecryptError,
  EncryptError,
  EngineError,
  KeyNotFoundError,
  SOURCE_KEY_NAME,
  SOURCE_KEY_UID_RE,
  compactFingerprint,
} from 'dropkeys'
import type { EncryptRequest, EngineInput, KeyEngine, KeyGenerationRequest } from 'dropkeys'

const CIPHERTEXT_MAGIC = 'FAKEPGP1\n'

/** A key held by a {@link FakeKeyEngine}. */
export interface FakeKey {
  fingerprint: string
  uid: string
  /** Passphrase unlocking the secret key; `undefined` for public-only keys. */
  passphrase: string | undefined
}

/** Options for {@link FakeKeyEngine.addKey}. */
export interface AddKeyOptions {
  /** Fingerprint to use. Generated when omitted. */
  fingerprint?: string | undefined
  /** User ID of the key. */
  uid: string
  /** Secret key passphrase. Omit to add a public key only. */
  passphrase?: string | undefined
}

/** One call to {@link FakeKeyEngine.encrypt}, as the engine received it. */
export interface RecordedEncryption {
  recipients: string[]
  outputPath: string | undefined
}

/**
 * A `KeyEngine` that keeps its keyring in memory and "encrypts" by wrapping
 * the plaintext in a recipient-tagged envelope.
 *
 * @remarks
 * The envelope is not encryption. It reproduces the engine's observable
 * contract: only listed recipients can decrypt, a wrong passphrase fails,
 * unknown recipients fail, and key lookups are counted so tests can tell
 * whether a call reached the engine.
 *
 * @public
 */
export class FakeKeyEngine implements KeyEngine {
  readonly #keys = new Map<string, FakeKey>()
  #nextFingerprint = 1

  /** Number of keyring scans performed by `findKeyFingerprint`. */
  scanCount = 0

  /** Number of public key exports performed. */
  exportCount = 0

  /** Every encryption request received, in order. */
  readonly encryptions: RecordedEncryption[] = []

  /**
   * Add a key to the keyring directly, as an import would.
   * @public
   */
  addKey(options: AddKeyOptions): FakeKey {
    const key: FakeKey = {
      fingerprint: compactFingerprint(options.fingerprint ?? this.#generateFingerprint()),
      uid: options.uid,
      passphrase: options.passphrase,
    }
    this.#keys.set(key.fingerprint, key)
    return key
  }

  /**
   * Whether the keyring holds a key with this fingerprint.
   * @public
   */
  hasKey(fingerprint: string): boolean {
    return this.#keys.has(compactFingerprint(fingerprint))
  }

  /** @public */
  async encrypt(request: EncryptRequest): Promise<Buffer> {
    const recipients = request.recipients.map(compactFingerprint)
    this.encryptions.push({ recipients, outputPath: request.outputPath })

    for (const recipient of recipients) {
      if (!this.#keys.has(recipient)) {
        throw new EncryptError(
          'Encryption failed',
          `gpg: ${recipient}: skipped: No public key\ngpg: [stdin]: encryption failed: No public key`,
        )
      }
    }

    const plaintext = await readInput(request.plaintext)
    const envelope = Buffer.concat([
      Buffer.from(CIPHERTEXT_MAGIC),
      Buffer.from(JSON.stringify({ recipients, data: plaintext.toString('base64') })),
    ])

    if (request.outputPath !== undefined) {
      await fs.writeFile(request.outputPath, envelope)
      return Buffer.alloc(0)
    }
    return envelope
  }

  /** @public */
  async decrypt(ciphertext: EngineInput, passphrase: string): Promise<Buffer> {
    const raw = (await readInput(ciphertext)).toString()
    const envelope = raw.startsWith(CIPHERTEXT_MAGIC)
      ? parseEnvelope(raw.slice(CIPHERTEXT_MAGIC.length))
      : undefined
    if (envelope === undefined) {
      throw new DecryptError('Decryption failed', 'gpg: no valid OpenPGP data found.')
    }

    const secretKeys = envelope.recipients
      .map((fingerprint) => this.#keys.get(fingerprint))
      .filter((key): key is FakeKey => key?.passphrase !== undefined)
    if (secretKeys.length === 0) {
      throw new DecryptError('Decryption failed', 'gpg: decryption failed: No secret key')
    }
    if (!secretKeys.some((key) => key.passphrase === passphrase)) {
      throw new DecryptError('Decryption failed', 'gpg: decryption failed: Bad passphrase')
    }
    return Buffer.from(envelope.data, 'base64')
  }

  /** @public */
  generateKeyPair(request: KeyGenerationRequest): Promise<string> {
    if (/[\r\n]/.test(request.identity) || /[\r\n]/.test(request.passphrase)) {
      return Promise.reject(
        new EngineError('Key generation failed', 'generate', 'gpg: invalid parameter'),
      )
    }
    const key = this.addKey({
      uid: `${SOURCE_KEY_NAME} <${request.identity}>`,
      passphrase: request.passphrase,
    })
    return Promise.resolve(key.fingerprint)
  }

  /** @public */
  deleteKeyPair(fingerprint: string): Promise<void> {
    const fpr = compactFingerprint(fingerprint)
    if (!this.#keys.delete(fpr)) {
      return Promise.reject(new KeyNotFoundError(`No key with fingerprint ${fpr}`))
    }
    return Promise.resolve()
  }

  /** @public */
  findKeyFingerprint(identity: string): Promise<string> {
    this.scanCount++
    for (const key of this.#keys.values()) {
      if (SOURCE_KEY_UID_RE.exec(key.uid)?.[2] === identity) {
        return Promise.resolve(key.fingerprint)
      }
    }
    return Promise.reject(new KeyNotFoundError(`No source key for identity ${identity}`))
  }

  /** @public */
  exportPublicKey(fingerprint: string): Promise<string> {
    this.exportCount++
    const fpr = compactFingerprint(fingerprint)
    if (!this.#keys.has(fpr)) {
      return Promise.reject(new KeyNotFoundError(`No public key with fingerprint ${fpr}`))
    }
    return Promise.resolve(
      '-----BEGIN PGP PUBLIC KEY BLOCK-----\n\n' +
        `${Buffer.from(fpr).toString('base64')}\n` +
        '-----END PGP PUBLIC KEY BLOCK-----',
    )
  }

  #generateFingerprint(): string {
    const n = this.#nextFingerprint++
    return n.toString(16).toUpperCase().padStart(40, '0')
  }
}

interface Envelope {
  recipients: string[]
  data: string
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function parseEnvelope(json: string): Envelope | undefined {
  let parsed: unknown
  try {
    parsed = JSON.parse(json)
  } catch {
    return undefined
  }
  if (!isObject(parsed)) {
    return undefined
  }
  const { recipients, data } = parsed
  if (
    !Array.isArray(recipients) ||
    !recipients.every((r): r is string => typeof r === 'string') ||
    typeof data !== 'string'
  ) {
    return undefined
  }
  return { recipients, data }
}

async function readInput(input: EngineInput): Promise<Buffer> {
  if (typeof input === 'string') {
    return Buffer.from(input)
  }
  if (input instanceof Readable) {
    const chunks: Buffer[] = []
    const source: AsyncIterable<unknown> = input
    for await (const chunk of source) {
      if (chunk instanceof Uint8Array) {
        chunks.push(Buffer.from(chunk))
      } else {
        chunks.push(Buffer.from(String(chunk)))
      }
    }
    return Buffer.concat(chunks)
  }
  return Buffer.from(input)
}
