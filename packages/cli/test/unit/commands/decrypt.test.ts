import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import * as fs from 'node:fs/promises'
import * as os from 'node:os'
import * as path from 'node:path'
import type { KeyManager } from 'dropkeys'
import { TestKeyring } from '@dropkeys/test-helpers'
import { captureOutput } from '../../helpers/output.js'
import type { CapturedOutput } from '../../helpers/output.js'

const mocks = vi.hoisted(() => ({ withKeyManager: vi.fn(), readPassphrase: vi.fn() }))

vi.mock('../../../src/context.js', () => ({ withKeyManager: mocks.withKeyManager }))
vi.mock('../../../src/stdin.js', () => ({ readPassphrase: mocks.readPassphrase }))

import { decryptCommand } from '../../../src/commands/decrypt.js'

const USAGE = 'Usage: echo "passphrase" | dropkeys decrypt --identity <id> --in <path>\n'

describe('decryptCommand', () => {
  let keyring: TestKeyring
  let output: CapturedOutput
  let tmpDir: string
  let replyPath: string

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'dropkeys-cli-test-'))
    keyring = await TestKeyring.create()
    mocks.withKeyManager.mockImplementation(
      (_dir: string | undefined, fn: (manager: KeyManager) => Promise<unknown>) =>
        fn(keyring.manager),
    )
    await keyring.manager.generateSourceKeyPair({ identity: 'source-a', passphrase: 'test-secret' })
    replyPath = path.join(tmpDir, 'reply.gpg')
    await keyring.manager.encryptJournalistReply('source-a', 'See you soon', replyPath)
    output = captureOutput()
  })

  afterEach(async () => {
    vi.restoreAllMocks()
    vi.clearAllMocks()
    await fs.rm(tmpDir, { recursive: true, force: true })
  })

  describe('flag validation', () => {
    it('should return 1 when --identity is missing', async () => {
      const code = await decryptCommand(['--in', replyPath])
      expect(code).toBe(1)
      expect(output.stderr()).toBe(`Error: --identity is required\n${USAGE}`)
    })

    it('should return 1 when --in is missing', async () => {
      const code = await decryptCommand(['--identity', 'source-a'])
      expect(code).toBe(1)
      expect(output.stderr()).toBe(`Error: --in is required\n${USAGE}`)
    })

    it('should return 1 when no passphrase is given', async () => {
      mocks.readPassphrase.mockResolvedValueOnce('')
      const code = await decryptCommand(['--identity', 'source-a', '--in', replyPath])
      expect(code).toBe(1)
      expect(output.stderr()).toBe(`Error: No passphrase provided on stdin\n${USAGE}`)
    })
  })

  it('should print the decrypted reply with a trailing newline', async () => {
    mocks.readPassphrase.mockResolvedValueOnce('test-secret')
    const code = await decryptCommand(['--identity', 'source-a', '--in', replyPath])
    expect(code).toBe(0)
    expect(output.stdout()).toBe('See you soon\n')
  })

  it('should report engine diagnostics for a wrong passphrase', async () => {
    mocks.readPassphrase.mockResolvedValueOnce('wrong-secret')
    const code = await decryptCommand(['--identity', 'source-a', '--in', replyPath])
    expect(code).toBe(1)
    expect(output.stdout()).toBe('')
    expect(output.stderr()).toBe(
      'DecryptError: Decryption failed\ngpg: decryption failed: Bad passphrase\n',
    )
  })

  it('should report a missing input file on stderr', async () => {
    const missing = path.join(tmpDir, 'missing.gpg')
    mocks.readPassphrase.mockResolvedValueOnce('test-secret')
    const code = await decryptCommand(['--identity', 'source-a', '--in', missing])
    expect(code).toBe(1)
    expect(output.stderr()).toBe(`Error: ENOENT: no such file or directory, open '${missing}'\n`)
    expect(mocks.withKeyManager).not.toHaveBeenCalled()
  })
})
