import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import type { KeyManager } from 'dropkeys'
import { TestKeyring } from '@dropkeys/test-helpers'
import { captureOutput } from '../../helpers/output.js'
import type { CapturedOutput } from '../../helpers/output.js'

const mocks = vi.hoisted(() => ({ withKeyManager: vi.fn(), readPassphrase: vi.fn() }))

vi.mock('../../../src/context.js', () => ({ withKeyManager: mocks.withKeyManager }))
vi.mock('../../../src/stdin.js', () => ({ readPassphrase: mocks.readPassphrase }))

import { generateCommand } from '../../../src/commands/generate.js'

describe('generateCommand', () => {
  let keyring: TestKeyring
  let output: CapturedOutput

  beforeEach(async () => {
    keyring = await TestKeyring.create()
    mocks.withKeyManager.mockImplementation(
      (_dir: string | undefined, fn: (manager: KeyManager) => Promise<unknown>) =>
        fn(keyring.manager),
    )
    output = captureOutput()
  })

  afterEach(() => {
    vi.restoreAllMocks()
    vi.clearAllMocks()
  })

  describe('--identity flag validation', () => {
    it('should return 1 with a usage hint when --identity is missing', async () => {
      const code = await generateCommand([])
      expect(code).toBe(1)
      expect(output.stderr()).toBe(
        'Error: --identity is required\n' +
          'Usage: echo "passphrase" | dropkeys generate --identity <id>\n',
      )
    })
  })

  it('should return 1 when stdin is empty', async () => {
    mocks.readPassphrase.mockResolvedValue('')
    const code = await generateCommand(['--identity', 'source-a'])
    expect(code).toBe(1)
    expect(output.stderr()).toContain('No passphrase provided on stdin')
    expect(mocks.withKeyManager).not.toHaveBeenCalled()
  })

  it('should generate a key and print its fingerprint', async () => {
    mocks.readPassphrase.mockResolvedValue('test-secret')
    const code = await generateCommand(['--identity', 'source-a'])
    expect(code).toBe(0)
    const fingerprint = await keyring.manager.getSourceKeyFingerprint('source-a')
    expect(output.stdout()).toBe(`${fingerprint}\n`)
  })

  it('should pass --config-dir to the manager context', async () => {
    mocks.readPassphrase.mockResolvedValue('test-secret')
    await generateCommand(['--identity', 'source-a', '--config-dir', '/etc/dropkeys'])
    expect(mocks.withKeyManager).toHaveBeenCalledWith('/etc/dropkeys', expect.any(Function))
  })
})
