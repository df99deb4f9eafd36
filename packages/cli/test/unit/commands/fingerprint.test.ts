import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import type { KeyManager } from 'dropkeys'
import { TestKeyring } from '@dropkeys/test-helpers'
import { captureOutput } from '../../helpers/output.js'
import type { CapturedOutput } from '../../helpers/output.js'

const mocks = vi.hoisted(() => ({ withKeyManager: vi.fn() }))

vi.mock('../../../src/context.js', () => ({ withKeyManager: mocks.withKeyManager }))

import { fingerprintCommand } from '../../../src/commands/fingerprint.js'

describe('fingerprintCommand', () => {
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

  it('should return 1 with a usage hint when --identity is missing', async () => {
    const code = await fingerprintCommand([])
    expect(code).toBe(1)
    expect(output.stderr()).toBe(
      'Error: --identity is required\nUsage: dropkeys fingerprint --identity <id>\n',
    )
    expect(mocks.withKeyManager).not.toHaveBeenCalled()
  })

  it('should print the fingerprint of a source key', async () => {
    const fingerprint = await keyring.manager.generateSourceKeyPair({
      identity: 'source-a',
      passphrase: 'test-secret',
    })
    const code = await fingerprintCommand(['--identity', 'source-a'])
    expect(code).toBe(0)
    expect(output.stdout()).toBe(`${fingerprint}\n`)
  })

  it('should report an unknown identity on stderr', async () => {
    const code = await fingerprintCommand(['--identity', 'ghost'])
    expect(code).toBe(1)
    expect(output.stdout()).toBe('')
    expect(output.stderr()).toBe('KeyNotFoundError: No source key for identity ghost\n')
  })
})
