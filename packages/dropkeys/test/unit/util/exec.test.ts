import { describe, it, expect } from 'vitest'
import { createReadStream } from 'node:fs'
import { Readable } from 'node:stream'
import { execCommand, execCommandFull } from '../../../src/util/exec.js'

describe('execCommand', () => {
  it('returns trimmed stdout on success', async () => {
    const result = await execCommand('echo', ['  hello  '])
    expect(result).toBe('hello')
  })

  it('throws on non-zero exit code with stderr in message', async () => {
    await expect(execCommand('sh', ['-c', 'echo bad >&2; exit 1'])).rejects.toThrow(
      'Command failed with exit code 1: bad\n',
    )
  })

  it('throws and includes the exit code in the message', async () => {
    await expect(execCommand('sh', ['-c', 'exit 2'])).rejects.toThrow(/exit code 2/)
  })
})

describe('execCommandFull', () => {
  it('returns full result with stdout, stderr, and exitCode on success', async () => {
    const result = await execCommandFull('echo', ['hello'])
    expect(result.stdout).toBe('hello\n')
    expect(result.stderr).toBe('')
    expect(result.exitCode).toBe(0)
  })

  it('returns non-zero exitCode without throwing', async () => {
    const result = await execCommandFull('sh', ['-c', 'exit 42'])
    expect(result.exitCode).toBe(42)
  })

  it('captures stderr output', async () => {
    const result = await execCommandFull('sh', ['-c', 'echo errout >&2'])
    expect(result.stderr).toBe('errout\n')
    expect(result.exitCode).toBe(0)
  })

  it('kills the process and rejects after timeout', async () => {
    await expect(execCommandFull('sleep', ['10'], { timeoutMs: 50 })).rejects.toThrow(
      'Command timed out after 50ms',
    )
  }, 5000)

  it('pipes string stdin to the process', async () => {
    const result = await execCommandFull('cat', [], { stdin: 'from-stdin' })
    expect(result.stdout).toBe('from-stdin')
    expect(result.exitCode).toBe(0)
  })

  it('pipes a readable stream to the process', async () => {
    const result = await execCommandFull('cat', [], { stdin: Readable.from(['a', 'b', 'c']) })
    expect(result.stdout).toBe('abc')
  })

  it('rejects with the stream error when a stdin stream fails', async () => {
    await expect(
      execCommandFull('cat', [], { stdin: createReadStream('/nonexistent/submission.bin') }),
    ).rejects.toThrow(/ENOENT/)
  })

  it('rejects with the stream error when a stdin stream is cut off', async () => {
    const upload = new Readable({ read() {} })
    upload.push('partial')
    setImmediate(() => upload.destroy(new Error('upload aborted')))
    await expect(execCommandFull('cat', [], { stdin: upload })).rejects.toThrow('upload aborted')
  })

  it('keeps binary stdout intact in stdoutBytes', async () => {
    const bytes = Uint8Array.from([0x00, 0xff, 0x80, 0x0a])
    const result = await execCommandFull('cat', [], { stdin: bytes })
    expect([...result.stdoutBytes]).toEqual([0x00, 0xff, 0x80, 0x0a])
  })

  it('passes the given environment to the process', async () => {
    const result = await execCommandFull('sh', ['-c', 'printf %s "$USERNAME"'], {
      env: { ...process.env, USERNAME: 'www-data' },
    })
    expect(result.stdout).toBe('www-data')
  })
})
