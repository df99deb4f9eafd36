import { describe, it, expect } from 'vitest'
import { Readable } from 'node:stream'
import { readPassphrase, readStdin } from '../../src/stdin.js'

describe('readStdin', () => {
  it('should keep trailing whitespace and newlines', async () => {
    const text = await readStdin(Readable.from([Buffer.from('line one\n'), Buffer.from('  \n\n')]))
    expect(text).toBe('line one\n  \n\n')
  })

  it('should decode multi-byte characters split across chunks', async () => {
    const bytes = Buffer.from('café')
    const text = await readStdin(Readable.from([bytes.subarray(0, 4), bytes.subarray(4)]))
    expect(text).toBe('café')
  })
})

describe('readPassphrase', () => {
  it('should drop the line break echo appends', async () => {
    expect(await readPassphrase(Readable.from(['test-secret\n']))).toBe('test-secret')
  })

  it('should drop a CRLF line break', async () => {
    expect(await readPassphrase(Readable.from(['test-secret\r\n']))).toBe('test-secret')
  })

  it('should keep spaces that are part of the passphrase', async () => {
    expect(await readPassphrase(Readable.from(['  test secret  \n']))).toBe('  test secret  ')
  })
})
