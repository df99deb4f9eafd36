/**
 * Read all of stdin as UTF-8 text, exactly as given.
 *
 * @internal
 */
export async function readStdin(input: AsyncIterable<unknown> = process.stdin): Promise<string> {
  const chunks: Buffer[] = []
  for await (const chunk of input) {
    if (chunk instanceof Buffer) {
      chunks.push(chunk)
    } else if (typeof chunk === 'string') {
      chunks.push(Buffer.from(chunk))
    } else {
      chunks.push(Buffer.from(String(chunk)))
    }
  }
  return Buffer.concat(chunks).toString('utf8')
}

/**
 * Read a passphrase from stdin, without the line break `echo` appends.
 *
 * @internal
 */
export async function readPassphrase(
  input: AsyncIterable<unknown> = process.stdin,
): Promise<string> {
  const text = await readStdin(input)
  return text.replace(/\r?\n$/, '')
}
