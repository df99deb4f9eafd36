/**
 * Parsing of the engine's machine-readable status stream.
 *
 * @remarks
 * Every engine invocation runs with `--status-fd 2`, so stderr interleaves
 * `[GNUPG:] KEYWORD args...` status lines with human-readable diagnostics.
 * Each operation declares the keywords it understands; anything else is
 * rejected with {@link EngineStatusError} rather than silently ignored.
 */

import { EngineStatusError } from '../errors.js'

const STATUS_PREFIX = '[GNUPG:] '

/** A single status line. */
export interface StatusLine {
  keyword: string
  args: string[]
}

/** Status lines and diagnostics split out of an engine's stderr. */
export interface ParsedStatus {
  lines: StatusLine[]
  /** Non-status stderr output, joined with newlines. */
  diagnostics: string
}

/** Adapter operations with their own status vocabulary. */
export type EngineOperation = 'encrypt' | 'decrypt' | 'generate' | 'delete'

/** Keywords that appear in every operation's status stream. */
const COMMON_KEYWORDS = [
  'KEY_CONSIDERED',
  'PINENTRY_LAUNCHED',
  'PROGRESS',
  'ERROR',
  'FAILURE',
  'WARNING',
  'NODATA',
  'INQUIRE_MAXLEN',
]

/**
 * Keywords recognized per operation, beyond {@link COMMON_KEYWORDS}.
 *
 * @remarks
 * - `DECRYPTION_COMPLIANCE_MODE` is emitted by some engine builds during
 *   decryption and is informational only.
 * - `KEY_CONSIDERED` and `PINENTRY_LAUNCHED` are emitted by newer engines
 *   during deletion, next to the documented `DELETE_PROBLEM`.
 */
const OPERATION_KEYWORDS: Record<EngineOperation, readonly string[]> = {
  encrypt: [
    'BEGIN_ENCRYPTION',
    'END_ENCRYPTION',
    'ENCRYPTION_COMPLIANCE_MODE',
    'INV_RECP',
    'NO_RECP',
    'KEYEXPIRED',
    'KEYREVOKED',
    'SIGEXPIRED',
  ],
  decrypt: [
    'ENC_TO',
    'USERID_HINT',
    'NEED_PASSPHRASE',
    'GOOD_PASSPHRASE',
    'BAD_PASSPHRASE',
    'MISSING_PASSPHRASE',
    'NO_SECKEY',
    'BEGIN_DECRYPTION',
    'DECRYPTION_KEY',
    'DECRYPTION_INFO',
    'DECRYPTION_COMPLIANCE_MODE',
    'DECRYPTION_OKAY',
    'DECRYPTION_FAILED',
    'END_DECRYPTION',
    'PLAINTEXT',
    'PLAINTEXT_LENGTH',
    'GOODMDC',
    'BADMDC',
    'UNEXPECTED',
  ],
  generate: ['KEY_CREATED', 'KEY_NOT_CREATED'],
  delete: ['DELETE_PROBLEM'],
}

/** Split raw stderr into status lines and diagnostics. */
export function parseStatusOutput(stderr: string): ParsedStatus {
  const lines: StatusLine[] = []
  const diagnostics: string[] = []

  for (const raw of stderr.split('\n')) {
    if (raw.startsWith(STATUS_PREFIX)) {
      const [keyword, ...args] = raw.slice(STATUS_PREFIX.length).trim().split(' ')
      if (keyword !== undefined && keyword !== '') {
        lines.push({ keyword, args })
      }
    } else if (raw.trim() !== '') {
      diagnostics.push(raw)
    }
  }

  return { lines, diagnostics: diagnostics.join('\n') }
}

/**
 * Parse stderr for an operation, rejecting keywords that operation does not
 * recognize.
 * @throws {@link EngineStatusError} on an unrecognized keyword
 */
export function readStatus(operation: EngineOperation, stderr: string): ParsedStatus {
  const parsed = parseStatusOutput(stderr)
  const known = new Set([...COMMON_KEYWORDS, ...OPERATION_KEYWORDS[operation]])
  for (const { keyword } of parsed.lines) {
    if (!known.has(keyword)) {
      throw new EngineStatusError(
        `Unknown status message during ${operation}: ${keyword}`,
        keyword,
        operation,
      )
    }
  }
  return parsed
}

/** Find the first status line with the given keyword. */
export function findStatus(parsed: ParsedStatus, keyword: string): StatusLine | undefined {
  return parsed.lines.find((line) => line.keyword === keyword)
}

/** Reason codes reported with `DELETE_PROBLEM`. */
const DELETE_PROBLEM_REASONS: Record<string, string> = {
  '1': 'No such key',
  '2': 'Must delete secret key first',
  '3': 'Ambiguous specification',
  '4': 'Key is stored on a smartcard',
}

/** Describe a `DELETE_PROBLEM` reason code. */
export function describeDeleteProblem(code: string | undefined): string {
  if (code === undefined) {
    return 'Unknown error'
  }
  return DELETE_PROBLEM_REASONS[code] ?? `Unknown error: ${code}`
}
