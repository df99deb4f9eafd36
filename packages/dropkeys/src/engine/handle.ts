/**
 * A configured way of invoking the engine binary.
 */

import { execCommandFull } from '../util/exec.js'
import type { ExecCommandResult, ExecInput } from '../util/exec.js'

/** Options fixed for the lifetime of a handle. */
export interface GpgHandleOptions {
  /** Engine binary name or path, e.g. `'gpg2'`. */
  binary: string
  /** Keyring directory passed as `--homedir`. */
  homedir: string
  /** Extra options prepended to every invocation. */
  options: string[]
  /** Value of `USERNAME` in the engine's environment. */
  username: string
}

/**
 * Invokes the engine with a fixed homedir and option set.
 *
 * @remarks
 * Every invocation runs non-interactively and reports machine-readable status
 * on stderr (`--status-fd 2`).
 *
 * @internal
 */
export class GpgHandle {
  readonly binary: string
  readonly homedir: string
  readonly options: readonly string[]
  readonly #env: NodeJS.ProcessEnv

  constructor(options: GpgHandleOptions) {
    this.binary = options.binary
    this.homedir = options.homedir
    this.options = [...options.options]
    this.#env = { ...process.env, USERNAME: options.username }
  }

  /** The full argument vector for an invocation. */
  argv(args: string[]): string[] {
    return [
      '--homedir',
      this.homedir,
      '--no-tty',
      '--batch',
      '--status-fd',
      '2',
      ...this.options,
      ...args,
    ]
  }

  /** Run the engine with the handle's options followed by `args`. */
  run(args: string[], stdin?: ExecInput): Promise<ExecCommandResult> {
    return execCommandFull(this.binary, this.argv(args), { stdin, env: this.#env })
  }
}
