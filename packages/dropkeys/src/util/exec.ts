/**
 * CLI spawn wrapper for executing external commands.
 */

import { spawn } from 'node:child_process'
import { Readable, pipeline } from 'node:stream'

/** Data that can be written to a child process's stdin. */
export type ExecInput = string | Uint8Array | Readable

/** Options for command execution. */
export interface ExecCommandOptions {
  /** Input to write to stdin */
  stdin?: ExecInput | undefined
  /** Timeout in milliseconds */
  timeoutMs?: number | undefined
  /** Environment for the child process. Defaults to the parent's. */
  env?: NodeJS.ProcessEnv | undefined
}

/** Result of a command execution. */
export interface ExecCommandResult {
  stdout: string
  /** Raw stdout, for commands that emit binary data. */
  stdoutBytes: Buffer
  stderr: string
  exitCode: number
}

/**
 * Execute a command and return stdout.
 * @throws Error if the command exits with a non-zero code.
 */
export async function execCommand(
  command: string,
  args: string[],
  options?: ExecCommandOptions,
): Promise<string> {
  const result = await execCommandFull(command, args, options)
  if (result.exitCode !== 0) {
    throw new Error(`Command failed with exit code ${String(result.exitCode)}: ${result.stderr}`)
  }
  return result.stdout.trim()
}

/**
 * Execute a command and return the full result.
 */
export function execCommandFull(
  command: string,
  args: string[],
  options?: ExecCommandOptions,
): Promise<ExecCommandResult> {
  return new Promise((resolve, reject) => {
    const stdin = options?.stdin
    const proc = spawn(command, args, {
      stdio: [stdin !== undefined ? 'pipe' : 'ignore', 'pipe', 'pipe'],
      env: options?.env ?? process.env,
    })
    const stdoutChunks: Buffer[] = []
    let stderr = ''
    let timer: ReturnType<typeof setTimeout> | undefined

    proc.stdout?.on('data', (data: Buffer) => {
      stdoutChunks.push(data)
    })

    proc.stderr?.on('data', (data: Buffer) => {
      stderr += data.toString()
    })

    if (stdin !== undefined && proc.stdin) {
      // The child may exit before consuming all input; its exit status
      // reports the failure, so a broken pipe here is not an error.
      proc.stdin.on('error', (error: NodeJS.ErrnoException) => {
        if (error.code !== 'EPIPE') {
          reject(error)
        }
      })
      if (stdin instanceof Readable) {
        pipeline(stdin, proc.stdin, (error) => {
          if (error !== null && error.code !== 'EPIPE') {
            proc.kill('SIGTERM')
            reject(error)
          }
        })
      } else {
        proc.stdin.write(stdin)
        proc.stdin.end()
      }
    }

    if (options?.timeoutMs !== undefined) {
      timer = setTimeout(() => {
        proc.kill('SIGTERM')
        reject(new Error(`Command timed out after ${String(options.timeoutMs)}ms`))
      }, options.timeoutMs)
    }

    proc.on('close', (code) => {
      if (timer !== undefined) {
        clearTimeout(timer)
      }
      const stdoutBytes = Buffer.concat(stdoutChunks)
      resolve({ stdout: stdoutBytes.toString(), stdoutBytes, stderr, exitCode: code ?? 1 })
    })

    proc.on('error', (error) => {
      reject(error)
    })
  })
}
