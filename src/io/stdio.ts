import type { Readable, Writable } from 'stream'

/**
 * Standard I/O and working directory of a command.
 */
export interface Stdio {
  /** Current working directory. */
  cwd: string
  stdin: Readable
  stdout: Writable
  stderr: Writable
}

/**
 * Get the Stdio of the current process. cwd is read at the time of the call.
 */
export function currentStdio(): Stdio {
  return {
    cwd: process.cwd(),
    stdin: process.stdin,
    stdout: process.stdout,
    stderr: process.stderr,
  }
}
