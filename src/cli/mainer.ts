import { ExitCode } from './exit-codes.js'
import { errorMessage } from '../flags/errors.js'
import { currentStdio, type Stdio } from '../io/stdio.js'

/**
 * A command entrypoint. argv[0] is the program name or path.
 */
export interface Mainer {
  main(argv: string[], stdio: Stdio): ExitCode | Promise<ExitCode>
}

/**
 * Arguments of the current process with the program path first, as Parser
 * expects them.
 */
export function programArgs(): string[] {
  return process.argv.slice(1)
}

/**
 * Run a command and store its exit code in process.exitCode.
 *
 * A thrown error is written to stderr and reported as Failure.
 */
export async function runMain(
  mainer: Mainer,
  argv: string[] = programArgs(),
  stdio: Stdio = currentStdio()
): Promise<ExitCode> {
  let code: ExitCode
  try {
    code = await mainer.main(argv, stdio)
  } catch (error) {
    stdio.stderr.write(`${errorMessage(error)}\n`)
    code = ExitCode.Failure
  }
  process.exitCode = code
  return code
}
