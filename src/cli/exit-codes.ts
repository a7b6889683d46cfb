/**
 * Process exit codes returned by command entrypoints.
 */
export const ExitCode = {
  Success: 0,
  Failure: 1,
  InvalidArgs: 2,
} as const

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode]
