export { ExitCode } from './exit-codes.js'
export { cancelOnSignal } from './signals.js'
export { runMain, programArgs, type Mainer } from './mainer.js'
