export { createLogger, silentLogger, type Logger } from './logger.js'
export { currentStdio, type Stdio } from './stdio.js'
