export * from './types.js'
export { CHANNELS, ANSI, RESET, isLogChannel, channelPrefix } from './channels.js'
export { makeLogBuffer } from './buffer.js'
export { createLogger } from './pino.js'
