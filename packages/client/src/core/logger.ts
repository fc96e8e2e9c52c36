// packages/client/src/core/logger.ts

/**
 * Minimal logger surface used by library components. ChannelLogger from
 * @sheetmirror/logging satisfies it.
 *
 * Messages follow the "kind=... key=value" convention.
 */
export type LoggerLike = {
  debug(msg: string, extra?: Record<string, unknown>): void
  info(msg: string, extra?: Record<string, unknown>): void
  warn(msg: string, extra?: Record<string, unknown>): void
  error(msg: string, extra?: Record<string, unknown>): void
}

export const noopLogger: LoggerLike = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
}
