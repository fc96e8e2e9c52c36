// packages/logging/src/types.ts

export enum LogChannel {
    client = 'client',
    batch = 'batch',
    sync = 'sync',
    values = 'values',
    transport = 'transport',
    config = 'config',
}

export type ChannelColor =
    | 'blue'
    | 'yellow'
    | 'green'
    | 'magenta'
    | 'cyan'
    | 'red'
    | 'white'
    | 'purple'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal'

export interface LogRecord {
    ts: number
    channel: LogChannel
    emoji: string
    color: ChannelColor
    level: LogLevel
    message: string
}

export type LogListener = (record: LogRecord) => void

export interface LogBuffer {
    push: (record: LogRecord) => void
    getLatest: (n: number) => LogRecord[]
    subscribe: (listener: LogListener) => () => void
}

export interface ChannelLogger {
    debug: (msg: string, extra?: Record<string, unknown>) => void
    info:  (msg: string, extra?: Record<string, unknown>) => void
    warn:  (msg: string, extra?: Record<string, unknown>) => void
    error: (msg: string, extra?: Record<string, unknown>) => void
    fatal: (msg: string, extra?: Record<string, unknown>) => void
}

export interface LoggerBundle {
    base: import('pino').Logger
    channel: (ch: LogChannel) => ChannelLogger
}
