import { pino, type Logger, type LoggerOptions, type LogFn } from 'pino'
import { PinoPretty } from 'pino-pretty'
import {
    type LogLevel,
    type LoggerBundle,
    type ChannelLogger,
    type LogBuffer,
    LogChannel
} from './types.js'
import { CHANNELS, channelPrefix, isLogChannel } from './channels.js'

export function createLogger(service: string, logBuf?: LogBuffer): LoggerBundle {
    const PRETTY = String(process.env.PRETTY_LOGS ?? 'true').toLowerCase() === 'true'
    const LOG_LEVEL = process.env.LOG_LEVEL ?? 'info'

    const options: LoggerOptions = {
        level: LOG_LEVEL,
        base: { service },
        formatters: {
            log(obj) { return obj }
        },
        hooks: {
            logMethod(this: Logger, args: unknown[], method: LogFn): void {
                const first = args[0]
                const ch = typeof first === 'object' && first !== null && 'channel' in first
                    ? first.channel
                    : undefined

                if (isLogChannel(ch)) {
                    const prefix = channelPrefix(ch)

                    if (args.length >= 2 && typeof args[1] === 'string') {
                        args[1] = `${prefix} ${args[1]}`
                    } else if (args.length >= 1 && typeof args[0] === 'string') {
                        args[0] = `${prefix} ${args[0]}`
                    } else {
                        args.push(prefix)
                    }
                }

                Reflect.apply(method, this, args)
            }
        }
    }

    const destination = PRETTY
        ? PinoPretty({
            translateTime: 'SYS:standard', // [YYYY-MM-DD HH:mm:ss.SSS +0000]
            colorize: true,
            singleLine: false,
            ignore: 'pid,hostname,service,channel'
        })
        : undefined

    const base: Logger = destination ? pino(options, destination) : pino(options)

    const fanout = (channel: LogChannel, level: LogLevel, message: string): void => {
        if (!logBuf) return
        const meta = CHANNELS[channel]
        logBuf.push({
            ts: Date.now(),
            channel,
            emoji: meta.emoji,
            color: meta.color,
            level,
            message
        })
    }

    const channel = (ch: LogChannel): ChannelLogger => {
        const write = (level: LogLevel, msg: string, extra?: Record<string, unknown>): void => {
            base[level](extra ? { channel: ch, ...extra } : { channel: ch }, msg)
            fanout(ch, level, msg)
        }

        return {
            debug: (msg, extra) => write('debug', msg, extra),
            info: (msg, extra) => write('info', msg, extra),
            warn: (msg, extra) => write('warn', msg, extra),
            error: (msg, extra) => write('error', msg, extra),
            fatal: (msg, extra) => write('fatal', msg, extra),
        }
    }

    return { base, channel }
}
