import { type ChannelColor, LogChannel } from './types.js'

export const CHANNELS: Record<LogChannel, { emoji: string, color: ChannelColor }> = {
    [LogChannel.client]:    { emoji: '📒', color: 'blue' },
    [LogChannel.batch]:     { emoji: '🧾', color: 'yellow' },
    [LogChannel.sync]:      { emoji: '🔄', color: 'cyan' },
    [LogChannel.values]:    { emoji: '✏️', color: 'green' },
    [LogChannel.transport]: { emoji: '🔗', color: 'magenta' },
    [LogChannel.config]:    { emoji: '⚙️', color: 'purple' },
}

export const ANSI: Record<ChannelColor, string> = {
    blue: '\x1b[34m',
    yellow: '\x1b[33m',
    green: '\x1b[32m',
    magenta: '\x1b[35m',
    cyan: '\x1b[36m',
    red: '\x1b[31m',
    white: '\x1b[37m',
    purple: '\x1b[95m' // bright magenta (purple-ish)
}

export const RESET = '\x1b[0m'

export function isLogChannel(v: unknown): v is LogChannel {
    return typeof v === 'string' && Object.prototype.hasOwnProperty.call(CHANNELS, v)
}

export function channelPrefix(ch: LogChannel): string {
    const meta = CHANNELS[ch]
    return `${ANSI[meta.color]}${meta.emoji} [${ch}]:${RESET}`
}
