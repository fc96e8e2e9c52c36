import {
    type LogRecord,
    type LogBuffer,
    type LogListener
} from './types.js'

export function makeLogBuffer(limit: number = Number(process.env.LOGS_TO_KEEP ?? 500)): LogBuffer {
    const buf: LogRecord[] = []
    const listeners = new Set<LogListener>()
    const cap = Number.isFinite(limit) && limit > 0 ? Math.floor(limit) : 500

    const push = (record: LogRecord): void => {
        buf.push(record)
        if (buf.length > cap) buf.shift()
        // notify subscribers
        for (const l of listeners) {
            l(record)
        }
    }

    const getLatest = (n: number): LogRecord[] => {
        if (n <= 0) return []
        return buf.slice(-n)
    }

    const subscribe = (listener: LogListener): () => void => {
        listeners.add(listener)
        return () => { listeners.delete(listener) }
    }

    return { push, getLatest, subscribe }
}
