import { describe, it, expect } from 'vitest'

import { makeLogBuffer } from '../src/buffer.js'
import { LogChannel, type LogRecord } from '../src/types.js'

function record(message: string): LogRecord {
    return { ts: 1, channel: LogChannel.batch, emoji: '🧾', color: 'yellow', level: 'info', message }
}

describe('makeLogBuffer', () => {
    it('keeps only the most recent records', () => {
        const buf = makeLogBuffer(3)
        for (const m of ['a', 'b', 'c', 'd', 'e']) buf.push(record(m))

        expect(buf.getLatest(10).map(r => r.message)).toEqual(['c', 'd', 'e'])
        expect(buf.getLatest(2).map(r => r.message)).toEqual(['d', 'e'])
        expect(buf.getLatest(0)).toEqual([])
    })

    it('falls back to the default size for a bad limit', () => {
        const buf = makeLogBuffer(Number.NaN)
        for (let i = 0; i < 510; i++) buf.push(record(String(i)))
        expect(buf.getLatest(1000)).toHaveLength(500)
    })

    it('notifies subscribers until they unsubscribe', () => {
        const buf = makeLogBuffer(5)
        const seen: string[] = []
        const unsubscribe = buf.subscribe(r => { seen.push(r.message) })

        buf.push(record('first'))
        unsubscribe()
        buf.push(record('second'))

        expect(seen).toEqual(['first'])
    })
})
