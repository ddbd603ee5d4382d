import {
    type ClientLog,
    type ClientLogBuffer,
    type ClientLogListener
} from './types.js'

const DEFAULT_LIMIT = 500

/**
 * Fixed-capacity ring of recent log entries. Once full, each push overwrites
 * the oldest slot; readers always get entries oldest first.
 */
export function makeClientBuffer(limit: number = Number(process.env.CLIENT_LOGS_TO_KEEP ?? DEFAULT_LIMIT)): ClientLogBuffer {
    const cap = Number.isFinite(limit) && limit > 0 ? Math.trunc(limit) : DEFAULT_LIMIT
    const ring: ClientLog[] = []
    let next = 0
    const listeners = new Set<ClientLogListener>()

    const push = (log: ClientLog): void => {
        if (ring.length < cap) ring.push(log)
        else ring[next] = log
        next = (next + 1) % cap

        for (const l of listeners) l(log)
    }

    const getLatest = (n: number): ClientLog[] => {
        const count = Math.min(Math.max(0, Math.trunc(n)), ring.length)
        if (count === 0) return []

        // Before the ring wraps, next === ring.length and this is a plain tail slice.
        const out: ClientLog[] = []
        for (let i = count; i > 0; i--) {
            out.push(ring[(next - i + cap) % cap])
        }
        return out
    }

    const size = (): number => ring.length

    const subscribe = (listener: ClientLogListener): () => void => {
        listeners.add(listener)
        return () => { listeners.delete(listener) }
    }

    return { push, getLatest, size, subscribe }
}
