// services/relay/src/routes/relay.ts
import type { FastifyPluginAsync } from 'fastify'

/**
 * Accepts { command: string } or { commands: string[] }. Anything else is a
 * malformed body (null); string validity is the queue's business.
 */
export function parseCommandsBody(body: unknown): string[] | null {
    if (typeof body !== 'object' || body === null) return null

    if ('commands' in body) {
        const list = body.commands
        if (!Array.isArray(list)) return null
        const out: string[] = []
        for (const item of list) {
            if (typeof item !== 'string') return null
            out.push(item)
        }
        return out
    }

    if ('command' in body && typeof body.command === 'string') {
        return [body.command]
    }

    return null
}

const relayRoutes: FastifyPluginAsync = async (app) => {
    const relay = app.plotterRelay

    app.post('/api/commands', async (req, reply) => {
        const commands = parseCommandsBody(req.body)
        if (!commands) {
            reply.code(400)
            return { ok: false, error: 'command (string) or commands (string[]) required', accepted: 0 }
        }

        const res = await relay.submitMany(commands)
        if (!res.ok) {
            reply.code(400)
            return { ok: false, error: res.error.code, reason: res.error.message, accepted: res.accepted }
        }
        return { ok: true, accepted: res.accepted }
    })

    app.post('/api/pause', async () => {
        await relay.pause()
        return { ok: true, runState: 'paused' }
    })

    app.post('/api/resume', async () => {
        await relay.resume()
        return { ok: true, runState: 'running' }
    })

    app.post('/api/clear', async () => {
        const cleared = await relay.clear()
        return { ok: true, cleared }
    })

    app.get('/api/state', async () => relay.getState())
}

export default relayRoutes
