import fp from 'fastify-plugin'
import websocket from '@fastify/websocket'
import type { FastifyInstance } from 'fastify'
import type { RawData, WebSocket as WSSocket } from 'ws'
import {
    createLogger,
    makeClientBuffer,
    LogChannel,
    type ClientLogBuffer,
    type ClientLog
} from '@plotter-relay/logging'
import type { PlotterRelayService } from '../devices/plotter/PlotterRelayService.js'
import { describeError } from '../devices/plotter/errors.js'

// ---------------------------
// Log streaming configuration
// ---------------------------
const LEVEL_ORDER: Record<ClientLog['level'], number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    fatal: 50
}

function readMinLevel(): number {
    const raw = (process.env.LOG_LEVEL_MIN ?? 'debug').toLowerCase()
    for (const [name, n] of Object.entries(LEVEL_ORDER)) {
        if (name === raw) return n
    }
    return LEVEL_ORDER.debug
}

const MIN_LEVEL_NUM = readMinLevel()
const LOGS_SNAPSHOT_DEFAULT = 200

function allowLog(e: ClientLog): boolean {
    return LEVEL_ORDER[e.level] >= MIN_LEVEL_NUM
}

// ---------------------------
// Relay message protocol
// ---------------------------
export type RelayReply = Record<string, unknown> & { type: string }

/**
 * One inbound frame → one reply frame. Kept apart from the socket so the
 * protocol can be exercised without a network.
 */
export async function handleRelayMessage(relay: PlotterRelayService, text: string): Promise<RelayReply> {
    let msg: unknown
    try {
        msg = JSON.parse(text)
    } catch {
        return { type: 'error', error: 'malformed message' }
    }

    if (typeof msg !== 'object' || msg === null || !('type' in msg) || typeof msg.type !== 'string') {
        return { type: 'error', error: 'malformed message' }
    }

    switch (msg.type) {
        case 'command': {
            if (!('command' in msg) || typeof msg.command !== 'string') {
                return { type: 'command.ack', ok: false, error: 'InvalidCommand', reason: 'command (string) required' }
            }
            const res = await relay.submit(msg.command)
            if (!res.ok) {
                return { type: 'command.ack', ok: false, error: res.error.code, reason: res.error.message }
            }
            return { type: 'command.ack', ok: true }
        }

        case 'pause': {
            await relay.pause()
            return { type: 'pause.ack', ok: true }
        }

        case 'resume': {
            await relay.resume()
            return { type: 'resume.ack', ok: true }
        }

        case 'clear': {
            const cleared = await relay.clear()
            return { type: 'clear.ack', ok: true, cleared }
        }

        case 'state': {
            const state = await relay.getState()
            return { type: 'state', ...state }
        }

        case 'ping': {
            return { type: 'pong', ts: Date.now() }
        }

        default:
            return { type: 'error', error: `unknown message type "${msg.type}"` }
    }
}

export default fp(async function wsPlugin(app: FastifyInstance) {
    // Reuse the app-wide buffer so socket clients see every channel.
    const clientBuf: ClientLogBuffer = app.hasDecorator('clientBuf') ? app.clientBuf : makeClientBuffer()

    const { channel } = createLogger('relay:ws', clientBuf)
    const logWs = channel(LogChannel.websocket)

    await app.register(websocket, {
        options: {
            perMessageDeflate: true,
            clientTracking: true
        }
    })

    const sockets = new Set<WSSocket>()

    const sendTo = (ws: WSSocket, payload: string) => {
        try {
            if (ws.readyState === ws.OPEN) ws.send(payload)
        } catch (e) {
            logWs.debug('send failed', { err: describeError(e) })
        }
    }

    // Live logs -> broadcast
    const unsubscribeLogs = clientBuf.subscribe((entry: ClientLog) => {
        if (!allowLog(entry)) return
        const payload = JSON.stringify({ type: 'logs.append', entries: [entry] })
        for (const ws of sockets) sendTo(ws, payload)
    })

    app.get('/ws', { websocket: true }, (socket: WSSocket) => {
        sockets.add(socket)

        const snapshotCount = Math.max(
            0,
            Number(process.env.CLIENT_LOGS_SNAPSHOT ?? LOGS_SNAPSHOT_DEFAULT) || 0
        )
        if (snapshotCount > 0) {
            const entries = clientBuf.getLatest(snapshotCount).filter(allowLog)
            if (entries.length > 0) {
                sendTo(socket, JSON.stringify({ type: 'logs.history', entries }))
            }
        }

        logWs.info('client connected')

        // Frames from one socket are handled in arrival order so a client
        // streaming commands gets them queued in the order it sent them.
        let chain: Promise<void> = Promise.resolve()

        socket.on('message', (data: RawData) => {
            const text = data.toString()
            chain = chain
                .then(async () => {
                    const reply = await handleRelayMessage(app.plotterRelay, text)
                    sendTo(socket, JSON.stringify(reply))
                })
                .catch((e: unknown) => {
                    logWs.warn('message handling failed', { err: describeError(e) })
                })
        })

        socket.on('close', () => {
            sockets.delete(socket)
            logWs.info('client disconnected')
        })
    })

    app.addHook('onClose', async () => {
        for (const ws of sockets) {
            ws.terminate()
        }
        sockets.clear()
        unsubscribeLogs()
    })
}, {
    name: 'relay-ws',
    dependencies: ['plotter-relay-plugin']
})
