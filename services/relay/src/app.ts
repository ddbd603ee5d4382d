import Fastify, {
    type FastifyInstance,
    type FastifyServerOptions,
    type FastifyRequest,
    type FastifyReply
} from 'fastify'
import cors from '@fastify/cors'

import {
    createLogger,
    makeClientBuffer,
    LogChannel,
    type ClientLogBuffer
} from '@plotter-relay/logging'

import wsPlugin from './plugins/ws.js'
import plotterRelayPlugin, { type PlotterRelayPluginOptions } from './plugins/plotterRelay.js'
import relayRoutes from './routes/relay.js'

declare module 'fastify' {
    interface FastifyInstance {
        clientBuf: ClientLogBuffer
    }
}

export interface BuildAppOptions {
    fastify?: FastifyServerOptions
    relay?: PlotterRelayPluginOptions
    clientBuf?: ClientLogBuffer
}

// ---- Request logging config (env) ----
const REQUEST_VERBOSE = String(process.env.REQUEST_VERBOSE ?? 'false').toLowerCase() === 'true'
const REQUEST_SAMPLE = Math.max(1, Number(process.env.REQUEST_SAMPLE ?? '1') || 1)
// --------------------------------------

const LOGS_DEFAULT = 100

export const APP_NAME = 'plotter-relay'
export const APP_VERSION = '0.1.0'

export function buildApp(opts: BuildAppOptions = {}): FastifyInstance {
    const clientBuf = opts.clientBuf ?? makeClientBuffer()
    const { channel } = createLogger('relay', clientBuf)
    const logApp = channel(LogChannel.app)
    const logReq = channel(LogChannel.request)

    const startedAt = new Map<string, number>()
    let reqCounter = 0

    const app = Fastify({ logger: false, ...opts.fastify })
    app.decorate('clientBuf', clientBuf)

    void app.register(cors, { origin: true })

    void app.register(plotterRelayPlugin, opts.relay ?? {})
    void app.register(relayRoutes)
    void app.register(wsPlugin)

    // ---------- Request/Response logging hooks ----------
    app.addHook('onRequest', async (req: FastifyRequest) => {
        const shouldLog = ++reqCounter % REQUEST_SAMPLE === 0
        if (!shouldLog) return

        startedAt.set(req.id, Date.now())
        logReq.info(`${req.method} ${req.url}`)

        if (REQUEST_VERBOSE) {
            logReq.debug('request detail', { id: req.id, ip: req.ip })
        }
    })

    app.addHook('onResponse', async (req: FastifyRequest, reply: FastifyReply) => {
        const start = startedAt.get(req.id)
        if (start === undefined) return
        startedAt.delete(req.id)

        const ms = Date.now() - start
        logReq.info(`${req.method} ${req.url} → ${reply.statusCode} (${ms} ms)`)
    })
    // ---------------------------------------------------

    app.get<{ Querystring: { n?: string } }>('/api/logs', async (req) => {
        const n = Number(req.query.n ?? LOGS_DEFAULT)
        const count = Number.isFinite(n) && n > 0 ? Math.trunc(n) : LOGS_DEFAULT
        return { entries: clientBuf.getLatest(count), total: clientBuf.size() }
    })

    // Health / ready
    app.get('/health', async () => ({ status: 'ok' }))

    app.get('/ready', async () => {
        const relay = app.plotterRelay
        return {
            ready: relay.getPhase() === 'connected',
            phase: relay.getPhase(),
            device: relay.getDevicePath()
        }
    })

    app.get('/version', async () => ({ name: APP_NAME, version: APP_VERSION }))

    app.setNotFoundHandler((_req, reply) => {
        reply.status(404).send({ ok: false, error: 'Not found' })
    })

    logApp.info('relay app built')
    return app
}
