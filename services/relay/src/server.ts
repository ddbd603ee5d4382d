import fs from 'node:fs'
import path from 'node:path'
import { parseArgs } from 'node:util'
import { config as dotenvConfig } from 'dotenv'
import type { FastifyInstance } from 'fastify'
import { buildApp } from './app.js'
import { describeError } from './devices/plotter/errors.js'
import { buildPlotterRelayConfigFromEnv } from './devices/plotter/utils.js'
import {
    createLogger,
    LogChannel
} from '@plotter-relay/logging'

/**
 * Load environment variables with a clear precedence:
 *   1) .env
 *   2) .env.{NODE_ENV}
 *   3) .env.local
 * Later files override earlier ones.
 */
(function loadEnv() {
    const cwd = process.cwd()
    const env = String(process.env.NODE_ENV || 'development')
    const files = [
        path.resolve(cwd, '.env'),
        path.resolve(cwd, `.env.${env}`),
        path.resolve(cwd, '.env.local')
    ]

    for (const file of files) {
        if (fs.existsSync(file)) {
            dotenvConfig({ path: file, override: true })
        }
    }
})()

const DEFAULT_PORT = 7878

/** --port/-p and --device/-d win over API_PORT and RELAY_DEVICE. */
function readCli(argv: string[]): { port?: number; device?: string } {
    const { values } = parseArgs({
        args: argv,
        options: {
            port: { type: 'string', short: 'p' },
            device: { type: 'string', short: 'd' }
        },
        strict: true
    })

    const out: { port?: number; device?: string } = {}
    if (values.port !== undefined) {
        const n = Number(values.port)
        if (!Number.isInteger(n) || n < 0 || n > 65535) {
            throw new Error(`invalid --port "${values.port}"`)
        }
        out.port = n
    }
    if (values.device !== undefined && values.device.trim() !== '') {
        out.device = values.device.trim()
    }
    return out
}

async function start() {
    const { channel } = createLogger('relay')
    const logProc = channel(LogChannel.process)

    let app: FastifyInstance | null = null
    let shuttingDown = false

    const shutdown = async (reason: string, code: number) => {
        if (shuttingDown) return
        shuttingDown = true
        try {
            logProc.info(`${reason}, shutting down`)
            await app?.close()
            logProc.info('relay closed')
            process.exit(code)
        } catch (err) {
            logProc.error('error during shutdown', { err: describeError(err) })
            process.exit(1)
        }
    }

    try {
        const cli = readCli(process.argv.slice(2))
        const PORT = cli.port ?? Number(process.env.API_PORT ?? DEFAULT_PORT)
        const HOST = process.env.API_HOST ?? '::'

        app = buildApp({
            relay: {
                config: buildPlotterRelayConfigFromEnv(process.env, cli.device),
                // Device open failures and unrecoverable link errors end the process.
                onFatal: (evt) => void shutdown(`fatal ${evt.code}`, 1)
            }
        })
        await app.listen({ port: PORT, host: HOST })

        const env = process.env.NODE_ENV ?? 'development'
        logProc.info(`listening host=${HOST} port=${PORT} env=${env}`)

        process.on('SIGINT', () => void shutdown('received SIGINT', 0))
        process.on('SIGTERM', () => void shutdown('received SIGTERM', 0))
    } catch (err) {
        logProc.error(`failed to start err="${describeError(err)}"`)
        try {
            await app?.close()
        } catch (closeErr) {
            logProc.error(`close after failed start err="${describeError(closeErr)}"`)
        }
        process.exit(1)
    }
}

void start()
