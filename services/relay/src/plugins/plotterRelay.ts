// services/relay/src/plugins/plotterRelay.ts

import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

import {
    createLogger,
    LogChannel,
    type ChannelLogger,
} from '@plotter-relay/logging'
import { PlotterRelayService } from '../devices/plotter/PlotterRelayService.js'
import type {
    CommandTransceiver,
    FatalErrorEvent,
    PlotterRelayConfig,
    PlotterRelayEvent,
    PlotterRelayEventSink,
} from '../devices/plotter/types.js'
import { describeError } from '../devices/plotter/errors.js'
import { buildPlotterRelayConfigFromEnv } from '../devices/plotter/utils.js'

// ---- Fastify decoration ----------------------------------------------------

declare module 'fastify' {
    interface FastifyInstance {
        plotterRelay: PlotterRelayService
    }
}

export interface PlotterRelayPluginOptions {
    /** Defaults to buildPlotterRelayConfigFromEnv(). */
    config?: PlotterRelayConfig
    /** Replaces serial discovery (tests, simulators). */
    connect?: (signal: AbortSignal) => Promise<CommandTransceiver | null>
    /** Invoked once a fatal-error event has been logged. */
    onFatal?: (evt: FatalErrorEvent) => void
    shutdownGraceMs?: number
}

// ---- Event sink using relay logging ----------------------------------------

class PlotterRelayLoggerEventSink implements PlotterRelayEventSink {
    private readonly logDevice: ChannelLogger
    private readonly logDispatch: ChannelLogger
    private readonly logIntake: ChannelLogger
    private readonly verbose =
        process.env.RELAY_DEBUG === '1' || process.env.RELAY_DEBUG === 'true'

    constructor(app: FastifyInstance) {
        const { channel } = createLogger('plotter-relay', app.clientBuf)
        this.logDevice = channel(LogChannel.device)
        this.logDispatch = channel(LogChannel.dispatch)
        this.logIntake = channel(LogChannel.intake)
    }

    publish(evt: PlotterRelayEvent): void {
        const ts = new Date(evt.at).toISOString()

        switch (evt.kind) {
            case 'command-queued': {
                // One line per command is too loud for long plots.
                if (this.verbose) {
                    this.logIntake.debug(`kind=command-queued ts=${ts} command="${evt.command}" queueLength=${evt.queueLength}`)
                }
                break
            }

            case 'command-rejected': {
                this.logIntake.warn(`kind=command-rejected ts=${ts} reason="${evt.reason}"`)
                break
            }

            case 'command-sent': {
                this.logDispatch.info(`Writing to serial port: ${evt.command}`)
                break
            }

            case 'command-completed': {
                this.logDispatch.info(
                    `Response from serial port: ${evt.response}`,
                    { command: evt.command, durationMs: evt.durationMs }
                )
                break
            }

            case 'command-requeued': {
                this.logDispatch.warn(`kind=command-requeued ts=${ts} command="${evt.command}" reason="${evt.reason}"`)
                break
            }

            case 'command-discarded': {
                this.logDispatch.warn(`kind=command-discarded ts=${ts} command="${evt.command}" reason="${evt.reason}"`)
                break
            }

            case 'queue-cleared': {
                this.logIntake.info(`kind=queue-cleared ts=${ts} dropped=${evt.dropped}`)
                break
            }

            case 'run-state-changed': {
                this.logIntake.info(`kind=run-state-changed ts=${ts} runState=${evt.runState}`)
                break
            }

            case 'device-searching': {
                this.logDevice.info(`Waiting for serial connection... selector=${evt.selector}`)
                break
            }

            case 'device-connected': {
                this.logDevice.info(`Serial connection ${evt.path} opened baud=${evt.baudRate}`)
                break
            }

            case 'device-disconnected': {
                this.logDevice.warn(`kind=device-disconnected ts=${ts} port=${evt.path} reason=${evt.reason}`)
                break
            }

            case 'recoverable-error': {
                this.logDevice.warn(`kind=recoverable-error ts=${ts} code=${evt.code} error=${evt.error}`)
                break
            }

            case 'fatal-error': {
                this.logDevice.fatal(`kind=fatal-error ts=${ts} code=${evt.code} error=${evt.error}`)
                break
            }
        }
    }
}

// ---- Fanout sink: logger + fatal hook --------------------------------------

class FanoutPlotterRelayEventSink implements PlotterRelayEventSink {
    private readonly sinks: PlotterRelayEventSink[]

    constructor(private readonly onSinkError: (err: unknown) => void, ...sinks: PlotterRelayEventSink[]) {
        this.sinks = sinks
    }

    publish(evt: PlotterRelayEvent): void {
        for (const sink of this.sinks) {
            try {
                sink.publish(evt)
            } catch (err) {
                // A bad consumer must not stall the dispatch loop.
                this.onSinkError(err)
            }
        }
    }
}

// ---- Plugin implementation -------------------------------------------------

export default fp<PlotterRelayPluginOptions>(async function plotterRelayPlugin(app: FastifyInstance, opts) {
    const { channel } = createLogger('plotter-relay-plugin', app.clientBuf)
    const logPlugin = channel(LogChannel.app)

    const config = opts.config ?? buildPlotterRelayConfigFromEnv()

    logPlugin.info(
        `plotter-relay config device=${config.devicePath || '<auto>'} identifier=${config.deviceIdentifier} usbIds=${config.usbIds.map(u => `${u.vendorId}:${u.productId}`).join(',') || '<none>'} baudRate=${config.baudRate} readTimeoutMs=${config.readTimeoutMs} readAttempts=${config.readAttempts || 'unbounded'} reconnect=${config.reconnect} timeoutPolicy=${config.timeoutPolicy}`
    )

    const events = new FanoutPlotterRelayEventSink(
        (err) => logPlugin.error('event sink failed', { err: describeError(err) }),
        new PlotterRelayLoggerEventSink(app),
        {
            publish(evt: PlotterRelayEvent): void {
                if (evt.kind === 'fatal-error') opts.onFatal?.(evt)
            },
        }
    )

    const service = new PlotterRelayService(config, {
        events,
        connect: opts.connect,
        shutdownGraceMs: opts.shutdownGraceMs,
    })

    app.decorate('plotterRelay', service)

    app.addHook('onReady', async () => {
        logPlugin.info('starting plotter relay')
        service.start()
    })

    app.addHook('onClose', async () => {
        logPlugin.info('stopping plotter relay')
        await service.stop().catch((err: unknown) => {
            logPlugin.warn('error stopping plotter relay', {
                err: describeError(err),
            })
        })
    })
}, {
    name: 'plotter-relay-plugin',
})
