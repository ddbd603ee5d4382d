// services/relay/src/devices/plotter/PlotterRelayService.ts

import { WakeSignal } from '../../core/wake.js'
import { CommandDispatcher } from './CommandDispatcher.js'
import { CommandQueue } from './CommandQueue.js'
import { DeviceAcquisition } from './DeviceAcquisition.js'
import { RunStateController } from './RunStateController.js'
import {
    DeviceOpenError,
    type InvalidCommandError,
    RelayError,
    describeError,
} from './errors.js'
import type {
    CommandTransceiver,
    PlotterLinkPhase,
    PlotterRelayConfig,
    PlotterRelayEventSink,
    RelayState,
} from './types.js'
import { now } from './utils.js'

interface PlotterRelayServiceDeps {
    events: PlotterRelayEventSink
    /**
     * Finds and opens the plotter. Resolves null when the signal aborts first.
     * Defaults to DeviceAcquisition over serialport.
     */
    connect?: (signal: AbortSignal) => Promise<CommandTransceiver | null>
    /** How long stop() waits for an in-flight exchange before closing the port. */
    shutdownGraceMs?: number
}

export type SubmitResult =
    | { ok: true }
    | { ok: false; error: InvalidCommandError }

export type SubmitManyResult =
    | { ok: true; accepted: number }
    | { ok: false; accepted: number; error: InvalidCommandError }

/**
 * PlotterRelayService
 *
 * Command intake for any number of network handlers, plus the lifecycle of
 * the one serial link. Handlers only touch the queue, the run-state and the
 * wake signal; the dispatcher alone talks to the device.
 */
export class PlotterRelayService {
    private readonly config: PlotterRelayConfig
    private readonly deps: PlotterRelayServiceDeps

    private readonly wake = new WakeSignal()
    private readonly queue = new CommandQueue()
    private readonly runState = new RunStateController(this.wake)
    private readonly dispatcher: CommandDispatcher
    private readonly connectFn: (signal: AbortSignal) => Promise<CommandTransceiver | null>

    private phase: PlotterLinkPhase = 'disconnected'
    private transceiver: CommandTransceiver | null = null
    private acquireAbort: AbortController | null = null
    private connecting: Promise<void> | null = null
    private loop: Promise<void> | null = null
    private readonly closed = new WeakSet<CommandTransceiver>()
    private readonly broken = new WeakSet<CommandTransceiver>()
    private started = false
    private stopping = false

    constructor(config: PlotterRelayConfig, deps: PlotterRelayServiceDeps) {
        this.config = config
        this.deps = deps
        this.connectFn = deps.connect ?? ((signal) =>
            new DeviceAcquisition(config, { events: deps.events }).acquire(signal))

        this.dispatcher = new CommandDispatcher({
            queue: this.queue,
            runState: this.runState,
            wake: this.wake,
            events: deps.events,
            timeoutPolicy: config.timeoutPolicy,
            onLinkBroken: (t, err) => { void this.handleLinkBroken(t, err) },
        })
    }

    /* ---------------------------------------------------------------------- */
    /*  Lifecycle                                                             */
    /* ---------------------------------------------------------------------- */

    /**
     * Starts the dispatch loop and begins looking for the device in the
     * background. Intake works immediately; commands wait in the queue until
     * a device is attached.
     */
    public start(): void {
        if (this.started) return
        this.started = true
        this.loop = this.dispatcher.start()
        this.beginConnect()
    }

    /**
     * Stops intake-side wakeups, lets the in-flight exchange finish (up to the
     * grace period) and closes the port. Queued commands are left as they are.
     */
    public async stop(): Promise<void> {
        if (this.stopping) return
        this.stopping = true

        this.acquireAbort?.abort()
        this.wake.close()

        const grace = this.deps.shutdownGraceMs ?? 5000
        if (this.loop) {
            let timer: NodeJS.Timeout | undefined
            await Promise.race([
                this.loop,
                new Promise<void>((resolve) => { timer = setTimeout(resolve, grace) }),
            ])
            clearTimeout(timer)
        }
        await this.connecting

        const t = this.dispatcher.detach() ?? this.transceiver
        this.transceiver = null
        if (t) await this.closeQuietly(t, 'explicit-close')

        if (this.loop) await this.loop
        this.phase = 'disconnected'
    }

    public getPhase(): PlotterLinkPhase {
        return this.phase
    }

    public getDevicePath(): string | null {
        return this.transceiver?.path ?? null
    }

    public getInFlight(): string | null {
        return this.dispatcher.getInFlight()
    }

    /* ---------------------------------------------------------------------- */
    /*  Intake                                                                */
    /* ---------------------------------------------------------------------- */

    public async submit(raw: string): Promise<SubmitResult> {
        const res = await this.queue.enqueue(raw)
        if (!res.ok) {
            this.deps.events.publish({
                kind: 'command-rejected',
                at: now(),
                reason: res.error.message,
            })
            return res
        }

        this.deps.events.publish({
            kind: 'command-queued',
            at: now(),
            command: raw,
            queueLength: res.queueLength,
        })

        if ((await this.runState.current()) === 'running') {
            this.wake.notify()
        }
        return { ok: true }
    }

    /** In order; stops at the first invalid command, keeping the ones before it. */
    public async submitMany(raws: readonly string[]): Promise<SubmitManyResult> {
        let accepted = 0
        for (const raw of raws) {
            const res = await this.submit(raw)
            if (!res.ok) return { ok: false, accepted, error: res.error }
            accepted++
        }
        return { ok: true, accepted }
    }

    public async pause(): Promise<void> {
        await this.runState.pause()
        this.deps.events.publish({ kind: 'run-state-changed', at: now(), runState: 'paused' })
    }

    public async resume(): Promise<void> {
        await this.runState.resume()
        this.deps.events.publish({ kind: 'run-state-changed', at: now(), runState: 'running' })
    }

    /** Drops every queued command; an in-flight one still completes. */
    public async clear(): Promise<number> {
        const dropped = await this.queue.clear()
        this.deps.events.publish({ kind: 'queue-cleared', at: now(), dropped })
        return dropped
    }

    public async getState(): Promise<RelayState> {
        const [queueLength, runState] = await Promise.all([
            this.queue.length(),
            this.runState.current(),
        ])
        return { queueLength, runState }
    }

    /* ---------------------------------------------------------------------- */
    /*  Link management                                                       */
    /* ---------------------------------------------------------------------- */

    private beginConnect(): void {
        if (this.stopping || this.connecting) return
        this.connecting = this.connect().finally(() => {
            this.connecting = null
        })
    }

    private async connect(): Promise<void> {
        const abort = new AbortController()
        this.acquireAbort = abort
        this.phase = 'searching'

        try {
            const t = await this.connectFn(abort.signal)
            if (!t) return

            if (this.stopping) {
                await this.closeQuietly(t, 'explicit-close')
                return
            }

            this.transceiver = t
            this.phase = 'connected'
            // A failure mid-exchange reaches us through the dispatcher instead.
            t.onBroken((error) => {
                if (this.stopping || this.dispatcher.getInFlight() !== null) return
                void this.handleLinkBroken(t, error)
            })
            this.deps.events.publish({
                kind: 'device-connected',
                at: now(),
                path: t.path,
                baudRate: this.config.baudRate,
            })
            this.dispatcher.attach(t)
        } catch (err) {
            const error = err instanceof RelayError
                ? err
                : new DeviceOpenError(this.config.devicePath || 'unknown', err)
            this.phase = 'error'
            this.deps.events.publish({
                kind: 'fatal-error',
                at: now(),
                code: error.code,
                error: error.message,
            })
        } finally {
            if (this.acquireAbort === abort) this.acquireAbort = null
        }
    }

    private async handleLinkBroken(t: CommandTransceiver, error: RelayError): Promise<void> {
        if (this.broken.has(t)) return
        this.broken.add(t)

        this.dispatcher.detach(t)
        if (this.transceiver === t) this.transceiver = null
        this.phase = 'disconnected'

        await this.closeQuietly(t, error.code === 'DeviceTimeout' ? 'timeout' : 'io-error')
        if (this.stopping) return

        if (!this.config.reconnect) {
            this.phase = 'error'
            this.deps.events.publish({
                kind: 'fatal-error',
                at: now(),
                code: error.code,
                error: `${error.message} (reconnect disabled)`,
            })
            return
        }

        this.deps.events.publish({
            kind: 'recoverable-error',
            at: now(),
            code: error.code,
            error: `${error.message}; reacquiring device`,
        })
        this.beginConnect()
    }

    private async closeQuietly(
        t: CommandTransceiver,
        reason: 'io-error' | 'timeout' | 'explicit-close'
    ): Promise<void> {
        if (this.closed.has(t)) return
        this.closed.add(t)

        try {
            await t.close()
        } catch (err) {
            this.deps.events.publish({
                kind: 'recoverable-error',
                at: now(),
                code: 'SerialIOFailure',
                error: `close failed: ${describeError(err)}`,
            })
        }
        this.deps.events.publish({
            kind: 'device-disconnected',
            at: now(),
            path: t.path,
            reason,
        })
    }
}
