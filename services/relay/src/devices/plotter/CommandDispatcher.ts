/* -------------------------------------------------------------------------- */
/*  CommandDispatcher                                                         */
/*                                                                            */
/*  The single consumer. Waits on the wake signal; each wake drains the       */
/*  queue one command at a time while Running and a device is attached.      */
/*  Never holds the queue or run-state lock across serial I/O.                */
/* -------------------------------------------------------------------------- */

import type { WakeSignal } from '../../core/wake.js'
import type { CommandQueue } from './CommandQueue.js'
import type { RunStateController } from './RunStateController.js'
import {
    DeviceTimeoutError,
    RelayError,
    SerialIOError,
    describeError,
} from './errors.js'
import type {
    CommandTransceiver,
    PlotterRelayEventSink,
    TimeoutPolicy,
} from './types.js'
import { now } from './utils.js'

export interface CommandDispatcherDeps {
    queue: CommandQueue
    runState: RunStateController
    wake: WakeSignal
    events: PlotterRelayEventSink
    timeoutPolicy: TimeoutPolicy
    /**
     * Called after the dispatcher has given up on a transceiver. The in-flight
     * command is already back at the head of the queue.
     */
    onLinkBroken: (transceiver: CommandTransceiver, error: RelayError) => void
}

export class CommandDispatcher {
    private transceiver: CommandTransceiver | null = null
    private inFlight: string | null = null
    private running: Promise<void> | null = null

    constructor(private readonly deps: CommandDispatcherDeps) {}

    /** Starts the consumer loop; it ends once the wake signal is closed. */
    start(): Promise<void> {
        if (!this.running) {
            this.running = this.run()
        }
        return this.running
    }

    /** Hands the device to the loop and re-checks the queue. */
    attach(transceiver: CommandTransceiver): void {
        this.transceiver = transceiver
        this.deps.wake.notify()
    }

    /** With `expected`, only detaches when that transceiver is the attached one. */
    detach(expected?: CommandTransceiver): CommandTransceiver | null {
        const t = this.transceiver
        if (expected && t !== expected) return null
        this.transceiver = null
        return t
    }

    getInFlight(): string | null {
        return this.inFlight
    }

    private async run(): Promise<void> {
        while (await this.deps.wake.wait()) {
            try {
                await this.drain()
            } catch (err) {
                this.deps.events.publish({
                    kind: 'recoverable-error',
                    at: now(),
                    code: 'DispatchFailure',
                    error: describeError(err),
                })
            }
        }
    }

    private async drain(): Promise<void> {
        const { queue, runState, wake, events } = this.deps

        for (;;) {
            // Shutdown lets the in-flight exchange finish but sends nothing new.
            if (wake.isClosed()) return

            const transceiver = this.transceiver
            if (!transceiver) return
            if ((await runState.current()) !== 'running') return

            const command = await queue.dequeueFront()
            if (command === null) return

            this.inFlight = command
            const startedAt = now()
            events.publish({ kind: 'command-sent', at: startedAt, command })

            try {
                const response = await transceiver.sendAndAwaitResponse(command)
                events.publish({
                    kind: 'command-completed',
                    at: now(),
                    command,
                    response,
                    durationMs: now() - startedAt,
                })
            } catch (err) {
                const keepGoing = await this.handleFailure(transceiver, command, err)
                if (!keepGoing) return
            } finally {
                this.inFlight = null
            }
        }
    }

    /** Returns true when draining can continue on the same transceiver. */
    private async handleFailure(
        transceiver: CommandTransceiver,
        command: string,
        err: unknown
    ): Promise<boolean> {
        const { queue, events, timeoutPolicy } = this.deps

        if (err instanceof DeviceTimeoutError && timeoutPolicy === 'discard') {
            events.publish({
                kind: 'command-discarded',
                at: now(),
                command,
                reason: err.message,
            })
            return true
        }

        const error = err instanceof RelayError
            ? err
            : new SerialIOError(describeError(err), err)

        await queue.requeueFront(command)
        events.publish({
            kind: 'command-requeued',
            at: now(),
            command,
            reason: error.message,
        })

        if (this.transceiver === transceiver) this.transceiver = null
        this.deps.onLinkBroken(transceiver, error)
        return false
    }
}
