import type { RelayError } from '../errors.js'
import type {
    CommandTransceiver,
    PlotterRelayConfig,
    PlotterRelayEvent,
    PlotterRelayEventKind,
    PlotterRelayEventSink,
} from '../types.js'

export interface Deferred<T> {
    promise: Promise<T>
    resolve: (value: T) => void
    reject: (err: unknown) => void
}

export function deferred<T>(): Deferred<T> {
    let resolve: (value: T) => void = () => {}
    let reject: (err: unknown) => void = () => {}
    const promise = new Promise<T>((res, rej) => {
        resolve = res
        reject = rej
    })
    return { promise, resolve, reject }
}

export function tick(ms = 10): Promise<void> {
    return new Promise<void>((resolve) => setTimeout(resolve, ms))
}

export function testConfig(overrides: Partial<PlotterRelayConfig> = {}): PlotterRelayConfig {
    return {
        devicePath: '',
        deviceIdentifier: 'EiBotBoard',
        usbIds: [{ vendorId: '04d8', productId: 'fd92' }],
        baudRate: 9600,
        readTimeoutMs: 1000,
        readAttempts: 0,
        pollIntervalMs: 1000,
        reconnect: true,
        timeoutPolicy: 'requeue',
        ...overrides,
    }
}

export class RecordingSink implements PlotterRelayEventSink {
    readonly events: PlotterRelayEvent[] = []

    publish(event: PlotterRelayEvent): void {
        this.events.push(event)
    }

    kinds(): PlotterRelayEventKind[] {
        return this.events.map(e => e.kind)
    }

    ofKind<K extends PlotterRelayEventKind>(kind: K): Array<Extract<PlotterRelayEvent, { kind: K }>> {
        return this.events.filter((e): e is Extract<PlotterRelayEvent, { kind: K }> => e.kind === kind)
    }
}

/**
 * Answers "OK" to every command unless an exchange has been scripted for it.
 * Scripted exchanges are used in call order.
 */
export class FakeTransceiver implements CommandTransceiver {
    readonly sent: string[] = []
    closeCount = 0
    private readonly scripted: Array<(command: string) => Promise<string>> = []
    private brokenListener: ((error: RelayError) => void) | null = null

    constructor(readonly path: string = '/dev/ttyFAKE0') {}

    script(exchange: (command: string) => Promise<string>): void {
        this.scripted.push(exchange)
    }

    /** Holds the next exchange open until the returned deferred settles. */
    hold(): Deferred<string> {
        const d = deferred<string>()
        this.script(() => d.promise)
        return d
    }

    async sendAndAwaitResponse(command: string): Promise<string> {
        this.sent.push(command)
        const next = this.scripted.shift()
        if (next) return next(command)
        return 'OK'
    }

    onBroken(listener: (error: RelayError) => void): void {
        this.brokenListener = listener
    }

    /** What the serial side does on an unplug: tell the listener. */
    breakLink(error: RelayError): void {
        this.brokenListener?.(error)
    }

    async close(): Promise<void> {
        this.closeCount++
    }
}
