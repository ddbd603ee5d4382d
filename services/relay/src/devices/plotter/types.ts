import type { RelayError } from './errors.js'

export type RunState = 'running' | 'paused'

/** Link lifecycle, for /ready and logs. */
export type PlotterLinkPhase =
    | 'searching'     // Device Acquisition is polling for a match
    | 'connected'     // Port open, dispatch loop may drain
    | 'disconnected'  // Not started, stopped, or link broken before reacquiring
    | 'error'         // Fatal; the process is expected to exit

export interface RelayState {
    queueLength: number
    runState: RunState
}

/** What to do with the in-flight command when the device stops answering. */
export type TimeoutPolicy = 'requeue' | 'discard'

export interface PlotterRelayConfig {
    /** Explicit device path; empty means match by descriptor. */
    devicePath: string
    /** Substring looked for in the port's descriptor strings. */
    deviceIdentifier: string
    /** USB vendor/product pairs that identify the plotter on any platform. */
    usbIds: UsbId[]
    baudRate: number
    /** Bound on one read attempt for a response line. */
    readTimeoutMs: number
    /** Read attempts per command before DeviceTimeout; 0 => wait forever. */
    readAttempts: number
    /** Delay between enumerations while no device matches. */
    pollIntervalMs: number
    /** Re-enter acquisition after an I/O failure instead of treating it as fatal. */
    reconnect: boolean
    timeoutPolicy: TimeoutPolicy
}

export interface UsbId {
    /** Lowercase hex, no 0x prefix. */
    vendorId: string
    productId: string
}

/**
 * Subset of serialport's PortInfo that acquisition looks at. friendlyName is
 * only reported on Windows.
 */
export interface PortDescriptor {
    path: string
    manufacturer?: string
    serialNumber?: string
    pnpId?: string
    vendorId?: string
    productId?: string
    friendlyName?: string
}

/** Anything that can run one command/response exchange with the plotter. */
export interface CommandTransceiver {
    readonly path: string
    sendAndAwaitResponse(command: string): Promise<string>
    /**
     * Called once when the link fails on its own (unplug, port error), whether
     * or not an exchange is open. Not called for close().
     */
    onBroken(listener: (error: RelayError) => void): void
    close(): Promise<void>
}

/* -------------------------------------------------------------------------- */
/*  Events                                                                     */
/* -------------------------------------------------------------------------- */

export type PlotterRelayEventKind =
    | 'command-queued'
    | 'command-rejected'
    | 'command-sent'
    | 'command-completed'
    | 'command-requeued'
    | 'command-discarded'
    | 'queue-cleared'
    | 'run-state-changed'
    | 'device-searching'
    | 'device-connected'
    | 'device-disconnected'
    | 'recoverable-error'
    | 'fatal-error'

export interface PlotterRelayEventBase {
    kind: PlotterRelayEventKind
    at: number
}

export interface CommandQueuedEvent extends PlotterRelayEventBase {
    kind: 'command-queued'
    command: string
    queueLength: number
}

export interface CommandRejectedEvent extends PlotterRelayEventBase {
    kind: 'command-rejected'
    reason: string
}

export interface CommandSentEvent extends PlotterRelayEventBase {
    kind: 'command-sent'
    command: string
}

export interface CommandCompletedEvent extends PlotterRelayEventBase {
    kind: 'command-completed'
    command: string
    response: string
    durationMs: number
}

export interface CommandRequeuedEvent extends PlotterRelayEventBase {
    kind: 'command-requeued'
    command: string
    reason: string
}

export interface CommandDiscardedEvent extends PlotterRelayEventBase {
    kind: 'command-discarded'
    command: string
    reason: string
}

export interface QueueClearedEvent extends PlotterRelayEventBase {
    kind: 'queue-cleared'
    dropped: number
}

export interface RunStateChangedEvent extends PlotterRelayEventBase {
    kind: 'run-state-changed'
    runState: RunState
}

export interface DeviceSearchingEvent extends PlotterRelayEventBase {
    kind: 'device-searching'
    selector: string
}

export interface DeviceConnectedEvent extends PlotterRelayEventBase {
    kind: 'device-connected'
    path: string
    baudRate: number
}

export interface DeviceDisconnectedEvent extends PlotterRelayEventBase {
    kind: 'device-disconnected'
    path: string
    reason: 'io-error' | 'timeout' | 'explicit-close'
}

export interface RecoverableErrorEvent extends PlotterRelayEventBase {
    kind: 'recoverable-error'
    code: string
    error: string
}

export interface FatalErrorEvent extends PlotterRelayEventBase {
    kind: 'fatal-error'
    code: string
    error: string
}

export type PlotterRelayEvent =
    | CommandQueuedEvent
    | CommandRejectedEvent
    | CommandSentEvent
    | CommandCompletedEvent
    | CommandRequeuedEvent
    | CommandDiscardedEvent
    | QueueClearedEvent
    | RunStateChangedEvent
    | DeviceSearchingEvent
    | DeviceConnectedEvent
    | DeviceDisconnectedEvent
    | RecoverableErrorEvent
    | FatalErrorEvent

/**
 * How the relay talks to the rest of the app. The plugin wires a logger sink;
 * tests collect events in an array.
 */
export interface PlotterRelayEventSink {
    publish(event: PlotterRelayEvent): void
}
