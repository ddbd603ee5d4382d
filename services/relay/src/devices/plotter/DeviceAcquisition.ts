import { SerialPort } from 'serialport'
import { SerialTransceiver, type SerialTransceiverOptions } from './SerialTransceiver.js'
import { describeError } from './errors.js'
import type {
    CommandTransceiver,
    PlotterRelayConfig,
    PlotterRelayEventSink,
    PortDescriptor,
    UsbId,
} from './types.js'
import { findDevice, now } from './utils.js'

interface DeviceAcquisitionDeps {
    events: PlotterRelayEventSink
    list?: () => Promise<PortDescriptor[]>
    open?: (opts: SerialTransceiverOptions) => Promise<CommandTransceiver>
}

/**
 * Polls the serial ports until one matches, then opens it.
 *
 * A missing device is "not plugged in yet", never an error: the loop retries
 * every pollIntervalMs until a match appears or the signal aborts. Opening a
 * matched device either succeeds or throws DeviceOpenError; it is not retried.
 */
export class DeviceAcquisition {
    private readonly list: () => Promise<PortDescriptor[]>
    private readonly open: (opts: SerialTransceiverOptions) => Promise<CommandTransceiver>

    constructor(
        private readonly config: PlotterRelayConfig,
        private readonly deps: DeviceAcquisitionDeps
    ) {
        this.list = deps.list ?? (() => SerialPort.list())
        this.open = deps.open ?? ((opts) => SerialTransceiver.open(opts))
    }

    /** Resolves null if aborted before a device turned up. */
    async acquire(signal?: AbortSignal): Promise<CommandTransceiver | null> {
        const { devicePath, deviceIdentifier, usbIds, pollIntervalMs } = this.config

        this.deps.events.publish({
            kind: 'device-searching',
            at: now(),
            selector: devicePath || describeSelector(deviceIdentifier, usbIds),
        })

        let listFailing = false

        while (!signal?.aborted) {
            let ports: PortDescriptor[] = []
            try {
                ports = await this.list()
                listFailing = false
            } catch (err) {
                // Report once per failure streak; the poll keeps going.
                if (!listFailing) {
                    this.deps.events.publish({
                        kind: 'recoverable-error',
                        at: now(),
                        code: 'DeviceListFailure',
                        error: `Could not enumerate serial ports: ${describeError(err)}`,
                    })
                }
                listFailing = true
            }

            const match = findDevice(ports, devicePath, deviceIdentifier, usbIds)
            if (match) {
                if (signal?.aborted) return null
                return await this.open({
                    path: match.path,
                    baudRate: this.config.baudRate,
                    readTimeoutMs: this.config.readTimeoutMs,
                    readAttempts: this.config.readAttempts,
                })
            }

            await waitUnlessAborted(pollIntervalMs, signal)
        }

        return null
    }
}

function waitUnlessAborted(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve) => {
        if (signal?.aborted) { resolve(); return }

        const onAbort = () => { clearTimeout(timer); resolve() }
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort)
            resolve()
        }, ms)

        signal?.addEventListener('abort', onAbort, { once: true })
    })
}

function describeSelector(identifier: string, usbIds: readonly UsbId[]): string {
    const parts: string[] = []
    if (identifier) parts.push(`descriptor~${identifier}`)
    for (const u of usbIds) parts.push(`usb~${u.vendorId}:${u.productId}`)
    return parts.join(',')
}
