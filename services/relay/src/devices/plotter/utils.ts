// services/relay/src/devices/plotter/utils.ts

import type {
    PlotterRelayConfig,
    PortDescriptor,
    TimeoutPolicy,
    UsbId,
} from './types.js'

export const DEFAULT_DEVICE_IDENTIFIER = 'EiBotBoard'
export const DEFAULT_BAUD_RATE = 9600
export const DEFAULT_READ_TIMEOUT_MS = 1000
export const DEFAULT_POLL_INTERVAL_MS = 1000

/** EiBotBoard firmware enumerates as Microchip 04d8:fd92. */
export const DEFAULT_USB_IDS: readonly UsbId[] = [{ vendorId: '04d8', productId: 'fd92' }]

export const COMMAND_TERMINATOR = '\r'

export function sleep(ms: number): Promise<void> {
    return new Promise<void>((resolve) => setTimeout(resolve, ms))
}

export function now(): number {
    return Date.now()
}

/**
 * Returns the reason a raw line cannot be queued, or null when it is a valid
 * command. CR and LF terminate lines on both the intake and the serial side.
 */
export function commandProblem(raw: string): string | null {
    if (raw.length === 0) return 'empty command'
    if (raw.includes('\r')) return 'contains carriage return'
    if (raw.includes('\n')) return 'contains line feed'
    return null
}

export function frameCommand(command: string): string {
    return `${command}${COMMAND_TERMINATOR}`
}

function normalizeHex(v?: string): string | undefined {
    if (!v) return undefined
    return v.toString().replace(/^0x/i, '').toLowerCase()
}

const PNP_USB_ID = /VID_([0-9A-F]{4})&PID_([0-9A-F]{4})/i

/**
 * Vendor/product ids of a port. Windows may report them only inside the
 * pnpId (USB\VID_04D8&PID_FD92\...).
 */
function usbIdOf(info: PortDescriptor): UsbId | undefined {
    const vendorId = normalizeHex(info.vendorId)
    const productId = normalizeHex(info.productId)
    if (vendorId && productId) return { vendorId, productId }

    const m = info.pnpId ? PNP_USB_ID.exec(info.pnpId) : null
    if (!m) return undefined
    return { vendorId: m[1].toLowerCase(), productId: m[2].toLowerCase() }
}

/**
 * Port selection: exact path when a selector is given. Otherwise a port
 * matches when its VID:PID is in usbIds or its descriptor strings mention
 * the identifier.
 */
export function matchesDevice(
    info: PortDescriptor,
    selector: string,
    identifier: string,
    usbIds: readonly UsbId[] = []
): boolean {
    if (selector) return info.path === selector

    const id = usbIds.length > 0 ? usbIdOf(info) : undefined
    if (id && usbIds.some(u => u.vendorId === id.vendorId && u.productId === id.productId)) {
        return true
    }

    if (!identifier) return false
    return [info.manufacturer, info.pnpId, info.friendlyName]
        .some(s => typeof s === 'string' && s.includes(identifier))
}

export function findDevice(
    ports: PortDescriptor[],
    selector: string,
    identifier: string,
    usbIds: readonly UsbId[] = []
): PortDescriptor | undefined {
    return ports.find(p => matchesDevice(p, selector, identifier, usbIds))
}

/** "04d8:fd92,0x1234:0x5678" → UsbId[]; malformed entries are skipped. */
export function parseUsbIds(raw: string): UsbId[] {
    const out: UsbId[] = []
    for (const entry of raw.split(',')) {
        const [v, p, ...rest] = entry.trim().split(':')
        if (rest.length > 0) continue
        const vendorId = normalizeHex(v)
        const productId = normalizeHex(p)
        if (!vendorId || !productId) continue
        if (!/^[0-9a-f]{1,4}$/.test(vendorId) || !/^[0-9a-f]{1,4}$/.test(productId)) continue
        out.push({ vendorId: vendorId.padStart(4, '0'), productId: productId.padStart(4, '0') })
    }
    return out
}

/* -------------------------------------------------------------------------- */
/*  Env → config helpers                                                      */
/* -------------------------------------------------------------------------- */

function readIntEnv(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
    const raw = env[name]
    if (raw == null || raw.trim() === '') return fallback
    const n = Number(raw)
    return Number.isFinite(n) ? Math.trunc(n) : fallback
}

function readBoolEnv(env: NodeJS.ProcessEnv, name: string, fallback: boolean): boolean {
    const raw = env[name]
    if (raw == null || raw === '') return fallback
    const v = raw.trim().toLowerCase()
    if (v === '1' || v === 'true' || v === 'yes' || v === 'on') return true
    if (v === '0' || v === 'false' || v === 'no' || v === 'off') return false
    return fallback
}

function readStringEnv(env: NodeJS.ProcessEnv, name: string): string | undefined {
    const raw = env[name]
    if (raw === undefined || raw === '') return undefined
    return raw
}

function resolveTimeoutPolicy(env: NodeJS.ProcessEnv): TimeoutPolicy {
    const raw = readStringEnv(env, 'RELAY_TIMEOUT_POLICY')
    if (!raw) return 'requeue'
    return raw.trim().toLowerCase() === 'discard' ? 'discard' : 'requeue'
}

/**
 * Build a PlotterRelayConfig from environment variables. An explicit device
 * path from the command line wins over RELAY_DEVICE.
 */
export function buildPlotterRelayConfigFromEnv(
    env: NodeJS.ProcessEnv = process.env,
    devicePathOverride?: string
): PlotterRelayConfig {
    const devicePath = (devicePathOverride ?? readStringEnv(env, 'RELAY_DEVICE') ?? '').trim()
    const deviceIdentifier = (readStringEnv(env, 'RELAY_DEVICE_IDENTIFIER') ?? DEFAULT_DEVICE_IDENTIFIER).trim()

    // unset → default ids; set but empty → descriptor strings only
    const rawUsbIds = env.RELAY_USB_IDS
    const usbIds = rawUsbIds === undefined ? DEFAULT_USB_IDS.map(u => ({ ...u })) : parseUsbIds(rawUsbIds)

    const baudRate = readIntEnv(env, 'RELAY_BAUD', DEFAULT_BAUD_RATE)
    const readTimeoutMs = readIntEnv(env, 'RELAY_READ_TIMEOUT_MS', DEFAULT_READ_TIMEOUT_MS)
    const readAttempts = readIntEnv(env, 'RELAY_READ_ATTEMPTS', 0)
    const pollIntervalMs = readIntEnv(env, 'RELAY_POLL_INTERVAL_MS', DEFAULT_POLL_INTERVAL_MS)

    return {
        devicePath,
        deviceIdentifier,
        usbIds,
        baudRate: baudRate > 0 ? baudRate : DEFAULT_BAUD_RATE,
        readTimeoutMs: readTimeoutMs > 0 ? readTimeoutMs : DEFAULT_READ_TIMEOUT_MS,
        readAttempts: readAttempts > 0 ? readAttempts : 0,
        pollIntervalMs: pollIntervalMs > 0 ? pollIntervalMs : DEFAULT_POLL_INTERVAL_MS,
        reconnect: readBoolEnv(env, 'RELAY_RECONNECT', true),
        timeoutPolicy: resolveTimeoutPolicy(env),
    }
}
