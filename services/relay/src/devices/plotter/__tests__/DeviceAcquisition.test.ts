import { describe, expect, it, vi } from 'vitest'
import { DeviceAcquisition } from '../DeviceAcquisition.js'
import type { SerialTransceiverOptions } from '../SerialTransceiver.js'
import { DeviceOpenError } from '../errors.js'
import type { CommandTransceiver, PlotterRelayConfig, PortDescriptor } from '../types.js'
import { FakeTransceiver, RecordingSink, testConfig } from './fakes.js'

const listed = vi.hoisted(() => {
    const ports: Array<{ path: string; manufacturer?: string; pnpId?: string }> = []
    return ports
})

vi.mock('serialport', () => ({
    SerialPort: { list: async () => listed },
}))

const PLOTTER: PortDescriptor = {
    path: '/dev/ttyACM0',
    manufacturer: 'SchmalzHaus',
    pnpId: 'usb-SchmalzHaus_EiBotBoard_EBB-if00',
    vendorId: '04d8',
    productId: 'fd92',
}

function setup(config: Partial<PlotterRelayConfig> = {}) {
    const sink = new RecordingSink()
    const list = vi.fn<() => Promise<PortDescriptor[]>>()
    const open = vi.fn<(opts: SerialTransceiverOptions) => Promise<CommandTransceiver>>(
        async (opts) => new FakeTransceiver(opts.path)
    )
    const acquisition = new DeviceAcquisition(testConfig({ pollIntervalMs: 5, ...config }), {
        events: sink,
        list,
        open,
    })
    return { acquisition, sink, list, open }
}

describe('DeviceAcquisition', () => {
    it('opens the first port whose descriptor mentions the identifier', async () => {
        const { acquisition, sink, list, open } = setup()
        list.mockResolvedValue([{ path: '/dev/ttyS0', manufacturer: 'Generic' }, PLOTTER])

        const t = await acquisition.acquire()

        expect(t?.path).toBe('/dev/ttyACM0')
        expect(open).toHaveBeenCalledWith({
            path: '/dev/ttyACM0',
            baudRate: 9600,
            readTimeoutMs: 1000,
            readAttempts: 0,
        })
        expect(sink.ofKind('device-searching')).toMatchObject([
            { selector: 'descriptor~EiBotBoard,usb~04d8:fd92' },
        ])
    })

    it('finds a macOS board by its USB ids', async () => {
        const { acquisition, list } = setup()
        list.mockResolvedValue([
            { path: '/dev/tty.Bluetooth-Incoming-Port' },
            { path: '/dev/tty.usbmodem1411', manufacturer: 'SchmalzHaus LLC', vendorId: '04d8', productId: 'fd92' },
        ])

        const t = await acquisition.acquire()

        expect(t?.path).toBe('/dev/tty.usbmodem1411')
    })

    it('keeps polling until the device shows up', async () => {
        const { acquisition, list, open } = setup()
        list
            .mockResolvedValueOnce([])
            .mockResolvedValueOnce([{ path: '/dev/ttyS0' }])
            .mockResolvedValue([PLOTTER])

        const t = await acquisition.acquire()

        expect(t?.path).toBe('/dev/ttyACM0')
        expect(list).toHaveBeenCalledTimes(3)
        expect(open).toHaveBeenCalledTimes(1)
    })

    it('only takes the exact path when one is configured', async () => {
        const { acquisition, sink, list } = setup({ devicePath: '/dev/ttyUSB3' })
        list.mockResolvedValue([PLOTTER, { path: '/dev/ttyUSB3' }])

        const t = await acquisition.acquire()

        expect(t?.path).toBe('/dev/ttyUSB3')
        expect(sink.ofKind('device-searching')).toMatchObject([{ selector: '/dev/ttyUSB3' }])
    })

    it('reports an enumeration failure once per streak and keeps polling', async () => {
        const { acquisition, sink, list } = setup()
        list
            .mockRejectedValueOnce(new Error('EACCES'))
            .mockRejectedValueOnce(new Error('EACCES'))
            .mockResolvedValue([PLOTTER])

        const t = await acquisition.acquire()

        expect(t?.path).toBe('/dev/ttyACM0')
        expect(sink.ofKind('recoverable-error')).toMatchObject([
            { code: 'DeviceListFailure', error: 'Could not enumerate serial ports: EACCES' },
        ])
    })

    it('resolves null when aborted before a match', async () => {
        const { acquisition, list, open } = setup({ pollIntervalMs: 60_000 })
        list.mockResolvedValue([])
        const abort = new AbortController()

        const pending = acquisition.acquire(abort.signal)
        await vi.waitFor(() => expect(list).toHaveBeenCalledTimes(1))
        abort.abort()

        await expect(pending).resolves.toBeNull()
        expect(open).not.toHaveBeenCalled()
    })

    it('does not retry a device that fails to open', async () => {
        const { acquisition, list, open } = setup()
        list.mockResolvedValue([PLOTTER])
        open.mockRejectedValue(new DeviceOpenError('/dev/ttyACM0', new Error('Resource busy')))

        await expect(acquisition.acquire()).rejects.toThrow('Could not open serial port /dev/ttyACM0: Resource busy')
        expect(open).toHaveBeenCalledTimes(1)
    })

    it('enumerates through serialport by default', async () => {
        listed.splice(0, listed.length, { path: '/dev/ttyACM7', manufacturer: 'SchmalzHaus', pnpId: 'usb-SchmalzHaus_EiBotBoard_EBB-if00' })
        const open = vi.fn(async (opts: SerialTransceiverOptions) => new FakeTransceiver(opts.path))
        const acquisition = new DeviceAcquisition(testConfig(), { events: new RecordingSink(), open })

        const t = await acquisition.acquire()

        expect(t?.path).toBe('/dev/ttyACM7')
    })
})
