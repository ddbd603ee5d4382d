import { afterEach, describe, expect, it, vi } from 'vitest'
import type { FastifyInstance } from 'fastify'
import { LogChannel, makeClientBuffer } from '@plotter-relay/logging'
import { buildApp } from '../app.js'
import { DeviceOpenError } from '../devices/plotter/errors.js'
import type { FatalErrorEvent } from '../devices/plotter/types.js'
import { FakeTransceiver, testConfig } from '../devices/plotter/__tests__/fakes.js'

vi.mock('serialport', () => ({ SerialPort: { list: async () => [] } }))

let app: FastifyInstance | null = null

afterEach(async () => {
    await app?.close()
    app = null
})

async function start(fake = new FakeTransceiver()) {
    const clientBuf = makeClientBuffer(200)
    const instance = buildApp({
        clientBuf,
        relay: {
            config: testConfig(),
            connect: async () => fake,
            shutdownGraceMs: 50,
        },
    })
    app = instance
    await instance.ready()
    await vi.waitFor(() => expect(instance.plotterRelay.getPhase()).toBe('connected'))
    return { app: instance, fake, clientBuf }
}

describe('relay HTTP API', () => {
    it('relays a posted command to the device', async () => {
        const { app, fake } = await start()

        const res = await app.inject({ method: 'POST', url: '/api/commands', payload: { command: 'SP,1' } })

        expect(res.statusCode).toBe(200)
        expect(res.json()).toEqual({ ok: true, accepted: 1 })
        await vi.waitFor(() => expect(fake.sent).toEqual(['SP,1']))
    })

    it('accepts a batch in order', async () => {
        const { app, fake } = await start()

        const res = await app.inject({
            method: 'POST',
            url: '/api/commands',
            payload: { commands: ['SP,1', 'SM,100,20,20', 'SP,0'] },
        })

        expect(res.json()).toEqual({ ok: true, accepted: 3 })
        await vi.waitFor(() => expect(fake.sent).toEqual(['SP,1', 'SM,100,20,20', 'SP,0']))
    })

    it('rejects a malformed body', async () => {
        const { app } = await start()

        const res = await app.inject({ method: 'POST', url: '/api/commands', payload: { cmd: 'SP,1' } })

        expect(res.statusCode).toBe(400)
        expect(res.json()).toEqual({
            ok: false,
            error: 'command (string) or commands (string[]) required',
            accepted: 0,
        })
    })

    it('stops a batch at the first invalid command', async () => {
        const { app } = await start()
        await app.inject({ method: 'POST', url: '/api/pause' })

        const res = await app.inject({
            method: 'POST',
            url: '/api/commands',
            payload: { commands: ['SP,1', 'SP,0\nSP,1', 'SP,0'] },
        })

        expect(res.statusCode).toBe(400)
        expect(res.json()).toEqual({
            ok: false,
            error: 'InvalidCommand',
            reason: 'Invalid command: contains line feed',
            accepted: 1,
        })
        const state = await app.inject({ method: 'GET', url: '/api/state' })
        expect(state.json()).toEqual({ queueLength: 1, runState: 'paused' })
    })

    it('pauses, clears and resumes', async () => {
        const { app, fake } = await start()

        const paused = await app.inject({ method: 'POST', url: '/api/pause' })
        expect(paused.json()).toEqual({ ok: true, runState: 'paused' })

        await app.inject({ method: 'POST', url: '/api/commands', payload: { commands: ['SP,1', 'SP,0'] } })
        expect((await app.inject({ method: 'GET', url: '/api/state' })).json())
            .toEqual({ queueLength: 2, runState: 'paused' })

        const cleared = await app.inject({ method: 'POST', url: '/api/clear' })
        expect(cleared.json()).toEqual({ ok: true, cleared: 2 })

        await app.inject({ method: 'POST', url: '/api/commands', payload: { command: 'V' } })
        const resumed = await app.inject({ method: 'POST', url: '/api/resume' })
        expect(resumed.json()).toEqual({ ok: true, runState: 'running' })

        await vi.waitFor(() => expect(fake.sent).toEqual(['V']))
    })

    it('logs each exchange on the dispatch channel', async () => {
        const { app, fake, clientBuf } = await start()

        await app.inject({ method: 'POST', url: '/api/commands', payload: { command: 'SP,1' } })
        await vi.waitFor(() => expect(fake.sent).toEqual(['SP,1']))

        await vi.waitFor(() => {
            const dispatch = clientBuf.getLatest(200)
                .filter(e => e.channel === LogChannel.dispatch)
                .map(e => e.message)
            expect(dispatch).toEqual(['Writing to serial port: SP,1', 'Response from serial port: OK'])
        })
    })

    it('serves health, readiness and version', async () => {
        const { app } = await start()

        expect((await app.inject({ method: 'GET', url: '/health' })).json()).toEqual({ status: 'ok' })
        expect((await app.inject({ method: 'GET', url: '/ready' })).json())
            .toEqual({ ready: true, phase: 'connected', device: '/dev/ttyFAKE0' })
        expect((await app.inject({ method: 'GET', url: '/version' })).json())
            .toEqual({ name: 'plotter-relay', version: '0.1.0' })
    })

    it('returns recent logs', async () => {
        const { app } = await start()

        const res = await app.inject({ method: 'GET', url: '/api/logs?n=2' })

        const body = res.json()
        expect(body.entries).toHaveLength(2)
        expect(body.total).toBeGreaterThanOrEqual(2)
    })

    it('answers unknown routes with 404', async () => {
        const { app } = await start()

        const res = await app.inject({ method: 'GET', url: '/api/nope' })

        expect(res.statusCode).toBe(404)
        expect(res.json()).toEqual({ ok: false, error: 'Not found' })
    })

    it('closes the device when the app closes', async () => {
        const { app: instance, fake } = await start()

        await instance.close()
        app = null

        expect(fake.closeCount).toBe(1)
    })
})

describe('fatal device errors', () => {
    it('hands the fatal event to onFatal', async () => {
        const onFatal = vi.fn<(evt: FatalErrorEvent) => void>()
        const instance = buildApp({
            relay: {
                config: testConfig(),
                connect: async () => {
                    throw new DeviceOpenError('/dev/ttyACM0', new Error('Permission denied'))
                },
                onFatal,
            },
        })
        app = instance
        await instance.ready()

        await vi.waitFor(() => expect(onFatal).toHaveBeenCalledTimes(1))
        expect(onFatal.mock.calls[0][0]).toMatchObject({
            kind: 'fatal-error',
            code: 'DeviceOpenFailure',
            error: 'Could not open serial port /dev/ttyACM0: Permission denied',
        })
        expect((await instance.inject({ method: 'GET', url: '/ready' })).json())
            .toEqual({ ready: false, phase: 'error', device: null })
    })
})
