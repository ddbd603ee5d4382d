/* -------------------------------------------------------------------------- */
/*  SerialTransceiver                                                         */
/*                                                                            */
/*  Owns the open port to the plotter. One exchange at a time:                */
/*    write "<command>\r", drain, then wait for one "\n"-terminated line.     */
/*  Only the dispatch loop calls sendAndAwaitResponse().                      */
/* -------------------------------------------------------------------------- */

import { SerialPort } from 'serialport'
import { ReadlineParser } from '@serialport/parser-readline'
import type { CommandTransceiver } from './types.js'
import {
    DeviceOpenError,
    DeviceTimeoutError,
    type RelayError,
    SerialIOError,
    describeError,
} from './errors.js'
import { frameCommand, sleep } from './utils.js'

export interface SerialTransceiverOptions {
    path: string
    baudRate: number
    /** Bound on one read attempt. */
    readTimeoutMs: number
    /** 0 => keep retrying the read until a line arrives. */
    readAttempts: number
}

type LineWaiter = {
    resolve: (line: string | null) => void
    reject: (err: Error) => void
}

export class SerialTransceiver implements CommandTransceiver {
    private readonly lines: string[] = []
    private waiter: LineWaiter | null = null
    private failure: SerialIOError | null = null
    private closing = false
    private busy = false
    /** Set when the last exchange timed out; its reply may still be on the way. */
    private replyOverdue = false
    private brokenListener: ((error: RelayError) => void) | null = null

    private constructor(
        private readonly port: SerialPort,
        private readonly opts: SerialTransceiverOptions
    ) {
        const parser = port.pipe(new ReadlineParser({ delimiter: '\n' }))
        parser.on('data', (line: string) => this.handleLine(line))
        port.on('error', (err: Error) => this.fail(new SerialIOError(`Serial port error: ${err.message}`, err)))
        port.on('close', () => {
            if (this.closing) return
            this.fail(new SerialIOError(`Serial port ${opts.path} closed unexpectedly`))
        })
    }

    /** Opens the port; a matched device that cannot be opened is a DeviceOpenError. */
    static async open(opts: SerialTransceiverOptions): Promise<SerialTransceiver> {
        const port = new SerialPort({
            path: opts.path,
            baudRate: opts.baudRate,
            autoOpen: false,
            dataBits: 8,
            parity: 'none',
            stopBits: 1,
        })

        try {
            await new Promise<void>((resolve, reject) => {
                port.open((err) => (err ? reject(err) : resolve()))
            })
        } catch (err) {
            throw new DeviceOpenError(opts.path, err)
        }

        return new SerialTransceiver(port, opts)
    }

    get path(): string {
        return this.opts.path
    }

    isOpen(): boolean {
        return this.port.isOpen && !this.failure
    }

    async sendAndAwaitResponse(command: string): Promise<string> {
        if (this.failure) throw this.failure
        if (this.closing || !this.port.isOpen) {
            throw new SerialIOError(`Serial port ${this.opts.path} is not open`)
        }
        if (this.busy) {
            throw new Error('SerialTransceiver does not pipeline commands')
        }

        this.busy = true
        try {
            if (this.replyOverdue) {
                // Let a late answer to the timed-out command land before we listen.
                await sleep(this.opts.readTimeoutMs)
                this.replyOverdue = false
                if (this.failure) throw this.failure
            }
            // Anything that arrived between exchanges is not an answer to this command.
            this.lines.length = 0
            await this.flush()
            await this.write(frameCommand(command))
            return await this.awaitResponse(command)
        } finally {
            this.busy = false
        }
    }

    onBroken(listener: (error: RelayError) => void): void {
        this.brokenListener = listener
        if (this.failure && !this.closing) listener(this.failure)
    }

    async close(): Promise<void> {
        if (this.closing) return
        this.closing = true
        this.fail(new SerialIOError(`Serial port ${this.opts.path} closed`))

        if (!this.port.isOpen) return
        await new Promise<void>((resolve) => {
            this.port.close(() => resolve())
        })
    }

    /* ---------------------------------------------------------------------- */
    /*  Internals                                                             */
    /* ---------------------------------------------------------------------- */

    private async awaitResponse(command: string): Promise<string> {
        const { readTimeoutMs, readAttempts } = this.opts
        let attempts = 0

        for (;;) {
            const line = await this.nextLine(readTimeoutMs)
            if (line !== null) return line.replace(/\r$/, '')

            attempts++
            if (readAttempts > 0 && attempts >= readAttempts) {
                this.replyOverdue = true
                throw new DeviceTimeoutError(command, attempts * readTimeoutMs)
            }
        }
    }

    /** Resolves null when no complete line arrived within timeoutMs. */
    private nextLine(timeoutMs: number): Promise<string | null> {
        const buffered = this.lines.shift()
        if (buffered !== undefined) return Promise.resolve(buffered)
        if (this.failure) return Promise.reject(this.failure)

        return new Promise<string | null>((resolve, reject) => {
            const timer = setTimeout(() => {
                this.waiter = null
                resolve(null)
            }, timeoutMs)

            this.waiter = {
                resolve: (line) => { clearTimeout(timer); resolve(line) },
                reject: (err) => { clearTimeout(timer); reject(err) },
            }
        })
    }

    private handleLine(line: string): void {
        const w = this.waiter
        if (w) {
            this.waiter = null
            w.resolve(line)
            return
        }
        this.lines.push(line)
    }

    private fail(err: SerialIOError): void {
        const first = !this.failure
        if (!this.failure) this.failure = err
        const w = this.waiter
        if (w) {
            this.waiter = null
            w.reject(this.failure)
        }
        if (first && !this.closing) this.brokenListener?.(err)
    }

    private async write(data: string): Promise<void> {
        await new Promise<void>((resolve, reject) => {
            this.port.write(data, (err) => {
                if (err) reject(new SerialIOError(`Write to ${this.opts.path} failed: ${describeError(err)}`, err))
                else resolve()
            })
        })
        await new Promise<void>((resolve, reject) => {
            this.port.drain((err) => {
                if (err) reject(new SerialIOError(`Drain on ${this.opts.path} failed: ${describeError(err)}`, err))
                else resolve()
            })
        })
    }

    private async flush(): Promise<void> {
        await new Promise<void>((resolve, reject) => {
            this.port.flush((err) => {
                if (err) reject(new SerialIOError(`Flush on ${this.opts.path} failed: ${describeError(err)}`, err))
                else resolve()
            })
        })
    }
}
