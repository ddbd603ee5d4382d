export type RelayErrorCode =
    | 'InvalidCommand'
    | 'DeviceOpenFailure'
    | 'SerialIOFailure'
    | 'DeviceTimeout'

export class RelayError extends Error {
    readonly code: RelayErrorCode

    constructor(code: RelayErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options)
        this.name = new.target.name
        this.code = code
    }
}

/** Empty, or carries a line terminator that would break serial framing. */
export class InvalidCommandError extends RelayError {
    constructor(reason: string) {
        super('InvalidCommand', `Invalid command: ${reason}`)
    }
}

/** A matched device could not be opened. Fatal. */
export class DeviceOpenError extends RelayError {
    readonly path: string

    constructor(path: string, cause: unknown) {
        super('DeviceOpenFailure', `Could not open serial port ${path}: ${describeError(cause)}`, { cause })
        this.path = path
    }
}

/** Write, read or close failure on an open port. */
export class SerialIOError extends RelayError {
    constructor(message: string, cause?: unknown) {
        super('SerialIOFailure', message, cause === undefined ? undefined : { cause })
    }
}

/** No response line within the configured read attempts. */
export class DeviceTimeoutError extends RelayError {
    readonly command: string
    readonly waitedMs: number

    constructor(command: string, waitedMs: number) {
        super('DeviceTimeout', `No response to "${command}" after ${waitedMs} ms`)
        this.command = command
        this.waitedMs = waitedMs
    }
}

export function describeError(err: unknown): string {
    return err instanceof Error ? err.message : String(err)
}
