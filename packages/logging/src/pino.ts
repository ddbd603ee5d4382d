import pino, { type Logger, type LoggerOptions, type LogFn } from 'pino'
import pinoPretty from 'pino-pretty'
import {
    type ClientLogLevel,
    type LoggerBundle,
    type ChannelLogger,
    type ClientLogBuffer,
    LogChannel
} from './types.js'
import { CHANNELS, ANSI, RESET, CUSTOM_LEVELS, CHANNEL_AS_LEVEL } from './channels.js'

// levelKey is honoured at runtime but missing from pino's typings
type PinoOptionsExt = LoggerOptions<LogChannel> & { levelKey?: string }

type Extra = Record<string, unknown> | undefined

function isLogChannel(v: unknown): v is LogChannel {
    return typeof v === 'string' && Object.prototype.hasOwnProperty.call(CHANNELS, v)
}

function channelOf(args: unknown[]): LogChannel | undefined {
    const first = args[0]
    if (typeof first !== 'object' || first === null || !('channel' in first)) return undefined
    return isLogChannel(first.channel) ? first.channel : undefined
}

/** Puts "<emoji> [channel]:" in front of the message, wherever pino has it. */
function prefixMessage(args: unknown[], ch: LogChannel): void {
    const meta = CHANNELS[ch]
    const prefix = `${ANSI[meta.color]}${meta.emoji} [${ch}]:${RESET}`

    if (typeof args[1] === 'string') args[1] = `${prefix} ${args[1]}`
    else if (typeof args[0] === 'string') args[0] = `${prefix} ${args[0]}`
    else args.push(prefix)
}

export function createLogger(service: string, clientBuf?: ClientLogBuffer): LoggerBundle {
    const PRETTY = String(process.env.PRETTY_LOGS ?? 'true').toLowerCase() === 'true'
    const LOG_LEVEL = process.env.LOG_LEVEL ?? 'info'

    let base: Logger<LogChannel>

    const options: PinoOptionsExt = {
        levelKey: 'lvl',                          // hide default 'level' from pino-pretty
        level: LOG_LEVEL,
        base: { service },
        customLevels: CUSTOM_LEVELS,
        useOnlyCustomLevels: false,
        formatters: {
            level() { return { lvl: '' } },      // no textual level in JSON
            log(obj) { return obj }
        },
        hooks: {
            logMethod(args: unknown[], method: LogFn): void {
                const ch = channelOf(args)
                if (ch) prefixMessage(args, ch)
                Reflect.apply(method, base, args)
            }
        }
    }

    base = PRETTY
        ? pino(options, pinoPretty({
            translateTime: 'SYS:standard',
            colorize: true,
            singleLine: false,
            ignore: 'pid,hostname,service,channel,lvl'
        }))
        : pino(options)

    const writerFor = (ch: LogChannel, level: ClientLogLevel): LogFn => {
        // info lines go out under the channel's own level name
        if (level === 'info' && CHANNEL_AS_LEVEL && typeof base[ch] === 'function') {
            return base[ch].bind(base)
        }
        return base[level].bind(base)
    }

    const channel = (ch: LogChannel): ChannelLogger => {
        const meta = CHANNELS[ch]

        const method = (level: ClientLogLevel) => (msg: string, extra?: Extra): void => {
            writerFor(ch, level)({ channel: ch, ...extra }, msg)
            clientBuf?.push({
                ts: Date.now(),
                channel: ch,
                emoji: meta.emoji,
                color: meta.color,
                level,
                message: msg
            })
        }

        return {
            debug: method('debug'),
            info: method('info'),
            warn: method('warn'),
            error: method('error'),
            fatal: method('fatal')
        }
    }

    return { base, channel }
}
