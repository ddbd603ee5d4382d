import { type ChannelColor, LogChannel } from './types.js'

export const CHANNEL_AS_LEVEL = true as const

export const CHANNELS: Record<LogChannel, { emoji: string, color: ChannelColor }> = {
    [LogChannel.process]:      { emoji: '🛰️', color: 'blue' },
    [LogChannel.app]:          { emoji: '📦', color: 'blue' },
    [LogChannel.request]:      { emoji: '📝', color: 'purple' },
    [LogChannel.websocket]:    { emoji: '🔗', color: 'cyan' },
    [LogChannel.device]:       { emoji: '🛠️', color: 'red' },
    [LogChannel.dispatch]:     { emoji: '🖊️', color: 'green' },
    [LogChannel.intake]:       { emoji: '📥', color: 'yellow' },
}

export const ANSI: Record<ChannelColor, string> = {
    blue: '\x1b[34m',
    yellow: '\x1b[33m',
    green: '\x1b[32m',
    magenta: '\x1b[35m',
    cyan: '\x1b[36m',
    red: '\x1b[31m',
    white: '\x1b[37m',
    purple: '\x1b[95m' // bright magenta (purple-ish)
}

export const RESET = '\x1b[0m'

// Channels log just above info. pino rejects level values that are already
// taken, so each channel gets its own.
export const CUSTOM_LEVELS: Record<LogChannel, number> = {
    [LogChannel.process]:      31,
    [LogChannel.app]:          32,
    [LogChannel.request]:      33,
    [LogChannel.websocket]:    34,
    [LogChannel.device]:       35,
    [LogChannel.dispatch]:     36,
    [LogChannel.intake]:       37,
}
