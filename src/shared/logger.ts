export type LogMeta = Readonly<Record<string, unknown>>

export type Logger = {
    child?: (bindings: LogMeta) => Logger
    debug?: (msg: string, meta?: LogMeta) => void
    info?: (msg: string, meta?: LogMeta) => void
    warn?: (msg: string, meta?: LogMeta) => void
    error?: (msg: string, meta?: LogMeta) => void
}

export function createNoopLogger(): Logger {
    return {}
}

export function childLogger(logger: Logger, bindings: LogMeta): Logger {
    return logger.child ? logger.child(bindings) : logger
}
