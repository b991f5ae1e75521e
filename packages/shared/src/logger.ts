export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

const LEVEL_RANK: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
}

let threshold: LogLevel = 'info'

export function setLogLevel(level: LogLevel): void {
    threshold = level
}

export function getLogLevel(): LogLevel {
    return threshold
}

export interface Logger {
    debug(message: string, ...details: unknown[]): void
    info(message: string, ...details: unknown[]): void
    warn(message: string, ...details: unknown[]): void
    error(message: string, ...details: unknown[]): void
}

// Console-backed logger, tagged the same way as the rest of the console output: "[scope] message"
export function createLogger(scope: string): Logger {
    const enabled = (level: LogLevel) => LEVEL_RANK[level] >= LEVEL_RANK[threshold]
    const prefix = `[${scope}]`

    return {
        debug(message, ...details) {
            if (enabled('debug')) console.log(prefix, message, ...details)
        },
        info(message, ...details) {
            if (enabled('info')) console.log(prefix, message, ...details)
        },
        warn(message, ...details) {
            if (enabled('warn')) console.warn(prefix, message, ...details)
        },
        error(message, ...details) {
            if (enabled('error')) console.error(prefix, message, ...details)
        },
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err)
}
