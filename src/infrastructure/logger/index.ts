import log from 'loglevel';

const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'silent'] as const;

function isLogLevel(value: string): value is (typeof LOG_LEVELS)[number] {
    return (LOG_LEVELS as readonly string[]).includes(value);
}

// Set default log level based on environment
const envLevel = (process.env['SEARCHFS_LOG_LEVEL'] || 'info').toLowerCase();
log.setLevel(isLogLevel(envLevel) ? envLevel : 'info');

export const logger = {
    debug: (message: string, ...args: unknown[]) => log.debug(`[DEBUG] ${message}`, ...args),
    info: (message: string, ...args: unknown[]) => log.info(`[INFO] ${message}`, ...args),
    warn: (message: string, ...args: unknown[]) => log.warn(`[WARN] ${message}`, ...args),
    error: (message: string, ...args: unknown[]) => log.error(`[ERROR] ${message}`, ...args),
    setLevel: (level: log.LogLevelDesc) => log.setLevel(level)
};

export default logger;
