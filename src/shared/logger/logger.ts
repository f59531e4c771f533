import pino from 'pino';
import os from 'os';

const isDev = process.env.NODE_ENV === 'development';

export const logger = pino({
    level: process.env.LOG_LEVEL || 'info',
    mixin() {
        return { server_id: `${os.hostname()}-${process.pid}`.toLowerCase() };
    },
    formatters: {
        level: (label) => ({ level: label.toUpperCase() }),
    },
    base: undefined, // Removes pid/hostname from default to use our mixin format
    timestamp: () => `,"timestamp_iso":"${new Date().toISOString()}"`,
    transport: isDev ? {
        target: 'pino-pretty',
        options: { colorize: true, translateTime: 'SYS:standard' }
    } : undefined,
});
