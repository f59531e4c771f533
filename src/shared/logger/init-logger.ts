import { AsyncLocalStorage } from 'async_hooks';
import { format } from 'util';
import type { Logger } from 'pino';
import { logger as defaultLogger } from './logger.js';
import type { LogContext } from './log-context.js';

export type { LogContext };
export const logContextStore = new AsyncLocalStorage<LogContext>();

type InterceptedLevel = 'info' | 'warn' | 'error';

const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null && !(value instanceof Error);

/**
 * Routes console.log/warn/error through pino so that every line carries the
 * request context of the code that logged it. A leading plain object is
 * merged into the structured fields; the rest is formatted like console does.
 */
export function initLogger(target: Logger = defaultLogger) {

    const handleIntercept = (level: InterceptedLevel, args: unknown[]) => {
        const context = logContextStore.getStore();

        const [ first, ...rest ] = args;
        const metadata = isRecord(first) ? first : {};
        const messageArgs = isRecord(first) ? rest : args;
        const err = messageArgs.find((arg): arg is Error => arg instanceof Error);
        const message = format(...messageArgs);

        target[ level ]({ ...context, ...metadata, ...(err ? { err } : {}) }, message);
    };

    console.log = (...args: unknown[]) => handleIntercept('info', args);
    console.info = (...args: unknown[]) => handleIntercept('info', args);
    console.warn = (...args: unknown[]) => handleIntercept('warn', args);
    console.error = (...args: unknown[]) => handleIntercept('error', args);
}
