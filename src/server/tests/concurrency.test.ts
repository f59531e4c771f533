import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import pino from 'pino';
import { initLogger, logContextStore, type LogContext } from '../../shared/logger/index.js';

interface CapturedLine {
    level: number;
    msg: string;
    correlationId?: string;
    requestNo?: number;
    err?: { message: string; };
    [ key: string ]: unknown;
}

describe('Concurrency & Context Integrity', () => {
    const originalConsole = { log: console.log, info: console.info, warn: console.warn, error: console.error };
    let lines: CapturedLine[];

    beforeEach(() => {
        lines = [];
        const target = pino({ base: undefined, timestamp: false }, {
            write: (line: string) => {
                lines.push(JSON.parse(line));
            },
        });
        initLogger(target);
    });

    afterEach(() => {
        Object.assign(console, originalConsole);
    });

    it('should keep each request context on its own log lines under concurrency', async () => {
        const concurrentRequests = 100;

        const runTask = (id: number) => {
            const context: LogContext = { correlationId: `corr-${id}`, method: 'POST', url: '/generate' };

            return logContextStore.run(context, async () => {
                // force event loop interleaving
                await new Promise((resolve) => setTimeout(resolve, Math.random() * 20));
                console.log({ requestNo: id }, `handling request ${id}`);
            });
        };

        await Promise.all(Array.from({ length: concurrentRequests }, (_, i) => runTask(i)));

        expect(lines).toHaveLength(concurrentRequests);
        for (const line of lines) {
            expect(line.msg).toBe(`handling request ${line.requestNo}`);
            expect(line.correlationId).toBe(`corr-${line.requestNo}`);
        }
    });

    it('should log without a context outside a request', () => {
        console.warn('starting up on port %d', 8000);

        expect(lines).toHaveLength(1);
        expect(lines[ 0 ].msg).toBe('starting up on port 8000');
        expect(lines[ 0 ].level).toBe(40);
        expect(lines[ 0 ].correlationId).toBeUndefined();
    });

    it('should attach errors passed to console.error', () => {
        logContextStore.run({ correlationId: 'corr-err' }, () => {
            console.error({ status: 500 }, 'API Error', new Error('boom'));
        });

        expect(lines).toHaveLength(1);
        expect(lines[ 0 ].level).toBe(50);
        expect(lines[ 0 ].status).toBe(500);
        expect(lines[ 0 ].correlationId).toBe('corr-err');
        expect(lines[ 0 ].err?.message).toBe('boom');
    });
});
