import { describe, it, expect, vi, afterEach } from 'vitest';

async function freshLogger() {
    vi.resetModules();
    return import('../logger.js');
}

describe('createLogger', () => {
    afterEach(() => {
        vi.unstubAllEnvs();
    });

    it('falls back to info when LOG_LEVEL is not a known level', async () => {
        vi.stubEnv('LOG_LEVEL', 'loud');
        const { createLogger } = await freshLogger();

        expect(createLogger('test').level).toBe('info');
    });

    it('takes a valid LOG_LEVEL before logging is configured', async () => {
        vi.stubEnv('LOG_LEVEL', 'debug');
        const { createLogger } = await freshLogger();

        expect(createLogger('test').level).toBe('debug');
    });

    it('uses the configured level for loggers created afterwards', async () => {
        vi.stubEnv('LOG_LEVEL', 'loud');
        const { configureLogging, createLogger } = await freshLogger();

        configureLogging({ level: 'warn', format: 'json' });

        expect(createLogger('test').level).toBe('warn');
    });
});
