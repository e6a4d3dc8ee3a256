import { describe, it, expect } from 'vitest';
import { loadConfig } from '../config/env';

describe('loadConfig', () => {
    it('should apply defaults', () => {
        const config = loadConfig({});
        expect(config).toMatchObject({
            port: 3000,
            host: '0.0.0.0',
            waiterPassword: 'waiter123',
            sessionTtlMinutes: 60,
            rateLimitMax: 100,
            logLevel: 'info',
            logPretty: true,
            dataFile: undefined
        });
        expect(config.whatsapp.apiVersion).toBe('v18.0');
        expect(config.whatsapp.accessToken).toBe('');
    });

    it('should coerce and map environment values', () => {
        const config = loadConfig({
            PORT: '8080',
            NODE_ENV: 'production',
            WAITER_PASSWORD: 'test-secret',
            WHATSAPP_ACCESS_TOKEN: 'test-token',
            WHATSAPP_PHONE_NUMBER_ID: '1234567890',
            DATA_FILE: './data/state.json',
            SESSION_TTL_MINUTES: '15',
            LOG_LEVEL: 'warn'
        });

        expect(config.port).toBe(8080);
        expect(config.waiterPassword).toBe('test-secret');
        expect(config.dataFile).toBe('./data/state.json');
        expect(config.sessionTtlMinutes).toBe(15);
        expect(config.logLevel).toBe('warn');
        expect(config.logPretty).toBe(false);
        expect(config.whatsapp).toMatchObject({ accessToken: 'test-token', phoneNumberId: '1234567890' });
    });

    it('should let LOG_PRETTY override the environment default', () => {
        expect(loadConfig({ NODE_ENV: 'production', LOG_PRETTY: 'true' }).logPretty).toBe(true);
        expect(loadConfig({ LOG_PRETTY: '0' }).logPretty).toBe(false);
    });

    it('should reject invalid values', () => {
        expect(() => loadConfig({ PORT: 'abc' })).toThrow(/PORT/);
        expect(() => loadConfig({ LOG_LEVEL: 'loud' })).toThrow(/LOG_LEVEL/);
    });
});
