import pino from 'pino';
import type { Messenger } from '../services/messenger';
import { loadConfig, type Config } from '../config/env';

export const silentLogger = pino({ level: 'silent' });

/**
 * Clock that advances by `stepMs` on every read
 */
export const tickingClock = (start = '2025-10-22T20:00:00.000Z', stepMs = 1000) => {
    let current = new Date(start).getTime() - stepMs;
    return () => {
        current += stepMs;
        return new Date(current);
    };
};

/**
 * Clock moved by hand
 */
export const manualClock = (start = '2025-10-22T20:00:00.000Z') => {
    let current = new Date(start);
    const clock = () => current;
    clock.advanceMinutes = (minutes: number) => {
        current = new Date(current.getTime() + minutes * 60000);
    };
    return clock;
};

/**
 * Messenger that records every message instead of delivering it
 */
export class RecordingMessenger implements Messenger {
    sent: Array<{ to: string; text: string }> = [];

    async send(partyId: string, text: string): Promise<boolean> {
        this.sent.push({ to: partyId, text });
        return true;
    }

    to(partyId: string): string[] {
        return this.sent.filter(m => m.to === partyId).map(m => m.text);
    }

    clear() {
        this.sent = [];
    }
}

export const testConfig = (overrides: Record<string, string> = {}): Config => loadConfig({
    WAITER_PASSWORD: 'test-secret',
    WHATSAPP_VERIFY_TOKEN: 'test-verify-token',
    LOG_PRETTY: 'false',
    ...overrides
});
