import { describe, it, expect, afterEach } from 'vitest';
import { SessionStore, initialSession } from '../store/sessions';
import { manualClock } from './helpers';

describe('SessionStore', () => {
    let sessions: SessionStore | undefined;

    afterEach(() => {
        sessions?.close();
    });

    it('should hand out a fresh customer session for unseen parties', () => {
        sessions = new SessionStore({ ttlMinutes: 30, sweepIntervalMs: 0 });
        expect(sessions.get('+15550001')).toEqual({ role: 'customer', state: 'initial', scratch: {} });
        expect(sessions.size).toBe(0);
    });

    it('should return what was put', () => {
        sessions = new SessionStore({ ttlMinutes: 30, sweepIntervalMs: 0 });
        sessions.put('+15550001', { role: 'waiter', state: 'awaiting_waiter_password', scratch: {} });
        expect(sessions.get('+15550001')).toEqual({ role: 'waiter', state: 'awaiting_waiter_password', scratch: {} });
        expect(sessions.get('+15550002')).toEqual(initialSession());
    });

    it('should expire sessions idle past the TTL', () => {
        const clock = manualClock();
        sessions = new SessionStore({ ttlMinutes: 30, clock, sweepIntervalMs: 0 });
        sessions.put('+15550001', { role: 'customer', state: 'awaiting_name_people', scratch: {} });

        clock.advanceMinutes(29);
        expect(sessions.get('+15550001').state).toBe('awaiting_name_people');
        expect(sessions.evictIdle()).toBe(0);

        clock.advanceMinutes(1);
        expect(sessions.get('+15550001')).toEqual(initialSession());
        expect(sessions.evictIdle()).toBe(1);
        expect(sessions.size).toBe(0);
    });

    it('should refresh the idle timer on put', () => {
        const clock = manualClock();
        sessions = new SessionStore({ ttlMinutes: 30, clock, sweepIntervalMs: 0 });
        sessions.put('+15550001', { role: 'customer', state: 'awaiting_name_people', scratch: {} });
        clock.advanceMinutes(20);
        sessions.put('+15550001', { role: 'customer', state: 'awaiting_name_people', scratch: {} });
        clock.advanceMinutes(20);

        expect(sessions.get('+15550001').state).toBe('awaiting_name_people');
    });

    it('should not let callers mutate the stored session', () => {
        sessions = new SessionStore({ ttlMinutes: 30, sweepIntervalMs: 0 });
        sessions.put('+15550001', { role: 'customer', state: 'initial', scratch: { lang: 'en' } });
        sessions.get('+15550001').scratch.lang = 'nl';
        expect(sessions.get('+15550001').scratch).toEqual({ lang: 'en' });
    });
});
