import { addMinutes, isBefore } from "date-fns";
import type { Session } from "../types";
import { LockManager } from "./locks";

export interface SessionStoreOptions {
    /** Idle time after which a session is dropped */
    ttlMinutes: number;
    clock?: () => Date;
    /** Interval for the background sweep; 0 disables it */
    sweepIntervalMs?: number;
}

interface StoredSession {
    session: Session;
    lastSeen: Date;
}

export const initialSession = (): Session => ({ role: 'customer', state: 'initial', scratch: {} });

/**
 * In-memory conversation sessions keyed by party identifier
 *
 * Sessions idle for longer than the TTL are treated as absent and swept
 * periodically, so a party that walks away mid-flow starts over next time.
 */
export class SessionStore {
    private _sessions: Map<string, StoredSession> = new Map();
    private _locks = new LockManager();
    private _sweep?: NodeJS.Timeout;
    private readonly _ttlMinutes: number;
    private readonly _clock: () => Date;

    constructor(options: SessionStoreOptions) {
        this._ttlMinutes = options.ttlMinutes;
        this._clock = options.clock ?? (() => new Date());

        const interval = options.sweepIntervalMs ?? 60000;
        if (interval > 0) {
            this._sweep = setInterval(() => this.evictIdle(), interval);
            this._sweep.unref();
        }
    }

    /**
     * Session for a party, or a fresh customer session if absent or expired
     */
    get(partyId: string): Session {
        const stored = this._sessions.get(partyId);
        if (!stored || this.isExpired(stored)) {
            return initialSession();
        }
        return { ...stored.session, scratch: { ...stored.session.scratch } };
    }

    /**
     * Replace the stored session and refresh its idle timer
     */
    put(partyId: string, session: Session) {
        this._sessions.set(partyId, { session, lastSeen: this._clock() });
    }

    /**
     * Serialize work for one party; other parties are not blocked
     */
    runExclusive<T>(partyId: string, task: () => T | Promise<T>): Promise<T> {
        return this._locks.runExclusive(partyId, task);
    }

    /**
     * Drop every session idle longer than the TTL
     *
     * @returns Number of sessions removed
     */
    evictIdle(): number {
        let removed = 0;
        for (const [partyId, stored] of this._sessions.entries()) {
            if (this.isExpired(stored) && !this._locks.isLocked(partyId)) {
                this._sessions.delete(partyId);
                removed++;
            }
        }
        return removed;
    }

    get size(): number {
        return this._sessions.size;
    }

    close() {
        if (this._sweep) clearInterval(this._sweep);
        this._sweep = undefined;
    }

    private isExpired(stored: StoredSession): boolean {
        return !isBefore(this._clock(), addMinutes(stored.lastSeen, this._ttlMinutes));
    }
}
