import fs from "node:fs";
import path from "node:path";
import { compareAsc, isBefore, parseISO } from "date-fns";
import type * as types from "../types";
import { PersistenceError } from "../errors";
import { StoreSnapshotSchema } from "../schemas";
import { LockManager } from "./locks";

const STORE_LOCK = "store";

export interface StoreOptions {
    /** Snapshot file rewritten after every mutation; in-memory only when omitted */
    dataFile?: string;
    clock?: () => Date;
}

/**
 * Waitlist and table store
 *
 * Features:
 * - Upsert-by-party waitlist with FCFS ordering on `enqueuedAt`
 * - Static table set with idempotent seeding and free/occupied transitions
 * - Atomic seat: the table flips to occupied and the entry leaves the waitlist together
 * - Optional JSON snapshot written synchronously before a mutation returns
 *
 * Concurrency Strategy:
 * - Every method here is synchronous, so a single call never interleaves with another
 * - runExclusive() is the one lock boundary callers use to group reads and a
 *   commit (an allocation pass) against concurrent enqueue/release calls
 */
export class MemoryStore {
    entries: Map<string, types.WaitlistEntry> = new Map();
    tables: Map<string, types.Table> = new Map();

    private _sequence = 0;
    private _lastStamp: Date = new Date(0);
    private _locks = new LockManager();
    private readonly _dataFile?: string;
    private readonly _clock: () => Date;

    /**
     * Initialize the store, loading the snapshot file when one is configured and present
     *
     * @throws {PersistenceError} Snapshot exists but cannot be read or parsed
     */
    constructor(options: StoreOptions = {}) {
        this._dataFile = options.dataFile ? path.resolve(options.dataFile) : undefined;
        this._clock = options.clock ?? (() => new Date());
        this.load();
    }

    /**
     * Run `task` inside the store's mutual-exclusion boundary
     */
    runExclusive<T>(task: () => T | Promise<T>): Promise<T> {
        return this._locks.runExclusive(STORE_LOCK, task);
    }

    /**
     * Insert tables that are not present yet
     *
     * Tables are matched by number, so re-running with the same list changes nothing.
     *
     * @returns Number of tables inserted
     */
    seedTables(seeds: types.TableSeed[]): number {
        return this.mutate(() => {
            let inserted = 0;
            for (const seed of seeds) {
                if (this.findTable(seed.number)) continue;
                const table: types.Table = {
                    id: `TB_${++this._sequence}`,
                    number: seed.number,
                    capacity: seed.capacity,
                    status: 'free',
                    occupantEntryId: null,
                    occupantName: null,
                    occupiedAt: null,
                    statusChangedAt: this.stamp()
                };
                this.tables.set(table.id, table);
                inserted++;
            }
            return inserted;
        });
    }

    /**
     * Add a party to the waitlist, or refresh its existing entry
     *
     * A repeat join keeps the entry id but replaces name and size and moves
     * `enqueuedAt` to now, i.e. to the back of the queue.
     *
     * @throws {PersistenceError} Snapshot write failed; the waitlist is unchanged
     */
    enqueue(partyId: string, name: string, partySize: number): types.WaitlistEntry {
        return this.mutate(() => {
            const existing = this.getEntryByParty(partyId);
            const entry: types.WaitlistEntry = {
                id: existing?.id ?? `WL_${++this._sequence}`,
                partyId,
                name,
                partySize,
                enqueuedAt: this.stamp()
            };
            // re-insert so equal stamps still order the re-join last
            if (existing) this.entries.delete(existing.id);
            this.entries.set(entry.id, entry);
            return { ...entry };
        });
    }

    /**
     * Mark a table free and clear its occupant
     *
     * Idempotent: releasing a free table succeeds and leaves it free.
     *
     * @returns true if a table with that number exists
     * @throws {PersistenceError} Snapshot write failed; the table is unchanged
     */
    releaseTable(number: string): boolean {
        const table = this.findTable(number);
        if (!table) return false;

        this.mutate(() => {
            const current = this.tables.get(table.id);
            if (!current) return;
            this.tables.set(table.id, {
                ...current,
                status: 'free',
                occupantEntryId: null,
                occupantName: null,
                occupiedAt: null,
                statusChangedAt: this.stamp()
            });
        });
        return true;
    }

    /**
     * Seat a waitlist entry at a table
     *
     * Both rows change together: the table becomes occupied by the entry and the
     * entry leaves the waitlist.
     *
     * @returns Seating details, or null if the entry is gone or the table is not free
     * @throws {PersistenceError} Snapshot write failed; neither row changed
     */
    seat(entryId: string, tableId: string): types.Seating | null {
        const entry = this.entries.get(entryId);
        const table = this.tables.get(tableId);
        if (!entry || !table || table.status !== 'free') return null;

        return this.mutate(() => {
            const seatedAt = this.stamp();
            this.tables.set(table.id, {
                ...table,
                status: 'occupied',
                occupantEntryId: entry.id,
                occupantName: entry.name,
                occupiedAt: seatedAt,
                statusChangedAt: seatedAt
            });
            this.entries.delete(entry.id);

            return {
                entryId: entry.id,
                partyId: entry.partyId,
                name: entry.name,
                partySize: entry.partySize,
                tableId: table.id,
                tableNumber: table.number,
                waste: table.capacity - entry.partySize,
                enqueuedAt: entry.enqueuedAt,
                seatedAt
            };
        });
    }

    /**
     * Waiting parties, oldest first
     */
    listWaiting(): types.WaitlistEntry[] {
        return Array.from(this.entries.values())
            .sort((a, b) => compareAsc(parseISO(a.enqueuedAt), parseISO(b.enqueuedAt)))
            .map(e => ({ ...e }));
    }

    /**
     * Free tables, smallest capacity first
     */
    listFree(): types.Table[] {
        return Array.from(this.tables.values())
            .filter(t => t.status === 'free')
            .sort((a, b) => a.capacity - b.capacity)
            .map(t => ({ ...t }));
    }

    /**
     * All tables in seed order
     */
    listTables(): types.Table[] {
        return Array.from(this.tables.values()).map(t => ({ ...t }));
    }

    getEntryByParty(partyId: string): types.WaitlistEntry | undefined {
        for (const entry of this.entries.values()) {
            if (entry.partyId === partyId) return { ...entry };
        }
        return undefined;
    }

    hasTable(number: string): boolean {
        return this.findTable(number) !== undefined;
    }

    /**
     * Largest table capacity, 0 when no tables are seeded
     */
    maxCapacity(): number {
        return Array.from(this.tables.values()).reduce((max, t) => Math.max(max, t.capacity), 0);
    }

    private findTable(number: string): types.Table | undefined {
        for (const table of this.tables.values()) {
            if (table.number === number) return table;
        }
        return undefined;
    }

    /**
     * Current time, never earlier than the previous stamp
     */
    private stamp(): string {
        const now = this._clock();
        if (isBefore(now, this._lastStamp)) {
            return this._lastStamp.toISOString();
        }
        this._lastStamp = now;
        return now.toISOString();
    }

    /**
     * Apply a change and persist it, restoring the previous state if the write fails
     */
    private mutate<T>(change: () => T): T {
        const before = this.snapshot();
        const result = change();
        try {
            this.persist();
        } catch (error) {
            this.restore(before);
            throw error;
        }
        return result;
    }

    private snapshot(): types.StoreSnapshot {
        return {
            sequence: this._sequence,
            entries: Array.from(this.entries.values()).map(e => ({ ...e })),
            tables: Array.from(this.tables.values()).map(t => ({ ...t }))
        };
    }

    private restore(snapshot: types.StoreSnapshot) {
        this._sequence = snapshot.sequence;
        this.entries = new Map(snapshot.entries.map(e => [e.id, e]));
        this.tables = new Map(snapshot.tables.map(t => [t.id, t]));
    }

    private persist() {
        if (!this._dataFile) return;
        try {
            fs.mkdirSync(path.dirname(this._dataFile), { recursive: true });
            fs.writeFileSync(this._dataFile, JSON.stringify(this.snapshot(), null, 2));
        } catch (error) {
            throw new PersistenceError(`Failed to write ${this._dataFile}`, { cause: error });
        }
    }

    private load() {
        if (!this._dataFile || !fs.existsSync(this._dataFile)) return;

        let raw: string;
        try {
            raw = fs.readFileSync(this._dataFile, "utf8");
        } catch (error) {
            throw new PersistenceError(`Failed to read ${this._dataFile}`, { cause: error });
        }
        if (!raw.trim()) return;

        let json: unknown;
        try {
            json = JSON.parse(raw);
        } catch (error) {
            throw new PersistenceError(`Snapshot ${this._dataFile} is not valid JSON`, { cause: error });
        }

        const parsed = StoreSnapshotSchema.safeParse(json);
        if (!parsed.success) {
            throw new PersistenceError(`Snapshot ${this._dataFile} is malformed: ${parsed.error.message}`);
        }
        this.restore(parsed.data);
        for (const item of [...parsed.data.entries, ...parsed.data.tables]) {
            const stamp = parseISO('enqueuedAt' in item ? item.enqueuedAt : item.statusChangedAt);
            if (isBefore(this._lastStamp, stamp)) this._lastStamp = stamp;
        }
    }
}
