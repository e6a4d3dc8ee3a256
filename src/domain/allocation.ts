import { compareAsc, parseISO } from "date-fns";
import type * as types from "../types";
import type { MemoryStore } from "../store/db";

export type AllocationStore = Pick<MemoryStore, 'listWaiting' | 'listFree' | 'seat' | 'runExclusive'>;

/**
 * Pick the best free table for one party on its own
 *
 * Only tables with capacity >= partySize qualify. Least wasted seats wins; on a
 * tie the first table scanned wins, which for capacity-sorted input means the
 * smaller table.
 *
 * Example: party of 3, free [2, 4, 4, 6] => first 4-seater, waste 1
 *
 * @param entry - Waiting party
 * @param freeTables - Free tables, capacity ascending
 * @returns Candidate, or null if no table is large enough
 */
export function bestTableFor(entry: types.WaitlistEntry, freeTables: types.Table[]): types.Candidate | null {
    let best: types.Candidate | null = null;

    for (const table of freeTables) {
        if (table.capacity < entry.partySize) continue;
        const waste = table.capacity - entry.partySize;
        if (!best || waste < best.waste) {
            best = { waste, enqueuedAt: entry.enqueuedAt, entry, table };
        }
    }

    return best;
}

/**
 * Build the candidate pool: one best-fit candidate per party that fits anywhere
 *
 * @param waiting - Waiting parties, oldest first
 * @param freeTables - Free tables, capacity ascending
 * @returns Candidates in global priority order
 */
export function findCandidates(waiting: types.WaitlistEntry[], freeTables: types.Table[]): types.Candidate[] {
    const candidates: types.Candidate[] = [];

    for (const entry of waiting) {
        const candidate = bestTableFor(entry, freeTables);
        if (candidate) candidates.push(candidate);
    }

    return sortCandidates(candidates);
}

/**
 * Order candidates by global priority
 *
 * Selection Strategy (in priority order):
 * 1. Waste: fewer wasted seats first
 * 2. Arrival: earlier enqueuedAt first (FCFS)
 *
 * The sort is stable, so equal candidates keep waitlist order.
 */
export function sortCandidates(candidates: types.Candidate[]): types.Candidate[] {
    return [...candidates].sort((a, b) => {
        if (a.waste !== b.waste) return a.waste - b.waste;
        return compareAsc(parseISO(a.enqueuedAt), parseISO(b.enqueuedAt));
    });
}

/**
 * Run one allocation pass and commit at most one seating
 *
 * Reads the waitlist and free tables, ranks every party's best fit and seats
 * the top candidate. Stopping after one commit means the next pass sees the
 * updated waitlist and free tables.
 *
 * Must be called inside the store's lock.
 *
 * @returns The seating committed, or null when no party fits any free table
 */
export function runAllocationPass(store: Pick<MemoryStore, 'listWaiting' | 'listFree' | 'seat'>): types.Seating | null {
    const waiting = store.listWaiting();
    const free = store.listFree();
    if (waiting.length === 0 || free.length === 0) return null;

    for (const candidate of findCandidates(waiting, free)) {
        const seating = store.seat(candidate.entry.id, candidate.table.id);
        if (seating) return seating;
    }

    return null;
}

/**
 * Repeat allocation passes until one commits nothing
 *
 * Each pass runs under the store lock; `onSeated` runs after the lock is
 * released so a slow notification never blocks enqueue or release.
 *
 * @param store - Waitlist/table store
 * @param onSeated - Called once per seating, in commit order
 * @returns Every seating made, in commit order
 */
export async function allocate(
    store: AllocationStore,
    onSeated: (seating: types.Seating) => Promise<void> | void = () => undefined
): Promise<types.Seating[]> {
    const seated: types.Seating[] = [];

    for (;;) {
        const seating = await store.runExclusive(() => runAllocationPass(store));
        if (!seating) return seated;

        seated.push(seating);
        await onSeated(seating);
    }
}
