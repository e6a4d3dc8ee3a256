/**
 * Role a party plays in a conversation.
 */
export type Role = 'customer' | 'waiter';

export type Scratch = Record<string, string>;

/**
 * Conversation session for one party identifier
 *
 * The union only admits valid (role, state) pairs: customers move between
 * `initial` and `awaiting_name_people`, waiters exist only while they are
 * authenticating or releasing a table.
 */
export type Session =
    | { role: 'customer'; state: 'initial' | 'awaiting_name_people'; scratch: Scratch }
    | { role: 'waiter'; state: 'awaiting_waiter_password' | 'awaiting_free_table_number'; scratch: Scratch };

/**
 * Party waiting for a table
 */
export interface WaitlistEntry {
    id: string;
    /** Messaging contact of the party; at most one entry per party */
    partyId: string;
    name: string;
    partySize: number;
    /** ISO datetime string, refreshed on a repeat join */
    enqueuedAt: string;
}

export type TableStatus = 'free' | 'occupied';

/**
 * Physical table with a fixed capacity
 *
 * `occupantEntryId`, `occupantName` and `occupiedAt` are set iff the table is occupied.
 */
export interface Table {
    id: string;
    /** Human facing number, e.g. "T5" */
    number: string;
    capacity: number;
    status: TableStatus;
    occupantEntryId: string | null;
    occupantName: string | null;
    occupiedAt: string | null;
    statusChangedAt: string;
}

/**
 * Table seed pair used at bootstrap
 */
export interface TableSeed {
    number: string;
    capacity: number;
}

/**
 * Result of seating a waitlist entry, used to notify the party
 */
export interface Seating {
    entryId: string;
    partyId: string;
    name: string;
    partySize: number;
    tableId: string;
    tableNumber: string;
    /** Wasted seats (capacity - partySize) */
    waste: number;
    enqueuedAt: string;
    seatedAt: string;
}

/**
 * Seating candidate computed during an allocation pass
 */
export interface Candidate {
    /** Wasted seats (capacity - partySize), lower is better */
    waste: number;
    enqueuedAt: string;
    entry: WaitlistEntry;
    table: Table;
}

/**
 * Domain command emitted by the conversation engine
 */
export type Command =
    | { type: 'enqueue'; name: string; partySize: number }
    | { type: 'free_table'; tableNumber: string };

/**
 * Normalized inbound message from any transport
 */
export interface InboundEvent {
    partyId: string;
    /** "text" for text messages, otherwise the transport's own type name */
    messageType: string;
    text?: string;
}

/**
 * On-disk snapshot of the waitlist/table store
 */
export interface StoreSnapshot {
    sequence: number;
    entries: WaitlistEntry[];
    tables: Table[];
}
