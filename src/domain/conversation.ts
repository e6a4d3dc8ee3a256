import type { Command, Session } from "../types";
import { messages } from "./messages";

export interface ConversationContext {
    waiterPassword: string;
    /** Largest party the restaurant can seat (largest table capacity) */
    maxPartySize: number;
    tableExists: (tableNumber: string) => boolean;
}

/**
 * Outcome of feeding one text message to a session
 */
export interface Transition {
    session: Session;
    /** Replies to the sender, in order */
    replies: string[];
    /** Domain commands for the waitlist/table store, in order */
    commands: Command[];
}

export type JoinRequest =
    | { ok: true; name: string; partySize: number }
    | { ok: false; reason: 'format' | 'not_positive' | 'too_large' };

const resetSession = (): Session => ({ role: 'customer', state: 'initial', scratch: {} });

/**
 * Normalize a waiter's table reference
 *
 * The word "table" and surrounding whitespace are dropped; bare digits get the
 * "T" prefix and anything else is upper-cased.
 *
 * Example: "Table 4" => "T4", "t10" => "T10", "bar2" => "BAR2"
 *
 * @returns Table number, or null when nothing is left after stripping
 */
export const normalizeTableNumber = (input: string): string | null => {
    const stripped = input.replace(/table/gi, '').trim();
    if (!stripped) return null;
    if (/^\d+$/.test(stripped)) return `T${stripped}`;
    return stripped.toUpperCase();
};

/**
 * Parse a "Name, Count" join request
 *
 * Exactly one comma, a non-empty name and an integer count are required; the
 * count is then checked against 1..maxPartySize.
 */
export const parseJoinRequest = (input: string, maxPartySize: number): JoinRequest => {
    const parts = input.split(',').map(p => p.trim());
    if (parts.length !== 2) return { ok: false, reason: 'format' };

    const [name = '', count = ''] = parts;
    if (!name || !/^[+-]?\d+$/.test(count)) return { ok: false, reason: 'format' };

    const partySize = Number.parseInt(count, 10);
    if (partySize <= 0) return { ok: false, reason: 'not_positive' };
    if (partySize > maxPartySize) return { ok: false, reason: 'too_large' };

    return { ok: true, name, partySize };
};

const joinErrorReply = (reason: 'format' | 'not_positive' | 'too_large', maxPartySize: number): string => {
    switch (reason) {
        case 'format': return messages.joinFormatInvalid;
        case 'not_positive': return messages.joinNotPositive;
        case 'too_large': return messages.joinTooLarge(maxPartySize);
    }
};

/**
 * Interpret one text message for a session
 *
 * State machine:
 * - initial + "waiter"                      => awaiting_waiter_password (waiter)
 * - awaiting_waiter_password + password     => awaiting_free_table_number
 * - awaiting_waiter_password + anything     => initial (customer)
 * - awaiting_free_table_number + known table => free_table command, initial (customer)
 * - initial + "hi"                          => awaiting_name_people
 * - awaiting_name_people + "Name, Count"    => enqueue command, initial
 * - anything else                           => help, unchanged
 *
 * Invalid table numbers and join requests reply with an error and keep the state.
 *
 * @param session - Current session (not mutated)
 * @param input - Raw message text
 * @param ctx - Password, capacity limit and table lookup
 */
export function transition(session: Session, input: string, ctx: ConversationContext): Transition {
    const text = input.trim();
    const keyword = text.toLowerCase();
    const stay = (reply: string): Transition => ({ session, replies: [reply], commands: [] });

    if (session.role === 'waiter') {
        if (session.state === 'awaiting_waiter_password') {
            if (text === ctx.waiterPassword) {
                return {
                    session: { role: 'waiter', state: 'awaiting_free_table_number', scratch: session.scratch },
                    replies: [messages.waiterAuthenticated],
                    commands: []
                };
            }
            return { session: resetSession(), replies: [messages.waiterPasswordRejected], commands: [] };
        }

        const tableNumber = normalizeTableNumber(text);
        if (!tableNumber) return stay(messages.tableFormatInvalid);
        if (!ctx.tableExists(tableNumber)) return stay(messages.tableUnknown(tableNumber));

        return {
            session: resetSession(),
            replies: [messages.tableFreed(tableNumber)],
            commands: [{ type: 'free_table', tableNumber }]
        };
    }

    if (session.state === 'awaiting_name_people') {
        const request = parseJoinRequest(text, ctx.maxPartySize);
        if (!request.ok) return stay(joinErrorReply(request.reason, ctx.maxPartySize));

        return {
            session: resetSession(),
            replies: [messages.joinQueued(request.name, request.partySize)],
            commands: [{ type: 'enqueue', name: request.name, partySize: request.partySize }]
        };
    }

    if (keyword === 'waiter') {
        return {
            session: { role: 'waiter', state: 'awaiting_waiter_password', scratch: session.scratch },
            replies: [messages.waiterPasswordPrompt],
            commands: []
        };
    }

    if (keyword === 'hi') {
        return {
            session: { role: 'customer', state: 'awaiting_name_people', scratch: session.scratch },
            replies: [messages.joinPrompt],
            commands: []
        };
    }

    return stay(messages.help);
}
