import { differenceInMinutes, parseISO } from "date-fns";
import type { Command, InboundEvent, Seating, Session } from "../types";
import type { Logger } from "../logger";
import type { MemoryStore } from "../store/db";
import type { SessionStore } from "../store/sessions";
import type { Messenger } from "./messenger";
import { allocate } from "../domain/allocation";
import { transition, type ConversationContext } from "../domain/conversation";
import { messages } from "../domain/messages";
import { PersistenceError } from "../errors";

export type FrontDeskOptions = {
    store: MemoryStore;
    sessions: SessionStore;
    messenger: Messenger;
    logger: Logger;
    waiterPassword: string;
};

/**
 * What handling one inbound event produced
 */
export type HandleResult = {
    session: Session;
    replies: string[];
    seatings: Seating[];
};

type CommandOutcome = { ok: true } | { ok: false; reply: string };

/**
 * Front-of-house coordinator
 *
 * For each inbound event: runs the conversation engine on the party's session,
 * applies the resulting commands to the store, replies to the sender and then
 * seats whoever fits. Events from the same party are handled one at a time.
 */
export class FrontDesk {
    private readonly store: MemoryStore;
    private readonly sessions: SessionStore;
    private readonly messenger: Messenger;
    private readonly log: Logger;
    private readonly waiterPassword: string;

    constructor(options: FrontDeskOptions) {
        this.store = options.store;
        this.sessions = options.sessions;
        this.messenger = options.messenger;
        this.log = options.logger;
        this.waiterPassword = options.waiterPassword;
    }

    /**
     * Handle one inbound message end to end
     *
     * Session changes are committed only after the store accepted the commands;
     * on a persistence failure the party gets a generic failure reply and may
     * resend the same message.
     *
     * @throws Any error that is not a PersistenceError
     */
    handle(event: InboundEvent): Promise<HandleResult> {
        return this.sessions.runExclusive(event.partyId, () => this.process(event));
    }

    /**
     * Seat waiting parties at free tables and notify each seated party
     *
     * Each seating is pushed onto `seated` as soon as it is committed, so the
     * caller still sees earlier seatings when a later one fails.
     *
     * @throws {PersistenceError} A seating could not be written
     */
    allocate(seated: Seating[] = []): Promise<Seating[]> {
        return allocate(this.store, seating => {
            seated.push(seating);
            return this.notifySeated(seating);
        });
    }

    private async process(event: InboundEvent): Promise<HandleResult> {
        const { partyId } = event;
        const session = this.sessions.get(partyId);

        if (event.messageType !== 'text' || event.text === undefined) {
            return this.finish(partyId, session, [messages.textOnly]);
        }

        const result = transition(session, event.text, this.context());

        for (const command of result.commands) {
            let outcome: CommandOutcome;
            try {
                outcome = await this.apply(partyId, command);
            } catch (error) {
                if (!(error instanceof PersistenceError)) throw error;
                this.log.error({ err: error, partyId, command }, "store rejected command");
                return this.finish(partyId, session, [messages.failure]);
            }
            if (!outcome.ok) {
                return this.finish(partyId, session, [outcome.reply]);
            }
        }

        this.sessions.put(partyId, result.session);
        const done = await this.finish(partyId, result.session, result.replies);
        if (result.commands.length === 0) return done;

        const seatings: Seating[] = [];
        try {
            await this.allocate(seatings);
        } catch (error) {
            if (!(error instanceof PersistenceError)) throw error;
            this.log.error({ err: error, partyId, seated: seatings.length }, "store rejected seating");
            await this.messenger.send(partyId, messages.failure);
            return { ...done, replies: [...done.replies, messages.failure], seatings };
        }
        return { ...done, seatings };
    }

    private context(): ConversationContext {
        return {
            waiterPassword: this.waiterPassword,
            maxPartySize: this.store.maxCapacity(),
            tableExists: tableNumber => this.store.hasTable(tableNumber)
        };
    }

    private async apply(partyId: string, command: Command): Promise<CommandOutcome> {
        switch (command.type) {
            case 'enqueue': {
                const entry = await this.store.runExclusive(() =>
                    this.store.enqueue(partyId, command.name, command.partySize)
                );
                this.log.info({ entryId: entry.id, partyId, partySize: entry.partySize }, "party enqueued");
                return { ok: true };
            }
            case 'free_table': {
                const released = await this.store.runExclusive(() => this.store.releaseTable(command.tableNumber));
                if (!released) return { ok: false, reply: messages.tableUnknown(command.tableNumber) };
                this.log.info({ tableNumber: command.tableNumber, by: partyId }, "table released");
                return { ok: true };
            }
        }
    }

    private async notifySeated(seating: Seating) {
        this.log.info({
            entryId: seating.entryId,
            tableNumber: seating.tableNumber,
            partySize: seating.partySize,
            waste: seating.waste,
            waitedMinutes: differenceInMinutes(parseISO(seating.seatedAt), parseISO(seating.enqueuedAt))
        }, "party seated");

        await this.messenger.send(seating.partyId, messages.tableReady(seating.name, seating.tableNumber));
    }

    private async finish(partyId: string, session: Session, replies: string[]): Promise<HandleResult> {
        for (const reply of replies) {
            await this.messenger.send(partyId, reply);
        }
        return { session, replies, seatings: [] };
    }
}
