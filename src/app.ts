/**
 * Fastify application for the front-of-house waitlist
 *
 * Features:
 * - WhatsApp webhook (verification handshake + message intake)
 * - Rate limiting (RATE_LIMIT_MAX requests per minute)
 * - Read-only waitlist and table listings for the floor staff
 */

import fastify, { type FastifyBaseLogger } from "fastify";
import rateLimit from '@fastify/rate-limit';
import type { Config } from "./config/env";
import type { Logger } from "./logger";
import { MemoryStore } from "./store/db";
import { SessionStore } from "./store/sessions";
import { FrontDesk } from "./services/frontdesk";
import { WhatsAppMessenger, type Messenger } from "./services/messenger";
import {
    verifyWebhook,
    receiveWebhook,
    listWaitlist,
    listTables,
    health,
    type RouteDependencies
} from "./routes";

export type AppDependencies = {
    config: Config;
    logger: Logger;
    store?: MemoryStore;
    sessions?: SessionStore;
    messenger?: Messenger;
};

/**
 * Wire the store, sessions, messenger and front desk into a Fastify instance
 *
 * Collaborators not supplied are built from the config. Sessions are closed
 * together with the app.
 */
export function buildApp(deps: AppDependencies) {
    const { config } = deps;
    const log: FastifyBaseLogger = deps.logger;

    const store = deps.store ?? new MemoryStore({ dataFile: config.dataFile });
    const sessions = deps.sessions ?? new SessionStore({ ttlMinutes: config.sessionTtlMinutes });
    const messenger = deps.messenger ?? new WhatsAppMessenger({ ...config.whatsapp, logger: deps.logger });
    const frontDesk = new FrontDesk({
        store,
        sessions,
        messenger,
        logger: deps.logger,
        waiterPassword: config.waiterPassword
    });

    const app = fastify({ loggerInstance: log });

    app.register(rateLimit, {
        max: config.rateLimitMax,
        timeWindow: '1 minute'
    });

    const routeDeps: RouteDependencies = { config, store, frontDesk };

    app.register(function (app, _, done) {
        app.get("/webhook", verifyWebhook(routeDeps));
        app.post("/webhook", receiveWebhook(routeDeps));
        app.get("/waitlist", listWaitlist(routeDeps));
        app.get("/tables", listTables(routeDeps));
        app.get("/health", health(routeDeps));

        done();
    });

    app.addHook('onClose', async () => {
        sessions.close();
    });

    return { app, store, sessions, frontDesk };
}
