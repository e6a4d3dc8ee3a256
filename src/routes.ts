import type { FastifyReply, FastifyRequest } from 'fastify';
import type { Config } from './config/env';
import type { MemoryStore } from './store/db';
import type { FrontDesk } from './services/frontdesk';
import { VerifyWebhookQuerySchema, WhatsAppWebhookSchema } from './schemas';
import { extractInboundEvents } from './transport/whatsapp';

export type RouteDependencies = {
    config: Config;
    store: MemoryStore;
    frontDesk: FrontDesk;
};

/**
 * Answer Meta's webhook verification handshake
 *
 * @param request - Fastify request with query parameters:
 *   - hub.mode: "subscribe"
 *   - hub.verify_token: Token configured in the Meta app dashboard
 *   - hub.challenge: Value to echo back
 * @returns The challenge as plain text
 *
 * @throws {400} Missing query parameters
 * @throws {403} Token mismatch or verification not configured
 */
export const verifyWebhook = ({ config }: RouteDependencies) =>
    async (request: FastifyRequest, reply: FastifyReply) => {
        const query = VerifyWebhookQuerySchema.safeParse(request.query);
        if (!query.success) {
            return reply.status(400).send({ error: 'invalid_input', detail: query.error.format() });
        }

        const expected = config.whatsapp.verifyToken;
        const mode = query.data['hub.mode'];
        if (!expected || query.data['hub.verify_token'] !== expected || (mode && mode !== 'subscribe')) {
            return reply.status(403).send('Verification failed');
        }

        return reply.type('text/plain').send(query.data['hub.challenge']);
    };

/**
 * Receive WhatsApp messages
 *
 * Each message runs through the front desk in order; replies and seating
 * notifications are sent before the response is returned.
 *
 * @param request - Fastify request with a WhatsApp Cloud API notification body
 * @returns "EVENT_RECEIVED"
 *
 * @throws {400} Body is not a WhatsApp notification
 */
export const receiveWebhook = ({ frontDesk }: RouteDependencies) =>
    async (request: FastifyRequest, reply: FastifyReply) => {
        const body = WhatsAppWebhookSchema.safeParse(request.body);
        if (!body.success) {
            return reply.status(400).send({ error: 'invalid_input', detail: body.error.format() });
        }

        const events = extractInboundEvents(body.data);
        for (const event of events) {
            const result = await frontDesk.handle(event);
            request.log.debug({ partyId: event.partyId, state: result.session.state, seated: result.seatings.length }, 'event handled');
        }

        return reply.type('text/plain').send('EVENT_RECEIVED');
    };

/**
 * List waiting parties, oldest first
 *
 * @returns Object with items array of waitlist entries
 */
export const listWaitlist = ({ store }: RouteDependencies) =>
    async () => ({ items: store.listWaiting() });

/**
 * List every table with its status and occupant
 *
 * @returns Object with items array of tables
 */
export const listTables = ({ store }: RouteDependencies) =>
    async () => ({ items: store.listTables() });

export const health = ({ store }: RouteDependencies) =>
    async () => ({ ok: true, waiting: store.listWaiting().length, freeTables: store.listFree().length });
