import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { buildApp } from '../app';
import { MemoryStore } from '../store/db';
import { SessionStore } from '../store/sessions';
import { seedTables } from '../store/seed-data';
import { extractInboundEvents } from '../transport/whatsapp';
import { RecordingMessenger, silentLogger, testConfig, tickingClock } from './helpers';

const textMessage = (from: string, body: string) => ({ from, id: `wamid.${from}.${body.length}`, type: 'text', text: { body } });

const notification = (messages: object[]) => ({
    object: 'whatsapp_business_account',
    entry: [{ id: 'WABA_1', changes: [{ field: 'messages', value: { messaging_product: 'whatsapp', messages } }] }]
});

describe('Front desk API', () => {
    const messenger = new RecordingMessenger();
    const store = new MemoryStore({ clock: tickingClock() });
    const sessions = new SessionStore({ ttlMinutes: 60, sweepIntervalMs: 0 });
    const { app } = buildApp({
        config: testConfig({ RATE_LIMIT_MAX: '30' }),
        logger: silentLogger,
        store,
        sessions,
        messenger
    });

    beforeAll(async () => {
        store.seedTables(seedTables);
        await app.ready();
    });

    afterAll(async () => {
        await app.close();
    });

    it('GET /webhook - should echo the challenge for the configured token', async () => {
        const response = await app.inject({
            method: 'GET',
            url: '/webhook',
            query: { 'hub.mode': 'subscribe', 'hub.verify_token': 'test-verify-token', 'hub.challenge': '1158201444' }
        });

        expect(response.statusCode).toBe(200);
        expect(response.body).toBe('1158201444');
    });

    it('GET /webhook - should refuse a wrong token', async () => {
        const response = await app.inject({
            method: 'GET',
            url: '/webhook',
            query: { 'hub.mode': 'subscribe', 'hub.verify_token': 'nope', 'hub.challenge': '42' }
        });

        expect(response.statusCode).toBe(403);
    });

    it('POST /webhook - should reject bodies that are not notifications', async () => {
        const response = await app.inject({ method: 'POST', url: '/webhook', payload: { hello: 'world' } });

        expect(response.statusCode).toBe(400);
        expect(response.json().error).toBe('invalid_input');
    });

    it('POST /webhook - should queue and seat a customer', async () => {
        const join = await app.inject({
            method: 'POST',
            url: '/webhook',
            payload: notification([textMessage('15550101', 'hi')])
        });
        expect(join.statusCode).toBe(200);
        expect(join.body).toBe('EVENT_RECEIVED');

        await app.inject({
            method: 'POST',
            url: '/webhook',
            payload: notification([textMessage('15550101', 'Alice, 5')])
        });

        expect(messenger.to('15550101')).toEqual([
            'Enter your name and how many people are there (e.g., John, 5)',
            'Got it! Alice with 5 people. You are in the queue. We will notify you when a table is ready.',
            'Great news, Alice! Your table T9 is ready. Please proceed to your table.'
        ]);

        const tables = await app.inject({ method: 'GET', url: '/tables' });
        const t9 = tables.json().items.find((t: { number: string }) => t.number === 'T9');
        expect(t9).toMatchObject({ status: 'occupied', occupantName: 'Alice' });
    });

    it('POST /webhook - should answer non-text messages with the text-only notice', async () => {
        await app.inject({
            method: 'POST',
            url: '/webhook',
            payload: notification([{ from: '15550202', type: 'image' }])
        });

        expect(messenger.to('15550202')).toEqual(["I can only process text messages. Please say 'hi' to start."]);
    });

    it('GET /waitlist - should list waiting parties oldest first', async () => {
        store.enqueue('15550301', 'Bea', 2);
        store.enqueue('15550302', 'Cas', 4);

        const response = await app.inject({ method: 'GET', url: '/waitlist' });

        expect(response.statusCode).toBe(200);
        expect(response.json().items.map((e: { name: string }) => e.name)).toEqual(['Bea', 'Cas']);
    });

    it('GET /health - should report counts', async () => {
        const response = await app.inject({ method: 'GET', url: '/health' });

        expect(response.statusCode).toBe(200);
        expect(response.json()).toEqual({ ok: true, waiting: 2, freeTables: 9 });
    });

    it('API Hardening: should rate limit requests', async () => {
        const responses = await Promise.all(
            Array.from({ length: 35 }, () => app.inject({ method: 'GET', url: '/health' }))
        );

        expect(responses.filter(r => r.statusCode === 429).length).toBeGreaterThan(0);
    });
});

describe('extractInboundEvents', () => {
    it('should flatten every message of every change', () => {
        const events = extractInboundEvents({
            object: 'whatsapp_business_account',
            entry: [
                { changes: [{ field: 'messages', value: { messages: [textMessage('1', 'hi'), { from: '2', type: 'audio' }] } }] },
                { changes: [{ field: 'messages', value: {} }, { field: 'statuses', value: {} }] }
            ]
        });

        expect(events).toEqual([
            { partyId: '1', messageType: 'text', text: 'hi' },
            { partyId: '2', messageType: 'audio' }
        ]);
    });

    it('should ignore other objects', () => {
        expect(extractInboundEvents({ object: 'page', entry: [] })).toEqual([]);
    });
});
