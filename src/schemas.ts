import { z } from 'zod';

/**
 * Validation schema for GET /webhook query parameters
 *
 * Meta's verification handshake when the webhook URL is registered.
 */
export const VerifyWebhookQuerySchema = z.object({
    'hub.mode': z.string().optional(),
    'hub.verify_token': z.string(),
    'hub.challenge': z.string(),
});

const WhatsAppMessageSchema = z.object({
    /** Sender's WhatsApp phone number */
    from: z.string().min(1),
    id: z.string().optional(),
    /** "text", "image", "audio", "location", ... */
    type: z.string(),
    text: z.object({ body: z.string() }).optional(),
});

/**
 * Validation schema for POST /webhook request body
 *
 * Only the parts of the WhatsApp Cloud API notification that carry messages are
 * described; status updates and unknown fields pass through untouched.
 */
export const WhatsAppWebhookSchema = z.object({
    object: z.string(),
    entry: z.array(z.object({
        id: z.string().optional(),
        changes: z.array(z.object({
            field: z.string(),
            value: z.object({
                messages: z.array(WhatsAppMessageSchema).optional(),
            }).passthrough(),
        })),
    })).default([]),
});

export type WhatsAppWebhook = z.infer<typeof WhatsAppWebhookSchema>;

const isoDateTime = z.string().datetime({ offset: true });

/**
 * Validation schema for the store snapshot file
 */
export const StoreSnapshotSchema = z.object({
    sequence: z.number().int().nonnegative(),
    entries: z.array(z.object({
        id: z.string(),
        partyId: z.string(),
        name: z.string(),
        partySize: z.number().int().positive(),
        enqueuedAt: isoDateTime,
    })),
    tables: z.array(z.object({
        id: z.string(),
        number: z.string(),
        capacity: z.number().int().positive(),
        status: z.enum(['free', 'occupied']),
        occupantEntryId: z.string().nullable(),
        occupantName: z.string().nullable(),
        occupiedAt: isoDateTime.nullable(),
        statusChangedAt: isoDateTime,
    })),
});
