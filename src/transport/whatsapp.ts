import type { InboundEvent } from "../types";
import type { WhatsAppWebhook } from "../schemas";

export const WHATSAPP_OBJECT = "whatsapp_business_account";

/**
 * Flatten a WhatsApp Cloud API notification into inbound events
 *
 * Notifications for other objects, non-message changes (e.g. delivery
 * statuses) and changes without messages yield nothing.
 *
 * @returns Events in delivery order
 */
export function extractInboundEvents(payload: WhatsAppWebhook): InboundEvent[] {
    if (payload.object !== WHATSAPP_OBJECT) return [];

    const events: InboundEvent[] = [];
    for (const entry of payload.entry) {
        for (const change of entry.changes) {
            if (change.field !== "messages") continue;
            for (const message of change.value.messages ?? []) {
                if (message.type === "text" && message.text) {
                    events.push({ partyId: message.from, messageType: "text", text: message.text.body });
                } else {
                    events.push({ partyId: message.from, messageType: message.type });
                }
            }
        }
    }
    return events;
}
