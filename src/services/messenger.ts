import type { Logger } from "../logger";

/**
 * Outbound text delivery to a party
 *
 * `send` never throws: delivery failures are logged and reported as false.
 */
export interface Messenger {
    send(partyId: string, text: string): Promise<boolean>;
}

export type WhatsAppMessengerOptions = {
    accessToken: string;
    phoneNumberId: string;
    apiVersion: string;
    logger: Logger;
    fetchImpl?: typeof fetch;
};

/**
 * WhatsApp Cloud API text sender
 *
 * Without an access token or phone number id the message is only logged
 * (simulation mode) and `send` resolves to false.
 */
export class WhatsAppMessenger implements Messenger {
    private readonly fetchImpl: typeof fetch;

    constructor(private readonly options: WhatsAppMessengerOptions) {
        this.fetchImpl = options.fetchImpl ?? fetch;
    }

    get configured() {
        return Boolean(this.options.accessToken && this.options.phoneNumberId);
    }

    get apiUrl() {
        return `https://graph.facebook.com/${this.options.apiVersion}/${this.options.phoneNumberId}/messages`;
    }

    async send(partyId: string, text: string): Promise<boolean> {
        const log = this.options.logger;
        if (!this.configured) {
            log.info({ to: partyId, text }, "whatsapp not configured, message not sent");
            return false;
        }

        try {
            const response = await this.fetchImpl(this.apiUrl, {
                method: "POST",
                headers: {
                    Authorization: `Bearer ${this.options.accessToken}`,
                    "Content-Type": "application/json",
                },
                body: JSON.stringify({
                    messaging_product: "whatsapp",
                    to: partyId,
                    type: "text",
                    text: { body: text },
                }),
            });

            if (!response.ok) {
                const detail = await response.text().catch(() => "");
                log.error({ to: partyId, status: response.status, detail }, "whatsapp send rejected");
                return false;
            }
            return true;
        } catch (error) {
            log.error({ to: partyId, err: error }, "whatsapp send failed");
            return false;
        }
    }
}
