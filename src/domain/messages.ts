/**
 * Texts sent to parties over the messaging channel
 */
export const messages = {
    waiterPasswordPrompt: "Please enter the waiter password.",
    waiterAuthenticated: "Waiter authenticated. Please enter the table number that is now free (e.g., T4 or just 4).",
    waiterPasswordRejected: "Incorrect password. Please try again or say 'hi' to start as a customer.",
    tableFreed: (tableNumber: string) =>
        `Table ${tableNumber} marked as free. Attempting to seat waiting customers...`,
    tableFormatInvalid: "Invalid table number format. Please enter the table number, e.g. 'T4' or '4'.",
    tableUnknown: (tableNumber: string) =>
        `Could not find table ${tableNumber}. Please ensure the table number is correct (e.g., T1, T5, T10).`,
    joinPrompt: "Enter your name and how many people are there (e.g., John, 5)",
    joinQueued: (name: string, partySize: number) =>
        `Got it! ${name} with ${partySize} ${partySize === 1 ? 'person' : 'people'}. You are in the queue. We will notify you when a table is ready.`,
    joinFormatInvalid: "Please provide name and number in format: Name, Number (e.g., John, 5)",
    joinNotPositive: "Number of people must be a positive integer. Please try again.",
    joinTooLarge: (maxPartySize: number) =>
        `We currently don't have tables for more than ${maxPartySize} people. Please try with a smaller group.`,
    help: "Please say 'hi' to start as a customer or 'waiter' to access waiter functions.",
    textOnly: "I can only process text messages. Please say 'hi' to start.",
    failure: "Sorry, something went wrong on our side. Please send your last message again.",
    tableReady: (name: string, tableNumber: string) =>
        `Great news, ${name}! Your table ${tableNumber} is ready. Please proceed to your table.`,
} as const;
