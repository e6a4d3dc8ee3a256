/**
 * Raised when the waitlist/table snapshot cannot be read or written
 *
 * The in-memory change that preceded a failed write is rolled back before this
 * is thrown, so callers may retry the same operation.
 */
export class PersistenceError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'PersistenceError';
    }
}
