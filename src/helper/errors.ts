/**
 * Raised when a required environment variable is missing or malformed.
 */
export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

/**
 * Raised by the Steam match-history client for non-200 responses
 * and for calls made after the client was closed.
 */
export class SteamApiError extends Error {
    constructor(message: string, public readonly status?: number) {
        super(message);
        this.name = 'SteamApiError';
    }
}

/**
 * Raised by a store when an insert hits an existing primary/unique key.
 * The sync path treats it as "already exists".
 */
export class DuplicateRecordError extends Error {
    constructor(public readonly table: string, public readonly key: string) {
        super(`Duplicate ${table} record: ${key}`);
        this.name = 'DuplicateRecordError';
    }
}

/**
 * Raised when the joined provider sub-tasks of one sync exceed the deadline.
 */
export class SyncTimeoutError extends Error {
    constructor(public readonly user_id: number, public readonly timeout_ms: number) {
        super(`Sync for user ${user_id} timed out after ${timeout_ms}ms`);
        this.name = 'SyncTimeoutError';
    }
}
