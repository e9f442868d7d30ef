/**
 * Failure kinds of the lyrics pipeline. None of them is fatal to the process:
 * each is logged and degrades to an empty pane or a status message.
 * "Not found" is a normal provider outcome and has no class here.
 */

/** Network or HTTP failure, abort, or timeout while talking to a provider. */
export class TransientProviderError extends Error {
    public readonly name = 'TransientProviderError';

    constructor(
        public readonly provider: string,
        message: string,
        public readonly status?: number,
        options?: { cause?: unknown }
    ) {
        super(`[${provider}] ${message}`, options);
    }
}

export class TagWriteFailure extends Error {
    public readonly name = 'TagWriteFailure';

    constructor(public readonly filePath: string, message: string, options?: { cause?: unknown }) {
        super(`${message}: ${filePath}`, options);
    }
}

/** The player's control channel could not be reached. */
export class PlayerUnavailable extends Error {
    public readonly name = 'PlayerUnavailable';

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
    }
}

/** No remote provider can be built from the configuration; lookups behave as offline. */
export class ConfigurationConflict extends Error {
    public readonly name = 'ConfigurationConflict';
}

/** Malformed command line or environment value. Reported as a usage error at startup. */
export class ConfigurationError extends Error {
    public readonly name = 'ConfigurationError';
}

export function describeError(error: unknown): string {
    if (error instanceof Error) return error.message;
    return String(error);
}
