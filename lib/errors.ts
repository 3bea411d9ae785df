// lib/errors.ts

/** Blank or missing job text handed to an analyzer. */
export class InvalidInputError extends Error {
    constructor(message = "Job description cannot be empty") {
        super(message);
        this.name = "InvalidInputError";
    }
}

/** Chat-completion call, reply parsing or reply validation went wrong. */
export class ExternalServiceError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "ExternalServiceError";
    }
}

export class ConfigurationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ConfigurationError";
    }
}

export const errorMessage = (error: unknown): string =>
    error instanceof Error ? error.message : "Unknown error";
