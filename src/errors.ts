/**
 * Error taxonomy for the ticket pipeline. Only ValidationError maps to a
 * client error; everything else ends at the top-level boundary as a 500.
 */

export class ValidationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ValidationError";
    }
}

export class ConfigurationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ConfigurationError";
    }
}

/**
 * Failure of a collaborator (language detection, translation, agents) or a
 * response from one that cannot be used.
 */
export class UpstreamServiceError extends Error {
    constructor(
        message: string,
        public readonly service: string,
        public readonly cause?: unknown
    ) {
        super(message);
        this.name = "UpstreamServiceError";
    }
}

export class UnroutableCategoryError extends UpstreamServiceError {
    constructor(public readonly category: string) {
        super(`No specialist agent is registered for category '${category}'`, "classifier");
        this.name = "UnroutableCategoryError";
    }
}

export const errorMessage = (error: unknown): string =>
    error instanceof Error ? error.message : String(error);
