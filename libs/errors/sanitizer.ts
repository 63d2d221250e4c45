import { logger } from '../logging/logger.js';
import crypto from 'crypto';

/**
 * Error Information Disclosure Prevention
 * Wraps internal errors in a generic message and hands out an incident id
 * that correlates the public response with the logged detail.
 */

/** Area of the service an unexpected failure came from */
export type ErrorCategory = 'OPS' | 'GATEWAY' | 'CONTAINER';

export class ServiceError extends Error {
    public readonly incidentId: string;
    public readonly timestamp: string;
    public readonly contextLabel?: string;
    public override cause?: unknown;

    constructor(
        public readonly publicMessage: string,
        public readonly internalDetails?: unknown,
        public readonly category: ErrorCategory = 'OPS',
        options?: { cause?: unknown; contextLabel?: string }
    ) {
        super(publicMessage);
        this.name = 'ServiceError';
        this.incidentId = crypto.randomUUID();
        this.timestamp = new Date().toISOString();
        this.contextLabel = options?.contextLabel;
        this.cause = options?.cause;

        // Full detail goes to the log only
        logger.error({
            incidentId: this.incidentId,
            category: this.category,
            internalDetails,
            stack: this.stack
        }, publicMessage);
    }
}

export const ErrorSanitizer = {
    /**
     * Catches and wraps any error into a sanitized ServiceError.
     */
    sanitize: (err: unknown, contextLabel: string, category: ErrorCategory = 'OPS'): ServiceError => {
        if (err instanceof ServiceError) return err;

        let originalErrorMessage: string | undefined;
        let originalErrorStack: string | undefined;

        if (err instanceof Error) {
            originalErrorMessage = err.message;
            originalErrorStack = err.stack;
        } else if (typeof err === 'string') {
            originalErrorMessage = err;
        } else if (err && typeof err === 'object' && 'message' in err) {
            if (typeof err.message === 'string') {
                originalErrorMessage = err.message;
            }
            if ('stack' in err && typeof err.stack === 'string') {
                originalErrorStack = err.stack;
            }
        } else {
            originalErrorMessage = String(err);
        }

        return new ServiceError(
            `An internal error occurred (${contextLabel}).`,
            { originalError: originalErrorMessage, stack: originalErrorStack, context: contextLabel },
            category,
            { cause: err, contextLabel }
        );
    }
};
