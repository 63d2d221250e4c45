import type { ZodType, ZodTypeDef } from 'zod';
import { logger } from '../logging/logger.js';

export interface ValidationIssue {
    path: string;
    message: string;
}

export class ValidationError extends Error {
    constructor(
        public readonly context: string,
        public readonly issues: ValidationIssue[]
    ) {
        super(`Validation Violation in ${context}: ${JSON.stringify(issues)}`);
        this.name = 'ValidationError';
    }
}

/**
 * Validates untrusted input against a schema.
 * Throws a ValidationError carrying every issue on failure.
 */
export function validate<T>(schema: ZodType<T, ZodTypeDef, unknown>, data: unknown, context: string): T {
    const result = schema.safeParse(data);

    if (!result.success) {
        const errorDetails = result.error.issues.map(e => ({
            path: e.path.join('.'),
            message: e.message
        }));

        // Values are left out: config input carries credentials
        logger.warn({
            context,
            errors: errorDetails
        }, "Input validation failure");

        throw new ValidationError(context, errorDetails);
    }

    return result.data;
}

/**
 * Factory for reusable validators bound to one schema.
 */
export const createValidator = <T>(schema: ZodType<T, ZodTypeDef, unknown>) => {
    return (data: unknown, contextLabel: string) => validate(schema, data, contextLabel);
};
