import { z } from 'zod';

/**
 * Input schemas for the HTTP surface.
 */

export const MAX_LOG_TAIL = 10_000;

export const LogsQuerySchema = z.object({
    tail: z.coerce.number().int().min(1).max(MAX_LOG_TAIL).default(100)
});

export type LogsQuery = z.infer<typeof LogsQuerySchema>;

/** "All", or comma-separated account summary tag names */
export const AccountSummaryQuerySchema = z.object({
    tags: z.string()
        .trim()
        .regex(/^[A-Za-z]+(,[A-Za-z]+)*$/, 'Expected "All" or comma-separated tag names')
        .default('All')
});

export type AccountSummaryQuery = z.infer<typeof AccountSummaryQuerySchema>;
