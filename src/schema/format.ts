import { z } from 'zod';

/**
 * Flattens zod issues into a single "path: message" line for log output.
 */
export function formatIssues(error: z.ZodError): string {
    return error.errors
        .map(e => (e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message))
        .join(', ');
}

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
