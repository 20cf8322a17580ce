import { z } from 'zod';
import type { JsonValue } from '../types/index.js';

/**
 * Zod schema for any JSON value. Attributes and details pass through
 * this so nothing non-serialisable reaches an output document.
 */
export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
    z.union([
        z.string(),
        z.number(),
        z.boolean(),
        z.null(),
        z.array(jsonValueSchema),
        z.record(z.string(), jsonValueSchema),
    ])
);

export const jsonObjectSchema = z.record(z.string(), jsonValueSchema);

/**
 * Narrow an unknown value to a JSON object (not an array, not null).
 */
export function isJsonObject(value: unknown): value is Record<string, JsonValue> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
