/**
 * Zod schemas for provider responses.
 *
 * These validate the shape of JSON payloads at the system boundary before
 * rows reach the chunk store.
 */

import { z } from 'zod';

import type { ProviderValue } from '../services/dataProvider.js';

/** A scalar field, or a nested group of fields (e.g. `{ bid: { price, size } }`). */
const FieldValueSchema: z.ZodType<ProviderValue> = z.lazy(() =>
  z.union([z.number(), z.string(), z.boolean(), z.null(), z.record(FieldValueSchema)]),
);

/** One observation: a timestamp plus any number of value fields. */
const SeriesRowSchema = z
  .object({
    timestamp: z.union([z.string(), z.number()]),
  })
  .catchall(FieldValueSchema);

export const SeriesResponseSchema = z.union([
  // Most common: { results: [...] }
  z.object({ results: z.array(SeriesRowSchema) }).passthrough(),
  // Raw array
  z.array(SeriesRowSchema),
]);

export type SeriesRow = z.infer<typeof SeriesRowSchema>;
export type SeriesResponse = z.infer<typeof SeriesResponseSchema>;

/** Envelope fields some providers use to report errors inside a 2xx body. */
export const ApiErrorPayloadSchema = z
  .object({
    status: z.unknown().optional(),
    error: z.unknown().optional(),
    message: z.unknown().optional(),
  })
  .passthrough();

/** Rows of a validated response, whichever envelope it came in. */
export function seriesRows(response: SeriesResponse): SeriesRow[] {
  return Array.isArray(response) ? response : response.results;
}
