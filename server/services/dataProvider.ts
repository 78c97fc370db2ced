/**
 * DataProvider is the collaborator that supplies raw rows for one instrument
 * over one period. The core never talks to a vendor directly; every adapter
 * maps its native failures onto ProviderError kinds at this boundary.
 */

import { classifyProviderError } from '../lib/errors.js';
import type { Granularity } from '../lib/chunkCalendar.js';

/** A field value as delivered by a provider: scalar, or a nested group of fields. */
type ProviderValue = number | string | boolean | null | undefined | { [field: string]: ProviderValue };

interface ProviderRow {
  /** Date, epoch milliseconds, or an ISO-8601 string. */
  timestamp: Date | number | string;
  values: Record<string, ProviderValue>;
}

interface FetchRequest {
  instrument: string;
  granularity: Granularity;
  /** Inclusive. */
  start: Date;
  /** Exclusive; null means "open ended, up to now". */
  end: Date | null;
}

interface DataProvider {
  readonly name: string;
  /**
   * Resolves with rows, or rejects with a ProviderError. Calls are never
   * interrupted by the caller; cancellation only prevents the next one.
   */
  fetch(request: FetchRequest): Promise<ProviderRow[]>;
}

/**
 * Wrap a provider so that anything it throws reaches the engine as a
 * ProviderError; unclassified failures become `transient`.
 */
function withErrorClassification(provider: DataProvider): DataProvider {
  return {
    name: provider.name,
    async fetch(request: FetchRequest): Promise<ProviderRow[]> {
      try {
        return await provider.fetch(request);
      } catch (err: unknown) {
        throw classifyProviderError(err);
      }
    },
  };
}

export { withErrorClassification };
export type { DataProvider, FetchRequest, ProviderRow, ProviderValue };
