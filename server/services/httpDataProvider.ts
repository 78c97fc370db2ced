/**
 * Generic JSON-over-HTTP DataProvider adapter.
 *
 *   GET <base>/series/<instrument>?interval=<granularity>&start=<iso>[&end=<iso>]
 *
 * Every native failure is mapped onto a ProviderError kind here, so nothing
 * past this module inspects status codes or message text.
 */

import { ApiErrorPayloadSchema, SeriesResponseSchema, seriesRows } from '../lib/apiSchemas.js';
import { ProviderError, isAbortError } from '../lib/errors.js';
import type { DataProvider, FetchRequest, ProviderRow } from './dataProvider.js';

interface HttpDataProviderOptions {
  baseUrl: string;
  apiKey?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

const THROTTLE_PATTERN = /Limit Reach|Too Many Requests|rate limit|throttl/i;
const INVALID_INSTRUMENT_PATTERN = /invalid (?:instrument|symbol|ric)|unknown (?:instrument|symbol|ric)/i;
const NO_DATA_PATTERN = /no data|no results/i;

function parseJsonSafe(text: unknown): unknown {
  if (typeof text !== 'string' || !text.trim()) return null;
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

function extractApiError(payload: unknown): string | null {
  if (Array.isArray(payload)) return null;
  const parsed = ApiErrorPayloadSchema.safeParse(payload);
  if (!parsed.success) return null;
  const obj = parsed.data;
  if (String(obj.status || '').toUpperCase() === 'ERROR') {
    return String(obj.error || obj.message || 'Provider returned ERROR status').trim();
  }
  // A bare `message` next to results is informational.
  const candidates = obj.results === undefined ? [obj.error, obj.message] : [obj.error];
  for (const value of candidates) {
    if (typeof value === 'string' && value.trim()) return value.trim();
  }
  return null;
}

/** Classify an error message returned in a 2xx body or alongside a failing status. */
function classifyApiMessage(label: string, message: string, httpStatus?: number): ProviderError {
  if (THROTTLE_PATTERN.test(message)) {
    return new ProviderError('throttled', `${label} throttled: ${message}`, { httpStatus });
  }
  if (INVALID_INSTRUMENT_PATTERN.test(message)) {
    return new ProviderError('invalid-instrument', `${label} rejected instrument: ${message}`, { httpStatus });
  }
  if (NO_DATA_PATTERN.test(message)) {
    return new ProviderError('not-found', `${label} has no data: ${message}`, { httpStatus });
  }
  return new ProviderError('transient', `${label} API error: ${message}`, { httpStatus });
}

function classifyHttpStatus(label: string, status: number, details: string): ProviderError {
  if (status === 429) {
    return new ProviderError('throttled', `${label} request failed (429): ${details || 'Too Many Requests'}`, {
      httpStatus: status,
    });
  }
  if (status === 404) {
    return new ProviderError('invalid-instrument', `${label} request failed (404): ${details || 'Not Found'}`, {
      httpStatus: status,
    });
  }
  if (details) {
    const fromMessage = classifyApiMessage(label, details, status);
    if (fromMessage.kind !== 'transient') return fromMessage;
  }
  return new ProviderError('transient', `${label} request failed (${status}): ${details || `HTTP ${status}`}`, {
    httpStatus: status,
  });
}

class HttpDataProvider implements DataProvider {
  readonly name = 'http';
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpDataProviderOptions) {
    this.baseUrl = String(options.baseUrl || '').replace(/\/+$/, '');
    this.apiKey = String(options.apiKey || '');
    this.timeoutMs = Math.max(1, options.timeoutMs ?? 15_000);
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  buildUrl(request: FetchRequest): string {
    if (!this.baseUrl) {
      throw new ProviderError('transient', 'Provider base URL is not configured');
    }
    const url = new URL(`${this.baseUrl}/series/${encodeURIComponent(request.instrument)}`);
    url.searchParams.set('interval', request.granularity);
    url.searchParams.set('start', request.start.toISOString());
    if (request.end) url.searchParams.set('end', request.end.toISOString());
    return url.toString();
  }

  async fetch(request: FetchRequest): Promise<ProviderRow[]> {
    const label = `${request.instrument} ${request.granularity} ${request.start.toISOString()}`;
    const url = this.buildUrl(request);
    const controller = new AbortController();
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);

    let status: number;
    let ok: boolean;
    let text: string;
    try {
      const headers: Record<string, string> = { accept: 'application/json' };
      if (this.apiKey) headers['x-api-key'] = this.apiKey;
      const resp = await this.fetchImpl(url, { headers, signal: controller.signal });
      status = resp.status;
      ok = resp.ok;
      text = await resp.text();
    } catch (err: unknown) {
      if (timedOut && isAbortError(err)) {
        throw new ProviderError('transient', `${label} request timed out after ${this.timeoutMs}ms`, {
          cause: err,
          httpStatus: 504,
        });
      }
      const message = err instanceof Error ? err.message : String(err);
      throw new ProviderError('transient', `${label} request failed: ${message}`, { cause: err });
    } finally {
      clearTimeout(timeout);
    }

    if (status === 204) {
      throw new ProviderError('not-found', `${label} has no data (204)`, { httpStatus: status });
    }

    const payload = parseJsonSafe(text);
    const apiError = extractApiError(payload);
    if (!ok) {
      throw classifyHttpStatus(label, status, apiError || text.trim().slice(0, 180));
    }
    if (apiError) {
      throw classifyApiMessage(label, apiError);
    }

    const parsed = SeriesResponseSchema.safeParse(payload);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ProviderError(
        'transient',
        `${label} returned an unexpected payload${issue ? ` (${issue.path.join('.')}: ${issue.message})` : ''}`,
      );
    }

    const rows = seriesRows(parsed.data);
    if (rows.length === 0) {
      throw new ProviderError('not-found', `${label} returned no rows`);
    }
    return rows.map(({ timestamp, ...values }) => ({ timestamp, values }));
  }
}

export { HttpDataProvider };
export type { HttpDataProviderOptions };
