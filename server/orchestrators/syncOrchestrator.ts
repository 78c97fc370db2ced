/**
 * SyncEngine decides which chunks a store still needs and drives the
 * sequential fetch loop over them.
 *
 * One engine run per store at a time. The engine never refreshes the
 * store index; callers reload it once the run returns.
 */

import type pino from 'pino';

import { enumeratePeriods, lookbackStartFor } from '../lib/chunkCalendar.js';
import type { PlannedPeriod } from '../lib/chunkCalendar.js';
import { classifyProviderError, errorMessage, isAbortError } from '../lib/errors.js';
import type { ProviderError } from '../lib/errors.js';
import { MinSpacingRateLimiter, sleepWithAbort } from '../lib/rateLimiter.js';
import type { SleepFn } from '../lib/rateLimiter.js';
import type { SyncPhase } from '../lib/SyncState.js';
import { moduleLogger } from '../logger.js';
import type { DataProvider, ProviderRow } from '../services/dataProvider.js';
import type { StatusSink } from '../services/statusSink.js';
import type { ChunkStore } from '../store/chunkStore.js';

const DEFAULT_MAX_ATTEMPTS = 5;
const DEFAULT_MIN_CALL_SPACING_MS = 5_000;
const DEFAULT_THROTTLE_COOLDOWN_MS = 60_000;

/** The part of ChunkStore the engine relies on. */
type SyncTarget = Pick<ChunkStore, 'granularity' | 'period' | 'hasChunk' | 'writeChunk' | 'listInstruments'>;

interface SyncProgress {
  plannedPeriods: number;
  processedPeriods: number;
  writtenChunks: number;
  failedChunks: number;
}

interface SyncEngineOptions {
  provider: DataProvider;
  statusSink?: StatusSink | null;
  minCallSpacingMs?: number;
  throttleCooldownMs?: number;
  maxAttempts?: number;
  /** Overrides the granularity's default lookback start. */
  lookbackStart?: Date | null;
  now?: () => Date;
  /** Used for throttle cooldowns and, unless a limiter is given, rate-limit waits. */
  sleep?: SleepFn;
  rateLimiter?: MinSpacingRateLimiter;
  log?: pino.Logger;
}

interface SyncRunOptions {
  /** Explicit selection; defaults to every instrument registered in the store. */
  instruments?: readonly string[] | null;
  /** Cancellation token, polled before every attempt. */
  signal?: AbortSignal | null;
  onPhase?: (phase: SyncPhase) => void;
  onProgress?: (progress: SyncProgress) => void;
}

interface SyncSummary {
  status: 'completed' | 'cancelled';
  granularity: string;
  instruments: string[];
  plannedPeriods: number;
  attempts: number;
  skipped: number;
  written: number;
  empty: number;
  failed: number;
  storageErrors: number;
  invalidInstruments: string[];
  startedAt: string;
  finishedAt: string;
}

type FetchOutcome =
  | { kind: 'rows'; rows: ProviderRow[] }
  | { kind: 'invalid-instrument'; error: ProviderError }
  | { kind: 'exhausted'; error: ProviderError | null }
  | { kind: 'cancelled' };

class SyncEngine {
  readonly maxAttempts: number;
  readonly throttleCooldownMs: number;

  private readonly provider: DataProvider;
  private readonly statusSink: StatusSink | null;
  private readonly lookbackStart: Date | null;
  private readonly now: () => Date;
  private readonly sleep: SleepFn;
  private readonly limiter: MinSpacingRateLimiter;
  private readonly log: pino.Logger;

  constructor(options: SyncEngineOptions) {
    this.provider = options.provider;
    this.statusSink = options.statusSink ?? null;
    this.maxAttempts = Math.max(1, Math.floor(options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS));
    this.throttleCooldownMs = Math.max(0, options.throttleCooldownMs ?? DEFAULT_THROTTLE_COOLDOWN_MS);
    this.lookbackStart = options.lookbackStart ?? null;
    this.now = options.now ?? (() => new Date());
    this.sleep = options.sleep ?? sleepWithAbort;
    this.limiter =
      options.rateLimiter ??
      new MinSpacingRateLimiter({
        minSpacingMs: options.minCallSpacingMs ?? DEFAULT_MIN_CALL_SPACING_MS,
        sleep: this.sleep,
      });
    this.log = options.log ?? moduleLogger('sync');
  }

  private notify(message: string): void {
    this.statusSink?.notify(message);
  }

  /** Every period from the lookback floor up to the one containing `now`, oldest first. */
  plan(target: Pick<SyncTarget, 'granularity' | 'period'>, now: Date = this.now()): PlannedPeriod[] {
    const start = this.lookbackStart ?? lookbackStartFor(target.granularity, now);
    return enumeratePeriods(start, now, target.period);
  }

  async run(target: SyncTarget, options: SyncRunOptions = {}): Promise<SyncSummary> {
    const signal = options.signal ?? null;
    const startedAt = this.now();
    const instruments = options.instruments ? Array.from(new Set(options.instruments)) : target.listInstruments();

    options.onPhase?.('planning');
    const periods = this.plan(target, startedAt);
    const summary: SyncSummary = {
      status: 'completed',
      granularity: target.granularity,
      instruments,
      plannedPeriods: periods.length,
      attempts: 0,
      skipped: 0,
      written: 0,
      empty: 0,
      failed: 0,
      storageErrors: 0,
      invalidInstruments: [],
      startedAt: startedAt.toISOString(),
      finishedAt: startedAt.toISOString(),
    };
    const progress: SyncProgress = { plannedPeriods: periods.length, processedPeriods: 0, writtenChunks: 0, failedChunks: 0 };
    options.onProgress?.({ ...progress });

    this.notify(
      `Planning ${target.granularity}: ${periods.length} ${target.period} periods for ${instruments.length} instrument(s)`,
    );
    const finish = (status: SyncSummary['status']): SyncSummary => {
      summary.status = status;
      summary.finishedAt = this.now().toISOString();
      this.notify(
        `Sync ${status} (${target.granularity}): written=${summary.written} empty=${summary.empty} skipped=${summary.skipped} failed=${summary.failed}`,
      );
      this.log.info({ summary }, `[sync] ${target.granularity} run ${status}`);
      return summary;
    };

    options.onPhase?.('fetching');
    const abandoned = new Set<string>();

    for (const period of periods) {
      for (const instrument of instruments) {
        if (abandoned.has(instrument)) continue;
        if (signal?.aborted) return finish('cancelled');

        if (!period.incomplete && (await this.isSatisfied(target, instrument, period))) {
          summary.skipped += 1;
          continue;
        }

        const outcome = await this.fetchWithRetry(target, instrument, period, signal, summary);
        if (outcome.kind === 'cancelled') return finish('cancelled');

        if (outcome.kind === 'invalid-instrument') {
          abandoned.add(instrument);
          summary.invalidInstruments.push(instrument);
          this.notify(`Invalid instrument ${instrument}: ${outcome.error.message}; skipping its remaining periods`);
          continue;
        }

        if (outcome.kind === 'exhausted') {
          summary.failed += 1;
          progress.failedChunks += 1;
          const reason = outcome.error ? outcome.error.message : 'no attempt succeeded';
          this.notify(`Giving up on ${instrument} ${period.periodStart.toISOString()} after ${this.maxAttempts} attempts: ${reason}`);
          continue;
        }

        try {
          const written = await target.writeChunk(instrument, period.periodStart, period.incomplete, outcome.rows);
          if (written.rowCount === 0) {
            summary.empty += 1;
          } else {
            summary.written += 1;
          }
          progress.writtenChunks += 1;
          this.log.debug(`[sync] wrote ${written.rowCount} rows to ${written.filePath}`);
        } catch (err: unknown) {
          summary.storageErrors += 1;
          progress.failedChunks += 1;
          const message = errorMessage(err);
          this.log.error(`[sync] failed writing ${instrument} ${period.periodStart.toISOString()}: ${message}`);
          this.notify(`Could not store ${instrument} ${period.periodStart.toISOString()}: ${message}`);
        }
      }
      progress.processedPeriods += 1;
      options.onProgress?.({ ...progress });
    }

    return finish('completed');
  }

  private async isSatisfied(target: SyncTarget, instrument: string, period: PlannedPeriod): Promise<boolean> {
    try {
      return await target.hasChunk(instrument, period.periodStart);
    } catch (err: unknown) {
      // Unknown state: fetch again rather than trust a file we cannot inspect.
      this.log.warn(`[sync] could not inspect ${instrument} ${period.periodStart.toISOString()}: ${errorMessage(err)}`);
      return false;
    }
  }

  private async fetchWithRetry(
    target: SyncTarget,
    instrument: string,
    period: PlannedPeriod,
    signal: AbortSignal | null,
    summary: SyncSummary,
  ): Promise<FetchOutcome> {
    let lastError: ProviderError | null = null;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      if (signal?.aborted) return { kind: 'cancelled' };
      try {
        await this.limiter.acquire(signal);
      } catch (err: unknown) {
        if (isAbortError(err)) return { kind: 'cancelled' };
        throw err;
      }

      summary.attempts += 1;
      try {
        const rows = await this.provider.fetch({
          instrument,
          granularity: target.granularity,
          start: period.periodStart,
          end: period.incomplete ? null : period.periodEnd,
        });
        return { kind: 'rows', rows };
      } catch (err: unknown) {
        const error = classifyProviderError(err);
        lastError = error;
        const label = `${instrument} ${period.periodStart.toISOString()} (attempt ${attempt}/${this.maxAttempts})`;

        if (error.kind === 'not-found') {
          return { kind: 'rows', rows: [] };
        }
        if (error.kind === 'invalid-instrument') {
          return { kind: 'invalid-instrument', error };
        }
        if (error.kind === 'throttled') {
          this.log.warn(`[sync] ${label} throttled by provider, cooling down ${this.throttleCooldownMs}ms`);
          this.notify(`Provider throttled ${label}; waiting ${Math.round(this.throttleCooldownMs / 1000)}s`);
          if (attempt < this.maxAttempts) {
            try {
              await this.sleep(this.throttleCooldownMs, signal);
            } catch (sleepErr: unknown) {
              if (isAbortError(sleepErr)) return { kind: 'cancelled' };
              throw sleepErr;
            }
          }
          continue;
        }
        this.log.warn(`[sync] ${label} failed: ${error.message}`);
      }
    }

    return { kind: 'exhausted', error: lastError };
  }
}

export { SyncEngine, DEFAULT_MAX_ATTEMPTS, DEFAULT_MIN_CALL_SPACING_MS, DEFAULT_THROTTLE_COOLDOWN_MS };
export type { SyncEngineOptions, SyncRunOptions, SyncSummary, SyncProgress, SyncTarget };
