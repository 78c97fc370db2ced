/**
 * Downloader: entry points over one (root, granularity) store:
 * loadIndex(), addInstruments(), sync(), cancel() and getStatus().
 *
 * sync() starts at most one engine run per store; the run's cancellation
 * token comes from SyncState and is polled by the engine between attempts.
 */

import type pino from 'pino';

import type { Granularity } from '../lib/chunkCalendar.js';
import { errorMessage } from '../lib/errors.js';
import { SyncState } from '../lib/SyncState.js';
import { moduleLogger } from '../logger.js';
import { SyncEngine } from '../orchestrators/syncOrchestrator.js';
import type { SyncEngineOptions, SyncSummary } from '../orchestrators/syncOrchestrator.js';
import { ChunkStore } from '../store/chunkStore.js';
import type { IndexEntry } from '../store/chunkStore.js';
import { BufferedStatusSink } from './statusSink.js';
import type { StatusSink } from './statusSink.js';

interface DownloaderOptions extends Omit<SyncEngineOptions, 'statusSink' | 'log'> {
  root: string;
  granularity: Granularity;
  statusSink?: StatusSink | null;
  log?: pino.Logger;
}

/** Index row as shown to callers: ISO strings instead of Dates. */
interface IndexRow {
  instrument: string;
  firstObserved: string | null;
  lastObserved: string | null;
  missingChunks: number;
  chunkFiles: number;
  incompleteChunks: number;
  /** `<first> to <last>`, or `no data` when nothing has been stored yet. */
  dateRange: string;
}

type SyncStartResult =
  | { status: 'started'; done: Promise<SyncSummary | null> }
  | { status: 'already-running' };

function toIndexRow(entry: IndexEntry): IndexRow {
  const firstObserved = entry.firstObserved ? entry.firstObserved.toISOString() : null;
  const lastObserved = entry.lastObserved ? entry.lastObserved.toISOString() : null;
  return {
    instrument: entry.instrument,
    firstObserved,
    lastObserved,
    missingChunks: entry.missingChunks,
    chunkFiles: entry.chunkFiles,
    incompleteChunks: entry.incompleteChunks,
    dateRange: firstObserved && lastObserved ? `${firstObserved} to ${lastObserved}` : 'no data',
  };
}

class Downloader {
  readonly store: ChunkStore;
  readonly state: SyncState;
  readonly messages: BufferedStatusSink;

  private readonly engine: SyncEngine;
  private readonly log: pino.Logger;
  private lastSummary: SyncSummary | null = null;

  constructor(options: DownloaderOptions) {
    const { root, granularity, statusSink, log, ...engineOptions } = options;
    this.log = log ?? moduleLogger(`downloader:${granularity}`);
    this.store = new ChunkStore({ root, granularity, log: this.log });
    this.state = new SyncState(`sync:${granularity}`);
    this.messages = new BufferedStatusSink({ forward: statusSink ?? null });
    this.engine = new SyncEngine({ ...engineOptions, statusSink: this.messages, log: this.log });
  }

  get granularity(): Granularity {
    return this.store.granularity;
  }

  get isRunning(): boolean {
    return this.state.isRunning;
  }

  /** Rebuild the index from disk and return it as rows sorted by instrument. */
  async loadIndex(): Promise<IndexRow[]> {
    const index = await this.store.load();
    return Array.from(index.values())
      .sort((a, b) => a.instrument.localeCompare(b.instrument))
      .map(toIndexRow);
  }

  /** Register instruments; already-known ids are left untouched. Returns the ids added or re-affirmed. */
  async addInstruments(ids: readonly string[]): Promise<string[]> {
    await this.store.ensureRoot();
    const unique = Array.from(new Set(ids.map((id) => String(id || '').trim()).filter(Boolean)));
    for (const id of unique) {
      await this.store.addInstrument(id);
    }
    if (unique.length > 0) {
      this.messages.notify(`Registered ${unique.length} instrument(s) for ${this.granularity}: ${unique.join(', ')}`);
    }
    return unique;
  }

  /**
   * Start a sync pass in the background. `done` settles with the summary,
   * or null if the store directory could not be created.
   */
  sync(selected?: readonly string[] | null): SyncStartResult {
    if (this.state.isRunning) {
      return { status: 'already-running' };
    }
    const controller = this.state.beginRun();
    const done = this.runSync(controller, selected ?? null);
    return { status: 'started', done };
  }

  /** Request cancellation of the running pass. Returns false when idle. */
  cancel(): boolean {
    const accepted = this.state.requestStop();
    if (accepted) {
      this.messages.notify(`Cancellation requested for ${this.granularity}`);
    }
    return accepted;
  }

  getStatus() {
    return {
      granularity: this.granularity,
      ...this.state.getStatus(),
      last_message: this.messages.last,
      last_summary: this.lastSummary,
    };
  }

  private async runSync(controller: AbortController, selected: readonly string[] | null): Promise<SyncSummary | null> {
    try {
      try {
        await this.store.ensureRoot();
        if (!selected) {
          // Pick up instruments present on disk but not yet in memory.
          await this.store.load();
        }
      } catch (err: unknown) {
        const message = errorMessage(err);
        this.log.error(`[downloader] cannot open store ${this.store.directory}: ${message}`);
        this.messages.notify(`Cannot open store ${this.store.directory}: ${message}`);
        this.state.markFailed({ lastMessage: message });
        return null;
      }

      const summary = await this.engine.run(this.store, {
        instruments: selected,
        signal: controller.signal,
        onPhase: (phase) => this.state.setPhase(phase),
        onProgress: (progress) => this.state.setStatus(progress),
      });
      this.lastSummary = summary;
      const fields = {
        plannedPeriods: summary.plannedPeriods,
        writtenChunks: summary.written + summary.empty,
        failedChunks: summary.failed + summary.storageErrors,
        lastMessage: this.messages.last,
      };
      if (summary.status === 'cancelled') {
        this.state.markCancelled(fields);
      } else {
        this.state.markCompleted(fields);
      }
      return summary;
    } catch (err: unknown) {
      const message = errorMessage(err);
      this.log.error(`[downloader] sync for ${this.granularity} failed: ${message}`);
      this.state.markFailed({ lastMessage: message });
      return null;
    } finally {
      this.state.cleanup(controller);
    }
  }
}

export { Downloader };
export type { DownloaderOptions, IndexRow, SyncStartResult };
