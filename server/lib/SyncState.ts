/**
 * SyncState: lifecycle and status for one store's sync job.
 *
 * All mutable fields are private. The downloader interacts through the
 * public API (beginRun, setPhase, requestStop, markCompleted, cleanup, …).
 * The cancellation token handed to the engine is the AbortSignal of the
 * controller created by beginRun().
 */

type SyncPhase = 'idle' | 'planning' | 'fetching' | 'cancelled' | 'completed' | 'failed';

/** Status fields maintained by a SyncState instance. */
interface SyncStatusFields {
  running?: boolean;
  status?: SyncPhase;
  plannedPeriods?: number;
  processedPeriods?: number;
  writtenChunks?: number;
  failedChunks?: number;
  startedAt?: string | null;
  finishedAt?: string | null;
  lastMessage?: string | null;
}

class SyncState {
  readonly name: string;

  private _running: boolean;
  private _stopRequested: boolean;
  private _abortController: AbortController | null;
  private _status: SyncStatusFields;

  constructor(name: string) {
    this.name = name;
    this._running = false;
    this._stopRequested = false;
    this._abortController = null;
    this._status = {
      running: false,
      status: 'idle',
      plannedPeriods: 0,
      processedPeriods: 0,
      writtenChunks: 0,
      failedChunks: 0,
      startedAt: null,
      finishedAt: null,
      lastMessage: null,
    };
  }

  /** True while a sync job owns this state object. */
  get isRunning(): boolean {
    return this._running;
  }

  get phase(): SyncPhase {
    return this._status.status || 'idle';
  }

  /** Combined status object served to pollers. */
  getStatus(): {
    name: string;
    running: boolean;
    stop_requested: boolean;
    status: SyncPhase;
    planned_periods: number;
    processed_periods: number;
    written_chunks: number;
    failed_chunks: number;
    started_at: string | null;
    finished_at: string | null;
    last_message: string | null;
  } {
    return {
      name: this.name,
      running: this._running,
      stop_requested: this._stopRequested,
      status: this.phase,
      planned_periods: Number(this._status.plannedPeriods || 0),
      processed_periods: Number(this._status.processedPeriods || 0),
      written_chunks: Number(this._status.writtenChunks || 0),
      failed_chunks: Number(this._status.failedChunks || 0),
      started_at: this._status.startedAt || null,
      finished_at: this._status.finishedAt || null,
      last_message: this._status.lastMessage || null,
    };
  }

  /**
   * Begin a new run in the planning phase. Creates a fresh AbortController
   * and resets the stop flag. Returns the controller whose signal is the
   * run's cancellation token.
   */
  beginRun(): AbortController {
    this._running = true;
    this._stopRequested = false;
    this._abortController = new AbortController();
    this._status = {
      running: true,
      status: 'planning',
      plannedPeriods: 0,
      processedPeriods: 0,
      writtenChunks: 0,
      failedChunks: 0,
      startedAt: new Date().toISOString(),
      finishedAt: null,
      lastMessage: this._status.lastMessage ?? null,
    };
    return this._abortController;
  }

  setPhase(phase: SyncPhase): void {
    this._status = { ...this._status, status: phase };
  }

  /** Merge fields into the current status (non-destructive). */
  setStatus(fields: SyncStatusFields): void {
    this._status = { ...this._status, ...fields };
  }

  /** Returns false if not currently running. */
  requestStop(): boolean {
    if (!this._running) return false;
    this._stopRequested = true;
    if (this._abortController && !this._abortController.signal.aborted) {
      this._abortController.abort();
    }
    return true;
  }

  /** Terminal transition after cancellation; clears the stop flag. */
  markCancelled(fields: SyncStatusFields = {}): void {
    this._stopRequested = false;
    this._status = { ...this._status, ...fields, running: false, status: 'cancelled', finishedAt: new Date().toISOString() };
  }

  markCompleted(fields: SyncStatusFields = {}): void {
    this._stopRequested = false;
    this._status = { ...this._status, ...fields, running: false, status: 'completed', finishedAt: new Date().toISOString() };
  }

  markFailed(fields: SyncStatusFields = {}): void {
    this._stopRequested = false;
    this._status = { ...this._status, ...fields, running: false, status: 'failed', finishedAt: new Date().toISOString() };
  }

  /**
   * Clear the running flag and, if the provided AbortController reference
   * matches the stored one, drop it too. Always call this in a finally block.
   */
  cleanup(abortRef?: AbortController): void {
    if (!abortRef || this._abortController === abortRef) {
      this._abortController = null;
    }
    this._running = false;
  }
}

export { SyncState };
export type { SyncPhase, SyncStatusFields };
