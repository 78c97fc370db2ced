/**
 * ChunkStore is the sole owner and writer of one granularity's directory tree:
 *
 *   <root>/<granularity>/RIC <instrument>/<chunk-identifier>.csv
 *   <root>/<granularity>/RIC <instrument>/.<chunk-identifier>.csv   (backup)
 *
 * The chunk files are the only authoritative state. The in-memory index is
 * rebuilt from them by load() and may be discarded at any time.
 */

import type { Dirent } from 'node:fs';
import { mkdir, readFile, readdir, rename, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type pino from 'pino';

import {
  backupFileName,
  chunkFileName,
  countPeriods,
  floorToPeriodStart,
  identifierFromFileName,
  parseChunkIdentifier,
  periodFor,
} from '../lib/chunkCalendar.js';
import type { ChunkPeriod, Granularity } from '../lib/chunkCalendar.js';
import { errorMessage, isEnoent } from '../lib/errors.js';
import { moduleLogger } from '../logger.js';
import type { ProviderRow } from '../services/dataProvider.js';
import { ChunkParseError, checkChunkEnds, decodeChunk, encodeChunk, normalizeRows } from './chunkCodec.js';
import type { ChunkTable } from './chunkCodec.js';

const INSTRUMENT_FOLDER_PREFIX = 'RIC ';

interface IndexEntry {
  instrument: string;
  /** Exact timestamp of the earliest stored row; null when no non-empty chunk exists. */
  firstObserved: Date | null;
  lastObserved: Date | null;
  /** Periods between first and last observation with no chunk file. */
  missingChunks: number;
  chunkFiles: number;
  incompleteChunks: number;
}

interface ChunkStoreOptions {
  root: string;
  granularity: Granularity;
  log?: pino.Logger;
}

interface ChunkFileInfo {
  fileName: string;
  periodStart: Date;
  incomplete: boolean;
  size: number;
}

interface WriteChunkResult {
  filePath: string;
  rowCount: number;
  backedUp: boolean;
}

function emptyEntry(instrument: string): IndexEntry {
  return { instrument, firstObserved: null, lastObserved: null, missingChunks: 0, chunkFiles: 0, incompleteChunks: 0 };
}

function assertInstrumentId(instrument: string): void {
  const id = String(instrument || '');
  if (!id.trim() || id !== id.trim()) {
    throw new Error(`Invalid instrument id: "${id}"`);
  }
  if (id === '.' || id === '..' || /[\\/\0]/.test(id)) {
    throw new Error(`Instrument id cannot be used as a folder name: "${id}"`);
  }
}

class ChunkStore {
  readonly root: string;
  readonly granularity: Granularity;
  readonly period: ChunkPeriod;
  readonly directory: string;

  private readonly log: pino.Logger;
  private index = new Map<string, IndexEntry>();

  constructor(options: ChunkStoreOptions) {
    this.root = options.root;
    this.granularity = options.granularity;
    this.period = periodFor(options.granularity);
    this.directory = path.join(options.root, options.granularity);
    this.log = options.log ?? moduleLogger('chunk-store');
  }

  /** Create the store directory. The only I/O failure that is fatal to a run. */
  async ensureRoot(): Promise<void> {
    await mkdir(this.directory, { recursive: true });
  }

  instrumentDir(instrument: string): string {
    return path.join(this.directory, `${INSTRUMENT_FOLDER_PREFIX}${instrument}`);
  }

  chunkPath(instrument: string, periodStart: Date, incomplete: boolean): string {
    return path.join(this.instrumentDir(instrument), chunkFileName(periodStart, this.period, incomplete));
  }

  // ---------------------------------------------------------------------------
  // Index
  // ---------------------------------------------------------------------------

  /** Rebuild the index from the directory tree. A missing tree yields an empty index. */
  async load(): Promise<ReadonlyMap<string, IndexEntry>> {
    let folders: string[];
    try {
      const dirents = await readdir(this.directory, { withFileTypes: true });
      folders = dirents
        .filter((d) => d.isDirectory() && d.name.startsWith(INSTRUMENT_FOLDER_PREFIX))
        .map((d) => d.name)
        .sort();
    } catch (err: unknown) {
      if (!isEnoent(err)) throw err;
      folders = [];
    }

    const next = new Map<string, IndexEntry>();
    for (const folder of folders) {
      const instrument = folder.slice(INSTRUMENT_FOLDER_PREFIX.length);
      if (!instrument) continue;
      const entry = await this.scanInstrument(instrument);
      next.set(instrument, entry);
      if (entry.firstObserved && entry.lastObserved) {
        this.log.debug(
          `[chunk-store] ${this.granularity} ${instrument} observations from ${entry.firstObserved.toISOString()} to ${entry.lastObserved.toISOString()}`,
        );
      }
    }
    this.index = next;
    return this.getIndex();
  }

  getIndex(): ReadonlyMap<string, IndexEntry> {
    return new Map(Array.from(this.index.entries(), ([id, entry]) => [id, { ...entry }]));
  }

  listInstruments(): string[] {
    return Array.from(this.index.keys()).sort();
  }

  /** Register an instrument and create its folder. Re-adding is a no-op. */
  async addInstrument(instrument: string): Promise<void> {
    assertInstrumentId(instrument);
    await mkdir(this.instrumentDir(instrument), { recursive: true });
    if (!this.index.has(instrument)) {
      this.index.set(instrument, emptyEntry(instrument));
    }
  }

  private async listChunkFiles(instrument: string): Promise<ChunkFileInfo[]> {
    const dir = this.instrumentDir(instrument);
    let dirents: Dirent[];
    try {
      dirents = await readdir(dir, { withFileTypes: true });
    } catch (err: unknown) {
      if (isEnoent(err)) return [];
      throw err;
    }

    const files: ChunkFileInfo[] = [];
    for (const dirent of dirents) {
      if (!dirent.isFile()) continue;
      const id = identifierFromFileName(dirent.name);
      if (id === null) continue;
      const parsed = parseChunkIdentifier(id, this.period);
      if (!parsed) continue;
      try {
        const info = await stat(path.join(dir, dirent.name));
        files.push({ fileName: dirent.name, periodStart: parsed.periodStart, incomplete: parsed.incomplete, size: info.size });
      } catch (err: unknown) {
        if (!isEnoent(err)) throw err;
      }
    }
    // Identifiers sort lexicographically in chronological order.
    return files.sort((a, b) => (a.fileName < b.fileName ? -1 : a.fileName > b.fileName ? 1 : 0));
  }

  /** Decoded rows of a non-empty chunk, or null when the file is unreadable. One bad file never fails a scan. */
  private async readTable(instrument: string, file: ChunkFileInfo): Promise<ChunkTable | null> {
    const filePath = path.join(this.instrumentDir(instrument), file.fileName);
    try {
      return decodeChunk(await readFile(filePath, 'utf8'));
    } catch (err: unknown) {
      this.log.debug(`[chunk-store] ignoring unreadable chunk ${filePath}: ${errorMessage(err)}`);
      return null;
    }
  }

  private async observedBound(instrument: string, files: ChunkFileInfo[], pick: 'first' | 'last'): Promise<Date | null> {
    for (const file of files) {
      const table = await this.readTable(instrument, file);
      if (!table || table.rows.length === 0) continue;
      let bound = table.rows[0].timestamp.getTime();
      for (const row of table.rows) {
        const ms = row.timestamp.getTime();
        if (pick === 'first' ? ms < bound : ms > bound) bound = ms;
      }
      return new Date(bound);
    }
    return null;
  }

  private async scanInstrument(instrument: string): Promise<IndexEntry> {
    const files = await this.listChunkFiles(instrument);
    const entry = emptyEntry(instrument);
    entry.chunkFiles = files.length;
    entry.incompleteChunks = files.filter((f) => f.incomplete).length;

    const nonEmpty = files.filter((f) => f.size > 0);
    const firstObserved = await this.observedBound(instrument, nonEmpty, 'first');
    const lastObserved = firstObserved ? await this.observedBound(instrument, [...nonEmpty].reverse(), 'last') : null;
    if (!firstObserved || !lastObserved) return entry;

    const firstPeriod = floorToPeriodStart(firstObserved, this.period).getTime();
    const lastPeriod = floorToPeriodStart(lastObserved, this.period).getTime();
    const presentPeriods = new Set(
      files
        .map((f) => f.periodStart.getTime())
        .filter((ms) => ms >= firstPeriod && ms <= lastPeriod),
    );
    entry.firstObserved = firstObserved;
    entry.lastObserved = lastObserved;
    entry.missingChunks = Math.max(0, countPeriods(firstObserved, lastObserved, this.period) - presentPeriods.size);
    return entry;
  }

  // ---------------------------------------------------------------------------
  // Chunks
  // ---------------------------------------------------------------------------

  /**
   * True iff a complete chunk exists for the period: a zero-byte file, or
   * one whose header and last row decode. A file left truncated by an
   * interrupted write counts as absent so the period is fetched again.
   */
  async hasChunk(instrument: string, periodStart: Date): Promise<boolean> {
    const filePath = this.chunkPath(instrument, periodStart, false);
    let content: string;
    try {
      const info = await stat(filePath);
      if (!info.isFile()) return false;
      if (info.size === 0) return true;
      content = await readFile(filePath, 'utf8');
    } catch (err: unknown) {
      if (isEnoent(err)) return false;
      throw err;
    }
    try {
      checkChunkEnds(content);
      return true;
    } catch (err: unknown) {
      if (!(err instanceof ChunkParseError)) throw err;
      this.log.debug(`[chunk-store] treating unreadable chunk as absent ${filePath}: ${err.message}`);
      return false;
    }
  }

  /** Read one chunk back; null when absent, an empty table for a zero-byte file. */
  async readChunk(instrument: string, periodStart: Date, incomplete: boolean): Promise<ChunkTable | null> {
    let content: string;
    try {
      content = await readFile(this.chunkPath(instrument, periodStart, incomplete), 'utf8');
    } catch (err: unknown) {
      if (isEnoent(err)) return null;
      throw err;
    }
    if (content.length === 0) return { columns: [], rows: [] };
    return decodeChunk(content);
  }

  /** Move `fileName` aside to its hidden backup name, replacing any older backup. */
  private async backupIfExists(dir: string, fileName: string): Promise<boolean> {
    try {
      await rename(path.join(dir, fileName), path.join(dir, backupFileName(fileName)));
      return true;
    } catch (err: unknown) {
      if (isEnoent(err)) return false;
      throw err;
    }
  }

  /**
   * Persist rows for one period: normalise and encode, move the previous
   * version (and the opposite complete/incomplete marker) to its backup
   * name, then write. Nothing is moved when the rows cannot be encoded.
   * Zero rows produce a zero-byte file. Not atomic: a crash during the final
   * write leaves a corrupt target, which load() treats as absent.
   */
  async writeChunk(
    instrument: string,
    periodStart: Date,
    incomplete: boolean,
    rows: readonly ProviderRow[],
  ): Promise<WriteChunkResult> {
    assertInstrumentId(instrument);
    const table = normalizeRows(rows);
    const content = table.rows.length === 0 ? '' : encodeChunk(table);
    const dir = this.instrumentDir(instrument);
    await mkdir(dir, { recursive: true });

    const start = floorToPeriodStart(periodStart, this.period);
    const fileName = chunkFileName(start, this.period, incomplete);
    const siblingName = chunkFileName(start, this.period, !incomplete);
    const backedUp = await this.backupIfExists(dir, fileName);
    await this.backupIfExists(dir, siblingName);

    const filePath = path.join(dir, fileName);
    await writeFile(filePath, content, 'utf8');
    if (!this.index.has(instrument)) {
      this.index.set(instrument, emptyEntry(instrument));
    }
    return { filePath, rowCount: table.rows.length, backedUp };
  }
}

export { ChunkStore };
export type { ChunkStoreOptions, IndexEntry, WriteChunkResult };
