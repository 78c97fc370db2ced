/**
 * Period arithmetic for chunked storage.
 *
 * Every granularity stores its rows in files covering one fixed calendar
 * period. All functions here are pure and operate in UTC.
 */

const GRANULARITIES = ['daily', 'hourly', 'minute', 'tick'] as const;

type Granularity = (typeof GRANULARITIES)[number];

type ChunkPeriod = 'year' | 'month' | 'day' | 'half-hour';

interface PlannedPeriod {
  periodStart: Date;
  periodEnd: Date;
  incomplete: boolean;
}

const GRANULARITY_PERIODS: Record<Granularity, ChunkPeriod> = {
  daily: 'year',
  hourly: 'month',
  minute: 'day',
  tick: 'half-hour',
};

const HALF_HOUR_MS = 30 * 60 * 1000;
const DAY_MS = 24 * 60 * 60 * 1000;

/** Earliest date ever requested for daily data. */
const DAILY_LOOKBACK_START = new Date(Date.UTC(1980, 0, 1));

/**
 * Bounded lookback windows (days) for the finer granularities. Daily data is
 * year-chunked; a day-chunked history since 1980 is the `minute` store run
 * with a `lookbackStart` override.
 */
const LOOKBACK_DAYS: Record<Exclude<Granularity, 'daily'>, number> = {
  hourly: 730,
  minute: 365,
  tick: 90,
};

const INCOMPLETE_SUFFIX = ' (incomplete)';
const CHUNK_EXTENSION = '.csv';

function isGranularity(value: unknown): value is Granularity {
  return GRANULARITIES.some((granularity) => granularity === value);
}

function periodFor(granularity: Granularity): ChunkPeriod {
  return GRANULARITY_PERIODS[granularity];
}

function floorToPeriodStart(timestamp: Date, period: ChunkPeriod): Date {
  const ms = timestamp.getTime();
  switch (period) {
    case 'year':
      return new Date(Date.UTC(timestamp.getUTCFullYear(), 0, 1));
    case 'month':
      return new Date(Date.UTC(timestamp.getUTCFullYear(), timestamp.getUTCMonth(), 1));
    case 'day':
      return new Date(Math.floor(ms / DAY_MS) * DAY_MS);
    case 'half-hour':
      return new Date(Math.floor(ms / HALF_HOUR_MS) * HALF_HOUR_MS);
  }
}

function nextPeriodStart(timestamp: Date, period: ChunkPeriod): Date {
  const start = floorToPeriodStart(timestamp, period);
  switch (period) {
    case 'year':
      return new Date(Date.UTC(start.getUTCFullYear() + 1, 0, 1));
    case 'month':
      // Date.UTC rolls month 12 over into January of the following year.
      return new Date(Date.UTC(start.getUTCFullYear(), start.getUTCMonth() + 1, 1));
    case 'day':
      return new Date(start.getTime() + DAY_MS);
    case 'half-hour':
      return new Date(start.getTime() + HALF_HOUR_MS);
  }
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

function periodStartLabel(periodStart: Date, period: ChunkPeriod): string {
  const year = pad(periodStart.getUTCFullYear(), 4);
  const month = pad(periodStart.getUTCMonth() + 1);
  const day = pad(periodStart.getUTCDate());
  switch (period) {
    case 'year':
      return year;
    case 'month':
      return `${year}-${month}`;
    case 'day':
      return `${year}-${month}-${day}`;
    case 'half-hour': {
      // Colons are not portable in file names.
      const time = [periodStart.getUTCHours(), periodStart.getUTCMinutes(), periodStart.getUTCSeconds()]
        .map((part) => pad(part))
        .join('-');
      return `${year}-${month}-${day} ${time}`;
    }
  }
}

function chunkIdentifier(periodStart: Date, period: ChunkPeriod, incomplete: boolean): string {
  const id = periodStartLabel(periodStart, period);
  return incomplete ? `${id}${INCOMPLETE_SUFFIX}` : id;
}

const IDENTIFIER_PATTERNS: Record<ChunkPeriod, RegExp> = {
  year: /^(\d{4})$/,
  month: /^(\d{4})-(\d{2})$/,
  day: /^(\d{4})-(\d{2})-(\d{2})$/,
  'half-hour': /^(\d{4})-(\d{2})-(\d{2}) (\d{2})-(\d{2})-(\d{2})$/,
};

/**
 * Inverse of chunkIdentifier. Returns null for names that do not encode a
 * period start at the precision of `period`.
 */
function parseChunkIdentifier(id: string, period: ChunkPeriod): { periodStart: Date; incomplete: boolean } | null {
  const incomplete = id.endsWith(INCOMPLETE_SUFFIX);
  const core = incomplete ? id.slice(0, -INCOMPLETE_SUFFIX.length) : id;
  const match = core.match(IDENTIFIER_PATTERNS[period]);
  if (!match) return null;
  const [year, month = 1, day = 1, hour = 0, minute = 0, second = 0] = match.slice(1).map(Number);
  const periodStart = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
  if (!Number.isFinite(periodStart.getTime())) return null;
  // Reject rolled-over values such as 2023-02-30 and off-boundary starts.
  if (chunkIdentifier(periodStart, period, false) !== core) return null;
  if (floorToPeriodStart(periodStart, period).getTime() !== periodStart.getTime()) return null;
  return { periodStart, incomplete };
}

function chunkFileName(periodStart: Date, period: ChunkPeriod, incomplete: boolean): string {
  return `${chunkIdentifier(periodStart, period, incomplete)}${CHUNK_EXTENSION}`;
}

function backupFileName(fileName: string): string {
  return `.${fileName}`;
}

function isBackupFileName(fileName: string): boolean {
  return fileName.startsWith('.');
}

function identifierFromFileName(fileName: string): string | null {
  if (isBackupFileName(fileName) || !fileName.endsWith(CHUNK_EXTENSION)) return null;
  return fileName.slice(0, -CHUNK_EXTENSION.length);
}

/** Number of periods from the one containing `first` through the one containing `last`. */
function countPeriods(first: Date, last: Date, period: ChunkPeriod): number {
  const start = floorToPeriodStart(first, period).getTime();
  const end = floorToPeriodStart(last, period).getTime();
  if (start > end) return 0;
  switch (period) {
    case 'year':
      return last.getUTCFullYear() - first.getUTCFullYear() + 1;
    case 'month':
      return (last.getUTCFullYear() - first.getUTCFullYear()) * 12 + (last.getUTCMonth() - first.getUTCMonth()) + 1;
    case 'day':
      return Math.round((end - start) / DAY_MS) + 1;
    case 'half-hour':
      return Math.round((end - start) / HALF_HOUR_MS) + 1;
  }
}

/**
 * Ordered periods from the one containing `from` up to the one containing
 * `now`. A period whose end lies after `now` is incomplete.
 */
function enumeratePeriods(from: Date, now: Date, period: ChunkPeriod): PlannedPeriod[] {
  const periods: PlannedPeriod[] = [];
  let cursor = floorToPeriodStart(from, period);
  const nowMs = now.getTime();
  while (cursor.getTime() <= nowMs) {
    const periodEnd = nextPeriodStart(cursor, period);
    periods.push({ periodStart: cursor, periodEnd, incomplete: periodEnd.getTime() > nowMs });
    cursor = periodEnd;
  }
  return periods;
}

function lookbackStartFor(granularity: Granularity, now: Date): Date {
  if (granularity === 'daily') return new Date(DAILY_LOOKBACK_START);
  return new Date(now.getTime() - LOOKBACK_DAYS[granularity] * DAY_MS);
}

export {
  GRANULARITIES,
  isGranularity,
  periodFor,
  floorToPeriodStart,
  nextPeriodStart,
  chunkIdentifier,
  parseChunkIdentifier,
  chunkFileName,
  backupFileName,
  isBackupFileName,
  identifierFromFileName,
  countPeriods,
  enumeratePeriods,
  lookbackStartFor,
};
export type { Granularity, ChunkPeriod, PlannedPeriod };
