/**
 * Chunk file encoding.
 *
 * A chunk file is a CSV table with one row per timestamp: first column
 * `Date` (ISO-8601, UTC), then every value column in alphabetical order.
 * Numbers are written with fixed precision and missing values as empty
 * cells. A zero-byte file is a separate state and never produced here.
 */

import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';

import type { ProviderRow, ProviderValue } from '../services/dataProvider.js';

const DATE_COLUMN = 'Date';
const VALUE_PRECISION = 6;

interface ChunkRow {
  timestamp: Date;
  values: Record<string, number | null>;
}

interface ChunkTable {
  columns: string[];
  rows: ChunkRow[];
}

class ChunkParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ChunkParseError';
  }
}

function toTimestamp(value: Date | number | string): Date | null {
  const date = value instanceof Date ? new Date(value.getTime()) : new Date(value);
  return Number.isFinite(date.getTime()) ? date : null;
}

function toNullableNumber(value: ProviderValue): number | null {
  if (value === null || value === undefined || typeof value === 'object') return null;
  if (typeof value === 'string' && !value.trim()) return null;
  const num = Number(value);
  return Number.isFinite(num) ? num : null;
}

function flattenValues(values: Record<string, ProviderValue>, prefix: string, into: Map<string, number | null>): void {
  for (const [field, value] of Object.entries(values)) {
    const column = prefix ? `${prefix}.${field}` : field;
    if (value !== null && typeof value === 'object') {
      flattenValues(value, column, into);
    } else {
      into.set(column, toNullableNumber(value));
    }
  }
}

/** Own-property lookup, so field names such as `constructor` never resolve to Object.prototype. */
function cellValue(values: Record<string, number | null>, column: string): number | null {
  if (!Object.hasOwn(values, column)) return null;
  const value = values[column];
  return typeof value === 'number' ? value : null;
}

/**
 * Flatten provider rows into one table keyed by timestamp: nested field
 * groups become dotted columns, rows sharing a timestamp are merged,
 * columns are sorted and every value is a number or null. Rows whose
 * timestamp cannot be parsed are dropped.
 */
function normalizeRows(rows: readonly ProviderRow[]): ChunkTable {
  const byTimestamp = new Map<number, Map<string, number | null>>();
  const columnSet = new Set<string>();

  for (const row of rows) {
    const timestamp = toTimestamp(row.timestamp);
    if (!timestamp) continue;
    const flat = new Map<string, number | null>();
    flattenValues(row.values || {}, '', flat);
    flat.delete(DATE_COLUMN);
    const key = timestamp.getTime();
    const merged = byTimestamp.get(key) ?? new Map<string, number | null>();
    for (const [column, value] of flat) {
      columnSet.add(column);
      // A later null never erases an earlier value for the same cell.
      if (value !== null || !merged.has(column)) {
        merged.set(column, value);
      }
    }
    byTimestamp.set(key, merged);
  }

  const columns = Array.from(columnSet).sort();
  const normalized = Array.from(byTimestamp.entries())
    .sort(([a], [b]) => a - b)
    .map(([ms, values]) => ({
      timestamp: new Date(ms),
      values: Object.fromEntries(columns.map((column): [string, number | null] => [column, values.get(column) ?? null])),
    }));

  return { columns, rows: normalized };
}

function formatValue(value: number | null): string {
  return value === null ? '' : value.toFixed(VALUE_PRECISION);
}

function encodeChunk(table: ChunkTable): string {
  const records = [
    [DATE_COLUMN, ...table.columns],
    ...table.rows.map((row) => [row.timestamp.toISOString(), ...table.columns.map((column) => formatValue(cellValue(row.values, column)))]),
  ];
  return stringify(records);
}

const CsvRecordsSchema = z.array(z.array(z.string()));

/** Decode a non-empty chunk file. Throws ChunkParseError on anything malformed. */
function decodeChunk(content: string): ChunkTable {
  let records: string[][];
  try {
    records = CsvRecordsSchema.parse(parse(content, { skip_empty_lines: true }));
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ChunkParseError(`Unreadable chunk table: ${message}`);
  }
  const [header, ...body] = records;
  if (!header || header[0] !== DATE_COLUMN) {
    throw new ChunkParseError(`Chunk table must start with a ${DATE_COLUMN} column`);
  }
  const columns = header.slice(1);
  const rows = body.map((record, index) => {
    if (record.length !== header.length) {
      throw new ChunkParseError(`Row ${index + 1} has ${record.length} cells, expected ${header.length}`);
    }
    const timestamp = toTimestamp(record[0]);
    if (!timestamp) {
      throw new ChunkParseError(`Row ${index + 1} has an invalid timestamp: ${record[0]}`);
    }
    const values = Object.fromEntries(
      columns.map((column, columnIndex): [string, number | null] => [column, toNullableNumber(record[columnIndex + 1])]),
    );
    return { timestamp, values };
  });
  return { columns, rows };
}

/**
 * Cheap integrity check for a non-empty chunk: the file must end with a
 * newline and its header and last row must decode. Catches the truncated
 * tail an interrupted write leaves behind without parsing every row.
 */
function checkChunkEnds(content: string): void {
  if (!content.endsWith('\n')) {
    throw new ChunkParseError('Chunk table is truncated: missing final newline');
  }
  const body = content.slice(0, -1);
  const headerEnd = body.indexOf('\n');
  if (headerEnd === -1) {
    decodeChunk(content);
    return;
  }
  const header = body.slice(0, headerEnd);
  const lastRow = body.slice(body.lastIndexOf('\n') + 1);
  decodeChunk(`${header}\n${lastRow}\n`);
}

export { ChunkParseError, normalizeRows, encodeChunk, decodeChunk, checkChunkEnds };
export type { ChunkRow, ChunkTable };
