import test, { after } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, readFile, readdir, rm, stat, unlink, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { ChunkStore } from '../server/store/chunkStore.js';
import type { Granularity } from '../server/lib/chunkCalendar.js';

const tempRoots: string[] = [];

after(async () => {
  await Promise.all(tempRoots.map((dir) => rm(dir, { recursive: true, force: true })));
});

async function makeStore(granularity: Granularity = 'hourly'): Promise<ChunkStore> {
  const root = await mkdtemp(path.join(os.tmpdir(), 'chunk-store-'));
  tempRoots.push(root);
  return new ChunkStore({ root, granularity });
}

const utc = (iso: string) => new Date(iso);
const row = (iso: string, close: number) => ({ timestamp: iso, values: { close } });

// ---------------------------------------------------------------------------
// load
// ---------------------------------------------------------------------------

test('load on a store that does not exist yet yields an empty index', async () => {
  const store = await makeStore();
  const index = await store.load();
  assert.equal(index.size, 0);
  assert.deepEqual(store.listInstruments(), []);
});

test('load derives observed bounds and counts from chunk files', async () => {
  const store = await makeStore();
  await store.writeChunk('AAA.N', utc('2024-01-01T00:00:00Z'), false, [
    row('2024-01-05T10:00:00Z', 1),
    row('2024-01-31T23:00:00Z', 2),
  ]);
  await store.writeChunk('AAA.N', utc('2024-02-01T00:00:00Z'), false, [row('2024-02-01T00:00:00Z', 3)]);
  await store.writeChunk('AAA.N', utc('2024-03-01T00:00:00Z'), true, [row('2024-03-02T09:00:00Z', 4)]);

  const index = await store.load();
  const entry = index.get('AAA.N');
  assert.ok(entry);
  assert.equal(entry.firstObserved?.toISOString(), '2024-01-05T10:00:00.000Z');
  assert.equal(entry.lastObserved?.toISOString(), '2024-03-02T09:00:00.000Z');
  assert.equal(entry.missingChunks, 0);
  assert.equal(entry.chunkFiles, 3);
  assert.equal(entry.incompleteChunks, 1);
});

test('load twice without changes yields identical indexes', async () => {
  const store = await makeStore();
  await store.writeChunk('AAA.N', utc('2024-01-01T00:00:00Z'), false, [row('2024-01-05T10:00:00Z', 1)]);
  await store.writeChunk('BBB.O', utc('2024-02-01T00:00:00Z'), false, [row('2024-02-03T00:00:00Z', 2)]);
  const first = await store.load();
  const second = await store.load();
  assert.deepEqual(Array.from(second.entries()), Array.from(first.entries()));
  assert.deepEqual(store.listInstruments(), ['AAA.N', 'BBB.O']);
});

test('a deleted chunk between first and last observation counts as missing', async () => {
  const store = await makeStore();
  for (const month of ['01', '02', '03', '04', '05']) {
    await store.writeChunk('AAA.N', utc(`2023-${month}-01T00:00:00Z`), false, [row(`2023-${month}-10T00:00:00Z`, 1)]);
  }
  assert.equal((await store.load()).get('AAA.N')?.missingChunks, 0);

  await unlink(store.chunkPath('AAA.N', utc('2023-03-01T00:00:00Z'), false));
  const entry = (await store.load()).get('AAA.N');
  assert.equal(entry?.missingChunks, 1);
  assert.equal(entry?.chunkFiles, 4);
});

test('load scans a chunk with hundreds of thousands of rows', async () => {
  const store = await makeStore('tick');
  const start = utc('2024-03-02T10:00:00Z').getTime();
  const rows = Array.from({ length: 200_000 }, (_, i) => ({ timestamp: start + i * 5, values: { price: 1 } }));
  await store.writeChunk('AAA.N', new Date(start), false, rows);

  const entry = (await store.load()).get('AAA.N');
  assert.equal(entry?.firstObserved?.toISOString(), '2024-03-02T10:00:00.000Z');
  assert.equal(entry?.lastObserved?.toISOString(), '2024-03-02T10:16:39.995Z');
  assert.equal(entry?.missingChunks, 0);
  assert.equal(entry?.chunkFiles, 1);
});

test('load ignores stray files, backups and identifiers of another precision', async () => {
  const store = await makeStore();
  await store.writeChunk('AAA.N', utc('2024-01-01T00:00:00Z'), false, [row('2024-01-05T10:00:00Z', 1)]);
  const dir = store.instrumentDir('AAA.N');
  await writeFile(path.join(dir, 'notes.txt'), 'hello', 'utf8');
  await writeFile(path.join(dir, '2024-02-01.csv'), 'Date,close\n2024-02-01T00:00:00.000Z,1.000000\n', 'utf8');
  await writeFile(path.join(dir, '.2024-06.csv'), 'Date,close\n2024-06-01T00:00:00.000Z,1.000000\n', 'utf8');

  const entry = (await store.load()).get('AAA.N');
  assert.equal(entry?.chunkFiles, 1);
  assert.equal(entry?.lastObserved?.toISOString(), '2024-01-05T10:00:00.000Z');
});

// ---------------------------------------------------------------------------
// writeChunk / hasChunk / readChunk
// ---------------------------------------------------------------------------

test('writing a chunk twice keeps one live file and one backup of the previous content', async () => {
  const store = await makeStore();
  const start = utc('2024-01-01T00:00:00Z');
  const first = await store.writeChunk('AAA.N', start, false, [row('2024-01-05T00:00:00Z', 1)]);
  assert.equal(first.backedUp, false);
  const second = await store.writeChunk('AAA.N', start, false, [row('2024-01-06T00:00:00Z', 2)]);
  assert.equal(second.backedUp, true);

  const dir = store.instrumentDir('AAA.N');
  assert.deepEqual((await readdir(dir)).sort(), ['.2024-01.csv', '2024-01.csv']);
  assert.equal(await readFile(path.join(dir, '2024-01.csv'), 'utf8'), 'Date,close\n2024-01-06T00:00:00.000Z,2.000000\n');
  assert.equal(await readFile(path.join(dir, '.2024-01.csv'), 'utf8'), 'Date,close\n2024-01-05T00:00:00.000Z,1.000000\n');
});

test('writeChunk stores fields named like Object.prototype members', async () => {
  const store = await makeStore();
  const start = utc('2024-01-01T00:00:00Z');
  const result = await store.writeChunk('AAA.N', start, false, [
    { timestamp: '2024-01-05T00:00:00Z', values: { close: 1, constructor: null } },
    { timestamp: '2024-01-06T00:00:00Z', values: { close: 2 } },
  ]);
  assert.equal(
    await readFile(result.filePath, 'utf8'),
    'Date,close,constructor\n2024-01-05T00:00:00.000Z,1.000000,\n2024-01-06T00:00:00.000Z,2.000000,\n',
  );
  assert.equal(await store.hasChunk('AAA.N', start), true);
});

test('rows that cannot be serialised leave the live chunk in place', async () => {
  const store = await makeStore();
  const start = utc('2024-01-01T00:00:00Z');
  await store.writeChunk('AAA.N', start, false, [row('2024-01-05T00:00:00Z', 1)]);
  const broken = {
    timestamp: '2024-01-06T00:00:00Z',
    values: {
      get close(): number {
        throw new Error('bad value');
      },
    },
  };

  await assert.rejects(() => store.writeChunk('AAA.N', start, false, [broken]), /bad value/);
  const dir = store.instrumentDir('AAA.N');
  assert.deepEqual(await readdir(dir), ['2024-01.csv']);
  assert.equal(await readFile(path.join(dir, '2024-01.csv'), 'utf8'), 'Date,close\n2024-01-05T00:00:00.000Z,1.000000\n');
});

test('writeChunk floors the period start before naming the file', async () => {
  const store = await makeStore();
  const result = await store.writeChunk('AAA.N', utc('2024-01-15T12:00:00Z'), false, [row('2024-01-15T12:00:00Z', 1)]);
  assert.equal(path.basename(result.filePath), '2024-01.csv');
  assert.equal(result.rowCount, 1);
});

test('zero rows produce a zero-byte chunk that satisfies the period', async () => {
  const store = await makeStore();
  const start = utc('2024-01-01T00:00:00Z');
  const result = await store.writeChunk('AAA.N', start, false, []);
  assert.equal(result.rowCount, 0);
  assert.equal((await stat(result.filePath)).size, 0);
  assert.equal(await store.hasChunk('AAA.N', start), true);
  assert.deepEqual(await store.readChunk('AAA.N', start, false), { columns: [], rows: [] });

  const entry = (await store.load()).get('AAA.N');
  assert.equal(entry?.firstObserved, null);
  assert.equal(entry?.lastObserved, null);
  assert.equal(entry?.chunkFiles, 1);
});

test('hasChunk is false for absent, incomplete-only and corrupt chunks', async () => {
  const store = await makeStore();
  const jan = utc('2024-01-01T00:00:00Z');
  const feb = utc('2024-02-01T00:00:00Z');
  assert.equal(await store.hasChunk('AAA.N', jan), false);

  await store.writeChunk('AAA.N', feb, true, [row('2024-02-02T00:00:00Z', 1)]);
  assert.equal(await store.hasChunk('AAA.N', feb), false);

  await writeFile(store.chunkPath('AAA.N', jan, false), 'garbage', 'utf8');
  assert.equal(await store.hasChunk('AAA.N', jan), false);
});

test('hasChunk is false for a chunk cut off mid-row', async () => {
  const store = await makeStore();
  const jan = utc('2024-01-01T00:00:00Z');
  const result = await store.writeChunk('AAA.N', jan, false, [row('2024-01-05T00:00:00Z', 1), row('2024-01-06T00:00:00Z', 2)]);
  const content = await readFile(result.filePath, 'utf8');
  await writeFile(result.filePath, content.slice(0, -6), 'utf8');
  assert.equal(await store.hasChunk('AAA.N', jan), false);
});

test('a corrupt chunk does not contribute observed bounds', async () => {
  const store = await makeStore();
  await store.writeChunk('AAA.N', utc('2024-02-01T00:00:00Z'), false, [row('2024-02-02T00:00:00Z', 1)]);
  await store.addInstrument('AAA.N');
  await writeFile(store.chunkPath('AAA.N', utc('2024-01-01T00:00:00Z'), false), 'garbage', 'utf8');

  const entry = (await store.load()).get('AAA.N');
  assert.equal(entry?.firstObserved?.toISOString(), '2024-02-02T00:00:00.000Z');
  assert.equal(entry?.chunkFiles, 2);
});

test('completing a period moves the incomplete marker to its backup name', async () => {
  const store = await makeStore();
  const march = utc('2024-03-01T00:00:00Z');
  await store.writeChunk('AAA.N', march, true, [row('2024-03-02T00:00:00Z', 1)]);
  await store.writeChunk('AAA.N', march, false, [row('2024-03-02T00:00:00Z', 1), row('2024-03-30T00:00:00Z', 2)]);

  assert.deepEqual((await readdir(store.instrumentDir('AAA.N'))).sort(), ['.2024-03 (incomplete).csv', '2024-03.csv']);
  assert.equal(await store.hasChunk('AAA.N', march), true);
  assert.equal(await store.readChunk('AAA.N', march, true), null);
  const table = await store.readChunk('AAA.N', march, false);
  assert.equal(table?.rows.length, 2);
});

// ---------------------------------------------------------------------------
// addInstrument
// ---------------------------------------------------------------------------

test('addInstrument creates the folder once and registers an empty entry', async () => {
  const store = await makeStore('daily');
  await store.addInstrument('ZZZ.L');
  await store.addInstrument('ZZZ.L');
  await store.addInstrument('AAA.N');

  assert.deepEqual(store.listInstruments(), ['AAA.N', 'ZZZ.L']);
  assert.deepEqual(await readdir(store.directory).then((names) => names.sort()), ['RIC AAA.N', 'RIC ZZZ.L']);

  const entry = (await store.load()).get('ZZZ.L');
  assert.deepEqual(entry, {
    instrument: 'ZZZ.L',
    firstObserved: null,
    lastObserved: null,
    missingChunks: 0,
    chunkFiles: 0,
    incompleteChunks: 0,
  });
});

test('addInstrument rejects ids that cannot be folder names', async () => {
  const store = await makeStore();
  await assert.rejects(() => store.addInstrument(''), /Invalid instrument id/);
  await assert.rejects(() => store.addInstrument(' AAA.N'), /Invalid instrument id/);
  await assert.rejects(() => store.addInstrument('../escape'), /cannot be used as a folder name/);
});
