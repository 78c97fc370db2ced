import test from 'node:test';
import assert from 'node:assert/strict';

import { BufferedStatusSink } from '../server/services/statusSink.js';

test('BufferedStatusSink keeps the most recent messages up to capacity', () => {
  const sink = new BufferedStatusSink({ capacity: 3 });
  assert.equal(sink.last, null);
  for (const message of ['a', 'b', 'c', 'd']) sink.notify(message);
  assert.deepEqual(sink.recent(), ['b', 'c', 'd']);
  assert.deepEqual(sink.recent(2), ['c', 'd']);
  assert.deepEqual(sink.recent(0), []);
  assert.equal(sink.last, 'd');
});

test('BufferedStatusSink forwards every message', () => {
  const forwarded: string[] = [];
  const sink = new BufferedStatusSink({ forward: { notify: (message) => forwarded.push(message) } });
  sink.notify('one');
  sink.notify('two');
  assert.deepEqual(forwarded, ['one', 'two']);
});
