import test from 'node:test';
import assert from 'node:assert/strict';
import { Readable } from 'node:stream';
import { ReadableStream } from 'node:stream/web';
import { ZipStreamReader } from '../src/reader/ZipStreamReader.js';
import { collect, rejectsWithCode, utf8, writeArchive } from './helpers.js';

/** Deliver `bytes` in slices of `size` to exercise header reads across chunk borders. */
function chunked(bytes: Uint8Array, size: number): ReadableStream<Uint8Array> {
  let offset = 0;
  return new ReadableStream<Uint8Array>({
    pull(controller) {
      if (offset >= bytes.length) {
        controller.close();
        return;
      }
      controller.enqueue(bytes.slice(offset, offset + size));
      offset += size;
    }
  });
}

const pattern = Uint8Array.from({ length: 10_000 }, (_, i) => i % 251);

async function sampleArchive(): Promise<Uint8Array> {
  return writeArchive([
    { name: 'a.txt', data: utf8('hello'), options: { method: 0 } },
    { name: 'b.bin', data: pattern, options: { method: 8 } },
    { name: 'c.txt', data: utf8('last one'), options: { method: 8 } }
  ]);
}

test('entries stream in storage order', async () => {
  const reader = ZipStreamReader.fromStream(chunked(await sampleArchive(), 7));
  const seen: string[] = [];
  for await (const entry of reader.entries()) {
    seen.push(entry.name);
    const data = await collect(await entry.open());
    assert.equal(data.length, entry.uncompressedSize);
    if (entry.name === 'a.txt') {
      assert.deepEqual(entry.method, { kind: 'stored' });
      assert.equal(entry.offset, 0);
      assert.deepEqual(data, utf8('hello'));
    }
    if (entry.name === 'b.bin') assert.deepEqual(data, pattern);
    if (entry.name === 'c.txt') assert.deepEqual(data, utf8('last one'));
  }
  assert.deepEqual(seen, ['a.txt', 'b.bin', 'c.txt']);
});

test('unopened entries are skipped', async () => {
  const reader = ZipStreamReader.fromStream(chunked(await sampleArchive(), 64));
  let last: Uint8Array | undefined;
  for await (const entry of reader.entries()) {
    if (entry.name === 'b.bin') await entry.skip();
    if (entry.name === 'c.txt') last = await collect(await entry.open());
  }
  assert.deepEqual(last, utf8('last one'));
});

test('node readables are accepted', async () => {
  const reader = ZipStreamReader.fromStream(Readable.from([await sampleArchive()]));
  const names: string[] = [];
  for await (const entry of reader.entries()) names.push(entry.name);
  assert.deepEqual(names, ['a.txt', 'b.bin', 'c.txt']);
});

test('an empty archive has no entries', async () => {
  const reader = ZipStreamReader.fromStream(chunked(await writeArchive([]), 5));
  const names: string[] = [];
  for await (const entry of reader.entries()) names.push(entry.name);
  assert.deepEqual(names, []);
});

test('descriptor entries need a seekable source', async () => {
  const archive = await writeArchive([{ name: 'a.txt', data: utf8('hello'), options: { method: 0 } }], {
    seekable: false
  });
  const entries = ZipStreamReader.fromStream(chunked(archive, 16)).entries();
  const first = await entries.next();
  assert.equal(first.done, false);
  if (first.done) return;
  assert.equal(first.value.hasDataDescriptor, true);
  await rejectsWithCode(first.value.open(), 'ZIP_DESCRIPTOR_REQUIRES_SEEK');
  await rejectsWithCode(entries.next(), 'ZIP_DESCRIPTOR_REQUIRES_SEEK');
});

test('entries can be iterated and opened once', async () => {
  const reader = ZipStreamReader.fromStream(chunked(await sampleArchive(), 100));
  for await (const entry of reader.entries()) {
    if (entry.name !== 'a.txt') continue;
    await collect(await entry.open());
    await rejectsWithCode(entry.open(), 'ZIP_INVALID_ARGUMENT');
    await rejectsWithCode(entry.skip(), 'ZIP_INVALID_ARGUMENT');
  }
  await rejectsWithCode(reader.entries().next(), 'ZIP_INVALID_ARGUMENT');
});

test('a bad first signature is rejected', async () => {
  const reader = ZipStreamReader.fromStream(chunked(new Uint8Array(40), 40));
  await rejectsWithCode(reader.entries().next(), 'ZIP_INVALID_SIGNATURE');
});

test('a stream cut inside entry data is truncated', async () => {
  const archive = await sampleArchive();
  const reader = ZipStreamReader.fromStream(chunked(archive.subarray(0, 37), 10));
  const entries = reader.entries();
  const first = await entries.next();
  assert.equal(first.done, false);
  if (first.done) return;
  await rejectsWithCode(collect(await first.value.open()), 'ZIP_TRUNCATED');
});

test('a stream without a central directory is truncated', async () => {
  const archive = await sampleArchive();
  const reader = ZipStreamReader.fromStream(chunked(archive.subarray(0, 40), 10));
  const names: string[] = [];
  await rejectsWithCode(
    (async () => {
      for await (const entry of reader.entries()) names.push(entry.name);
    })(),
    'ZIP_TRUNCATED'
  );
  assert.deepEqual(names, ['a.txt']);
});

test('entry limits apply while streaming', async () => {
  const reader = ZipStreamReader.fromStream(chunked(await sampleArchive(), 50), { limits: { maxEntries: 1 } });
  const names: string[] = [];
  await rejectsWithCode(
    (async () => {
      for await (const entry of reader.entries()) names.push(entry.name);
    })(),
    'ZIP_LIMIT_EXCEEDED'
  );
  assert.deepEqual(names, ['a.txt']);
});
