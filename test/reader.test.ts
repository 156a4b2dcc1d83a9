import test from 'node:test';
import assert from 'node:assert/strict';
import { inflateRawSync } from 'node:zlib';
import { updateCrc32 } from '../src/crc32.js';
import { isZipError, type ZipWarning } from '../src/errors.js';
import { FLAG_ENCRYPTED, FLAG_UTF8 } from '../src/records.js';
import { ZipReader } from '../src/reader/ZipReader.js';
import type { ZipProgressEvent } from '../src/types.js';
import { FIXED_MTIME, collect, craftArchive, rejectsWithCode, throwsWithCode, utf8, writeArchive } from './helpers.js';

const ZEROS = new Uint8Array(10_000);

async function scenarioArchive(): Promise<Uint8Array> {
  return writeArchive([
    { name: 'a.txt', data: utf8('hello'), options: { method: 0 } },
    { name: 'b.bin', data: ZEROS, options: { method: 8 } }
  ]);
}

test('stored and deflate entries read back', async () => {
  const reader = await ZipReader.fromUint8Array(await scenarioArchive());
  const entries = reader.entries();
  assert.deepEqual(
    entries.map((entry) => [entry.name, entry.uncompressedSize]),
    [
      ['a.txt', 5],
      ['b.bin', 10_000]
    ]
  );
  assert.equal(entries[0]?.crc32, 0x3610a686);
  assert.equal(entries[1]?.crc32, updateCrc32(0, ZEROS));
  assert.deepEqual(await reader.readEntry('a.txt'), utf8('hello'));
  assert.deepEqual(await reader.readEntry('b.bin'), ZEROS);
  await reader.close();
});

test('directory records carry the written metadata', async () => {
  const reader = await ZipReader.fromUint8Array(await scenarioArchive());
  const entry = reader.get('a.txt');
  assert.equal(entry.index, 0);
  assert.equal(entry.offset, 0);
  assert.deepEqual(entry.method, { kind: 'stored' });
  assert.equal(entry.methodCode, 0);
  assert.equal(entry.flags, FLAG_UTF8);
  assert.equal(entry.nameEncoding, 'utf8');
  assert.equal(entry.versionMadeBy, 0x0314);
  assert.equal(entry.versionNeeded, 20);
  assert.equal(entry.compressedSize, 5);
  assert.equal(entry.mtime.getTime(), FIXED_MTIME.getTime());
  assert.equal(entry.isDirectory, false);
  assert.equal(entry.hasDataDescriptor, false);
  assert.equal(entry.encrypted, false);
  assert.deepEqual(reader.get('b.bin').method, { kind: 'deflate' });
});

test('lookup by index, name and raw bytes', async () => {
  const reader = await ZipReader.fromUint8Array(await scenarioArchive());
  assert.equal(reader.entry(1).name, 'b.bin');
  assert.equal(reader.find(utf8('a.txt'))?.index, 0);
  assert.equal(reader.find('missing.txt'), undefined);
  throwsWithCode(() => reader.entry(2), 'ZIP_ENTRY_NOT_FOUND');
  throwsWithCode(() => reader.entry(-1), 'ZIP_ENTRY_NOT_FOUND');
  throwsWithCode(() => reader.get('missing.txt'), 'ZIP_ENTRY_NOT_FOUND');
  assert.deepEqual(await reader.readEntry(0), utf8('hello'));
  assert.deepEqual(await reader.readEntry(utf8('a.txt')), utf8('hello'));
});

test('entries from another archive are rejected', async () => {
  const reader = await ZipReader.fromUint8Array(await scenarioArchive());
  const other = await ZipReader.fromUint8Array(
    await writeArchive([{ name: 'other.txt', data: utf8('hi'), options: { method: 0 } }])
  );
  await rejectsWithCode(reader.openEntry(other.entry(0)), 'ZIP_INVALID_ARGUMENT');
});

test('raw streams return the stored bytes', async () => {
  const reader = await ZipReader.fromUint8Array(await scenarioArchive());
  assert.deepEqual(await collect(await reader.openRaw('a.txt')), utf8('hello'));
  const entry = reader.get('b.bin');
  const raw = await collect(await reader.openRaw(entry));
  assert.equal(raw.length, entry.compressedSize);
  assert.deepEqual(new Uint8Array(inflateRawSync(raw)), ZEROS);
});

test('several entry streams may be open at once', async () => {
  const reader = await ZipReader.fromUint8Array(await scenarioArchive());
  const first = await reader.openEntry('b.bin');
  const second = await reader.openEntry('a.txt');
  const [zeros, hello] = await Promise.all([collect(first), collect(second)]);
  assert.deepEqual(zeros, ZEROS);
  assert.deepEqual(hello, utf8('hello'));
});

test('duplicate names resolve to the first entry and warn', async () => {
  const warnings: ZipWarning[] = [];
  const archive = craftArchive([
    { name: 'dup.txt', payload: utf8('one') },
    { name: 'dup.txt', payload: utf8('two') }
  ]);
  const reader = await ZipReader.fromUint8Array(archive, { onWarning: (warning) => warnings.push(warning) });
  assert.equal(reader.entries().length, 2);
  assert.equal(reader.get('dup.txt').index, 0);
  assert.deepEqual(await reader.readEntry('dup.txt'), utf8('one'));
  assert.deepEqual(await reader.readEntry(1), utf8('two'));
  assert.deepEqual(warnings, [
    {
      code: 'ZIP_DUPLICATE_NAME',
      message: 'Entry 1 repeats the name of entry 0; name lookup resolves to entry 0',
      entryName: 'dup.txt'
    }
  ]);
});

test('a size sentinel marks only that entry as ZIP64', async () => {
  const archive = craftArchive([
    { name: 'big.bin', payload: utf8('pretend'), central: { compressedSize: 0xffffffff } },
    { name: 'small.txt', payload: utf8('small') }
  ]);
  const reader = await ZipReader.fromUint8Array(archive);
  assert.deepEqual(reader.get('big.bin').method, { kind: 'unsupported', code: 0, reason: 'zip64' });
  await rejectsWithCode(reader.openEntry('big.bin'), 'ZIP_UNSUPPORTED_ZIP64');
  assert.deepEqual(await reader.readEntry('small.txt'), utf8('small'));
});

test('encrypted entries are listed but not opened', async () => {
  const flags = FLAG_UTF8 | FLAG_ENCRYPTED;
  const archive = craftArchive([
    { name: 'locked.bin', payload: utf8('ciphertext'), local: { flags }, central: { flags } },
    { name: 'open.txt', payload: utf8('open') }
  ]);
  const reader = await ZipReader.fromUint8Array(archive);
  const locked = reader.get('locked.bin');
  assert.equal(locked.encrypted, true);
  assert.deepEqual(locked.method, { kind: 'unsupported', code: 0, reason: 'encryption' });
  await rejectsWithCode(reader.openEntry(locked), 'ZIP_UNSUPPORTED_ENCRYPTION');
  assert.deepEqual(await reader.readEntry('open.txt'), utf8('open'));
});

test('entries on another disk are unsupported', async () => {
  const archive = craftArchive([{ name: 'far.bin', payload: utf8('far'), central: { diskStart: 1 } }]);
  const reader = await ZipReader.fromUint8Array(archive);
  assert.deepEqual(reader.get('far.bin').method, { kind: 'unsupported', code: 0, reason: 'multi-disk' });
  await rejectsWithCode(reader.openEntry('far.bin'), 'ZIP_UNSUPPORTED_MULTI_DISK');
});

test('a local header offset inside the directory fails the whole parse', async () => {
  const archive = craftArchive([
    { name: 'ok.txt', payload: utf8('ok') },
    { name: 'bad.txt', payload: utf8('bad'), central: { offset: 1000 } }
  ]);
  await rejectsWithCode(ZipReader.fromUint8Array(archive), 'ZIP_OUT_OF_RANGE');
});

test('entry data running into the directory is out of range', async () => {
  const archive = craftArchive([
    { name: 'a.txt', payload: utf8('hello'), local: { compressedSize: 50 }, central: { compressedSize: 50 } }
  ]);
  const reader = await ZipReader.fromUint8Array(archive);
  await rejectsWithCode(reader.openEntry('a.txt'), 'ZIP_OUT_OF_RANGE');
});

test('limits are enforced from the declared sizes', async () => {
  const archive = await scenarioArchive();
  await rejectsWithCode(ZipReader.fromUint8Array(archive, { limits: { maxEntries: 1 } }), 'ZIP_LIMIT_EXCEEDED');

  const small = await ZipReader.fromUint8Array(archive, { limits: { maxUncompressedEntryBytes: 100 } });
  assert.deepEqual(await small.readEntry('a.txt'), utf8('hello'));
  await rejectsWithCode(small.openEntry('b.bin'), 'ZIP_LIMIT_EXCEEDED');

  const strict = await ZipReader.fromUint8Array(archive, { limits: { maxCompressionRatio: 10 } });
  await assert.rejects(strict.openEntry('b.bin'), (err: unknown) => {
    assert.ok(isZipError(err, 'ZIP_LIMIT_EXCEEDED'));
    assert.equal(err.name, 'ZipUsageError');
    assert.equal(err.context?.limitRatio, '10');
    return true;
  });

  const relaxed = await ZipReader.fromUint8Array(archive, { limits: { maxCompressionRatio: Infinity } });
  assert.deepEqual(await relaxed.readEntry('b.bin'), ZEROS);
});

test('progress reports read and extract totals', async () => {
  const reader = await ZipReader.fromUint8Array(await scenarioArchive());
  const events: ZipProgressEvent[] = [];
  await reader.readEntry('a.txt', { onProgress: (event) => events.push(event), progressChunkInterval: 1 });
  const lastRead = events.filter((event) => event.kind === 'read').at(-1);
  const lastExtract = events.filter((event) => event.kind === 'extract').at(-1);
  assert.deepEqual(lastRead, { kind: 'read', entryName: 'a.txt', totalIn: 5, totalOut: 5, bytesIn: 5, bytesOut: 5 });
  assert.deepEqual(lastExtract, {
    kind: 'extract',
    entryName: 'a.txt',
    totalIn: 5,
    totalOut: 5,
    bytesIn: 5,
    bytesOut: 5
  });
});
