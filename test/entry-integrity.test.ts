import test from 'node:test';
import assert from 'node:assert/strict';
import { deflateRawSync } from 'node:zlib';
import { updateCrc32 } from '../src/crc32.js';
import { isZipError } from '../src/errors.js';
import { FLAG_DATA_DESCRIPTOR, FLAG_UTF8, encodeDataDescriptor } from '../src/records.js';
import type { RandomAccess } from '../src/reader/RandomAccess.js';
import { ZipReader } from '../src/reader/ZipReader.js';
import {
  GappedRandomAccess,
  collect,
  craftArchive,
  rejectsWithCode,
  utf8,
  withByte,
  writeArchive,
  type CraftEntry
} from './helpers.js';

const HELLO_CRC = 0x3610a686;

test('a renamed local header is a mismatch while siblings still open', async () => {
  const archive = craftArchive([
    { name: 'a.txt', payload: utf8('hello'), local: { name: utf8('x.txt') } },
    { name: 'b.txt', payload: utf8('world') }
  ]);
  const reader = await ZipReader.fromUint8Array(archive);
  await assert.rejects(reader.openEntry('a.txt'), (err: unknown) => {
    assert.ok(isZipError(err, 'ZIP_HEADER_MISMATCH'));
    assert.equal(err.name, 'ZipFormatError');
    assert.equal(err.context?.field, 'name');
    return true;
  });
  assert.deepEqual(await reader.readEntry('b.txt'), utf8('world'));
});

test('a different local method is a mismatch', async () => {
  const archive = craftArchive([{ name: 'a.txt', payload: utf8('hello'), local: { method: 8 } }]);
  const reader = await ZipReader.fromUint8Array(archive);
  await rejectsWithCode(reader.openEntry('a.txt'), 'ZIP_HEADER_MISMATCH');
});

test('a different local CRC is a mismatch without a descriptor', async () => {
  const archive = craftArchive([{ name: 'a.txt', payload: utf8('hello'), local: { crc32: 0 } }]);
  const reader = await ZipReader.fromUint8Array(archive);
  await rejectsWithCode(reader.openEntry('a.txt'), 'ZIP_HEADER_MISMATCH');
});

test('a local header offset that misses the signature', async () => {
  const archive = craftArchive([{ name: 'a.txt', payload: utf8('hello'), central: { offset: 5 } }]);
  const reader = await ZipReader.fromUint8Array(archive);
  await rejectsWithCode(reader.openEntry('a.txt'), 'ZIP_INVALID_SIGNATURE');
});

test('local extra fields of another length only warn', async () => {
  const archive = craftArchive([
    { name: 'a.txt', payload: utf8('hello'), local: { extra: new Uint8Array([0xfe, 0xca, 0x00, 0x00]) } }
  ]);
  const reader = await ZipReader.fromUint8Array(archive);
  assert.deepEqual(await reader.readEntry('a.txt'), utf8('hello'));
  assert.deepEqual(reader.warnings(), [
    {
      code: 'ZIP_EXTRA_LENGTH_MISMATCH',
      message: 'Local extra field is 4 bytes, central copy is 0',
      entryName: 'a.txt'
    }
  ]);
});

function descriptorEntry(trailer: Uint8Array): CraftEntry {
  const flags = FLAG_UTF8 | FLAG_DATA_DESCRIPTOR;
  return {
    name: 'a.txt',
    payload: utf8('hello'),
    local: { flags, crc32: 0, compressedSize: 0, uncompressedSize: 0 },
    central: { flags },
    trailer
  };
}

test('signed and unsigned data descriptors are both accepted', async () => {
  const signed = encodeDataDescriptor({ crc32: HELLO_CRC, compressedSize: 5, uncompressedSize: 5 });
  for (const trailer of [signed, signed.subarray(4)]) {
    const reader = await ZipReader.fromUint8Array(craftArchive([descriptorEntry(trailer)]));
    assert.equal(reader.get('a.txt').hasDataDescriptor, true);
    assert.deepEqual(await reader.readEntry('a.txt'), utf8('hello'));
  }
});

test('a descriptor disagreeing with the directory is rejected', async () => {
  const trailer = encodeDataDescriptor({ crc32: HELLO_CRC ^ 1, compressedSize: 5, uncompressedSize: 5 });
  const reader = await ZipReader.fromUint8Array(craftArchive([descriptorEntry(trailer)]));
  await rejectsWithCode(reader.openEntry('a.txt'), 'ZIP_BAD_DESCRIPTOR');
});

test('a corrupted stored byte fails the CRC check', async () => {
  const archive = await writeArchive([{ name: 'a.txt', data: utf8('hello'), options: { method: 0 } }]);
  // Data starts after the 30-byte header and the 5-byte name.
  const reader = await ZipReader.fromUint8Array(withByte(archive, 35, 0x48));
  await assert.rejects(reader.readEntry('a.txt'), (err: unknown) => {
    assert.ok(isZipError(err, 'ZIP_BAD_CRC'));
    assert.equal(err.name, 'ZipIntegrityError');
    assert.equal(err.context?.expected, '0x3610a686');
    return true;
  });
});

test('corrupt deflate data is reported as such', async () => {
  const archive = await writeArchive([{ name: 'a.txt', data: utf8('hello hello hello'), options: { method: 8 } }]);
  // 0xff opens a block of the reserved type 3.
  const reader = await ZipReader.fromUint8Array(withByte(archive, 35, 0xff));
  await assert.rejects(reader.readEntry('a.txt'), (err: unknown) => {
    assert.ok(isZipError(err, 'ZIP_BAD_COMPRESSED_DATA'));
    assert.equal(err.method, 8);
    assert.ok(err.cause instanceof Error);
    return true;
  });
});

test('no single-byte change in deflate data goes unnoticed', async () => {
  const text = utf8(
    Array.from({ length: 60 }, (_, i) => `line ${i}: ${'abcdefghij'.slice(i % 10)} ${(i * 7919) % 1000}\n`).join('')
  );
  const archive = await writeArchive([{ name: 'text.txt', data: text, options: { method: 8 } }]);
  const { compressedSize } = (await ZipReader.fromUint8Array(archive)).get('text.txt');
  // 30-byte header plus the 8-byte name.
  const dataStart = 38;
  const allowed = new Set(['ZIP_BAD_CRC', 'ZIP_SIZE_MISMATCH', 'ZIP_BAD_COMPRESSED_DATA']);
  let failures = 0;
  for (let position = dataStart; position < dataStart + compressedSize; position += 1) {
    for (const mask of [0x01, 0x80, 0xff]) {
      const damaged = withByte(archive, position, archive[position] ^ mask);
      const reader = await ZipReader.fromUint8Array(damaged);
      try {
        const decoded = await reader.readEntry('text.txt');
        assert.deepEqual(decoded, text, `byte ${position} ^ 0x${mask.toString(16)} decoded to different content`);
      } catch (err) {
        if (err instanceof assert.AssertionError) throw err;
        assert.ok(isZipError(err) && allowed.has(err.code), `byte ${position} ^ 0x${mask.toString(16)}: ${String(err)}`);
        failures += 1;
      }
    }
  }
  assert.ok(failures > 0);
});

test('decoded output is held to the declared size', async () => {
  const payload = new Uint8Array(deflateRawSync(utf8('hello world')));
  const short = craftArchive([
    { name: 'a.txt', payload, method: 8, crc32: updateCrc32(0, utf8('hello')), uncompressedSize: 5 }
  ]);
  await rejectsWithCode((await ZipReader.fromUint8Array(short)).readEntry('a.txt'), 'ZIP_SIZE_MISMATCH');

  const long = craftArchive([
    { name: 'a.txt', payload, method: 8, crc32: updateCrc32(0, utf8('hello world')), uncompressedSize: 20 }
  ]);
  await rejectsWithCode((await ZipReader.fromUint8Array(long)).readEntry('a.txt'), 'ZIP_SIZE_MISMATCH');
});

test('a source that ends inside stored data is truncation', async () => {
  const archive = await writeArchive([{ name: 'a.txt', data: utf8('hello'), options: { method: 0 } }]);
  const reader = await ZipReader.open(new GappedRandomAccess(archive, 35, 40));
  await rejectsWithCode(reader.readEntry('a.txt'), 'ZIP_TRUNCATED');
});

test('a source that ends inside deflate data is truncation', async () => {
  const data = utf8('some text that deflate will squeeze a little bit, some text');
  const archive = await writeArchive([{ name: 'b.bin', data, options: { method: 8 } }]);
  const probe = await ZipReader.fromUint8Array(archive);
  const entry = probe.get('b.bin');
  const dataOffset = 30 + 5;
  const reader = await ZipReader.open(
    new GappedRandomAccess(archive, dataOffset, dataOffset + entry.compressedSize)
  );
  await rejectsWithCode(reader.readEntry('b.bin'), 'ZIP_TRUNCATED');
});

test('read errors from the source pass through unchanged', async () => {
  const archive = await writeArchive([{ name: 'b.bin', data: utf8('payload payload'), options: { method: 8 } }]);
  const failure = new Error('device went away');
  const source: RandomAccess = {
    size: async () => archive.length,
    read: async (offset, length) => {
      if (offset === 35) throw failure;
      return archive.subarray(offset, offset + length);
    },
    close: async () => undefined
  };
  const reader = await ZipReader.open(source);
  const stream = await reader.openEntry('b.bin');
  await assert.rejects(collect(stream), (err: unknown) => err === failure);
});
