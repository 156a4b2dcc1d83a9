import test from 'node:test';
import assert from 'node:assert/strict';
import fc from 'fast-check';
import { Crc32, crc32, updateCrc32 } from '../src/crc32.js';
import { utf8 } from './helpers.js';

test('crc32 of "hello" is 0x3610a686', () => {
  assert.equal(updateCrc32(0, utf8('hello')), 0x3610a686);
});

test('crc32 check value over "123456789"', () => {
  assert.equal(updateCrc32(0, utf8('123456789')), 0xcbf43926);
});

test('empty input leaves the checksum unchanged', () => {
  assert.equal(updateCrc32(0, new Uint8Array(0)), 0);
  assert.equal(updateCrc32(0x3610a686, new Uint8Array(0)), 0x3610a686);
});

test('updateCrc32 continues a finished checksum', () => {
  const running = updateCrc32(0, utf8('hel'));
  assert.equal(updateCrc32(running, utf8('lo')), 0x3610a686);
});

test('Crc32 digests incrementally', () => {
  const crc = new Crc32();
  crc.update(utf8('he'));
  crc.update(utf8('llo'));
  assert.equal(crc.digest(), 0x3610a686);
  assert.equal(new Crc32().digest(), 0);
});

test('raw crc32 works on the pre-conditioned register', () => {
  assert.equal((crc32(utf8('hello')) ^ 0xffffffff) >>> 0, 0x3610a686);
});

test('splitting the input anywhere gives the same checksum', async () => {
  await fc.assert(
    fc.property(fc.uint8Array({ maxLength: 256 }), fc.nat(), (data, cut) => {
      const at = data.length === 0 ? 0 : cut % (data.length + 1);
      const whole = updateCrc32(0, data);
      const chained = updateCrc32(updateCrc32(0, data.subarray(0, at)), data.subarray(at));
      assert.equal(chained, whole);
    }),
    { numRuns: 100, seed: 7 }
  );
});
