import table from './cp437.json' with { type: 'json' };

let highHalf: readonly string[] | null = null;

function loadHighHalf(): readonly string[] {
  highHalf ??= Array.from(table.high);
  return highHalf;
}

/** Decode legacy (IBM PC) entry names for display. The raw bytes stay on the entry. */
export function decodeCp437(bytes: Uint8Array): string {
  let ascii = true;
  for (let i = 0; i < bytes.length; i += 1) {
    if (bytes[i]! >= 0x80) {
      ascii = false;
      break;
    }
  }
  if (ascii) return String.fromCharCode(...bytes);
  const high = loadHighHalf();
  let out = '';
  for (let i = 0; i < bytes.length; i += 1) {
    const byte = bytes[i]!;
    out += byte < 0x80 ? String.fromCharCode(byte) : high[byte - 0x80]!;
  }
  return out;
}
