export function concat(...chunks: Uint8Array[]): Uint8Array {
  const total = chunks.reduce((n, c) => n + c.byteLength, 0);
  const out   = new Uint8Array(total);
  let offset  = 0;
  for (const c of chunks) {
    out.set(c, offset);
    offset += c.byteLength;
  }
  return out;
}

/**
 * XOR two arrays, the shorter one read as if padded with zeros.
 * Result length is the longer input's length.
 */
export function xorPadded(a: Uint8Array, b: Uint8Array): Uint8Array {
  const [long, short] = a.byteLength >= b.byteLength ? [a, b] : [b, a];
  const out = long.slice();
  for (let i = 0; i < short.byteLength; i++) out[i] ^= short[i];
  return out;
}

/** Index one past the last non-zero byte (0 when every byte is zero). */
export function contentEnd(bytes: Uint8Array): number {
  let end = bytes.byteLength;
  while (end > 0 && bytes[end - 1] === 0) end--;
  return end;
}

/** View of `bytes` without its trailing run of 0x00. */
export function trimTrailingZeros(bytes: Uint8Array): Uint8Array {
  return bytes.subarray(0, contentEnd(bytes));
}
