/**
 * Reads four bytes at `offset` as ASCII. Missing bytes are skipped, so a short buffer yields a short string.
 */
export function readFourCC(bytes: Uint8Array, offset: number): string {
  return String.fromCharCode(...bytes.subarray(offset, offset + 4));
}

export function readUint16LE(bytes: Uint8Array, offset: number): number {
  return bytes[offset]! | (bytes[offset + 1]! << 8);
}

export function readUint32LE(bytes: Uint8Array, offset: number): number {
  // >>> 0 keeps sizes above 2^31 positive
  return (bytes[offset]! | (bytes[offset + 1]! << 8) | (bytes[offset + 2]! << 16) | (bytes[offset + 3]! << 24)) >>> 0;
}

/** Signed 24-bit little-endian read, sign-extended from bit 23. */
export function readInt24LE(bytes: Uint8Array, offset: number): number {
  const v = (bytes[offset + 2]! << 16) | (bytes[offset + 1]! << 8) | bytes[offset]!;
  return (v << 8) >> 8;
}

/** Signed 32-bit little-endian read, sign-extended from bit 31. */
export function readInt32LE(bytes: Uint8Array, offset: number): number {
  return bytes[offset]! | (bytes[offset + 1]! << 8) | (bytes[offset + 2]! << 16) | (bytes[offset + 3]! << 24);
}

/** Signed 16-bit little-endian read. */
export function readInt16LE(bytes: Uint8Array, offset: number): number {
  return (readUint16LE(bytes, offset) << 16) >> 16;
}
