export function findStringInUint8Array(haystack: Uint8Array, needle: string): number {
  const needleBytes = new TextEncoder().encode(needle);
  for (let i = 0; i <= haystack.length - needleBytes.length; i++) {
    let found = true;
    for (let j = 0; j < needleBytes.length; j++) {
      if (haystack[i + j] !== needleBytes[j]) {
        found = false;
        break;
      }
    }
    if (found) return i;
  }
  return -1;
}

export async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const item of source) out.push(item);
  return out;
}

/** Yields `items` one at a time, awaiting a microtask before each. */
export async function* asyncOf<T>(items: Iterable<T>): AsyncGenerator<T, void, undefined> {
  for (const item of items) {
    await Promise.resolve();
    yield item;
  }
}

/** Splits `bytes` into consecutive chunks of `size` bytes (the last may be shorter). */
export function splitBytes(bytes: Uint8Array, size: number): Uint8Array[] {
  const chunks: Uint8Array[] = [];
  for (let offset = 0; offset < bytes.length; offset += size) {
    chunks.push(bytes.subarray(offset, offset + size));
  }
  return chunks;
}

/** Deterministic pseudo-random signal in [-1, 1). */
export function noise(length: number, seed = 1): number[] {
  let state = seed;
  return Array.from({ length }, () => {
    state = (Math.imul(state, 1103515245) + 12345) >>> 0;
    return state / 2147483648 - 1;
  });
}
