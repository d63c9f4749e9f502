/** Splits `list` into consecutive slices of at most `size` elements. */
export function chunked<T>(list: readonly T[], size: number): T[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`Chunk size must be a positive integer, got ${size}`);
  }

  const chunks: T[][] = [];
  for (let start = 0; start < list.length; start += size) {
    chunks.push(list.slice(start, start + size));
  }
  return chunks;
}

// half-up, like Math.round
export const round = (value: number): number => Math.round(value);

export const sleep = async (waitTimeInMs: number): Promise<void> =>
  await new Promise((resolve) => setTimeout(resolve, waitTimeInMs));
