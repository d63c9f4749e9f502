import { chunked, round } from './utils';

describe('utils.chunked', () => {
  test('should chunk with remainder', () => {
    const output = chunked([1, 2, 3, 4, 5, 6, 7, 8, 9], 4);
    expect(output).toEqual([[1, 2, 3, 4], [5, 6, 7, 8], [9]]);
  });

  test('should chunk with empty list', () => {
    const input: number[] = [];
    expect(chunked(input, 4)).toEqual([]);
  });

  test('should chunk arrays smaller than the chunk size', () => {
    expect(chunked([1], 10)).toEqual([[1]]);
  });

  test('should reject a chunk size below one', () => {
    expect(() => chunked([1], 0)).toThrow(RangeError);
  });
});

describe('utils.round', () => {
  test('rounds to the nearest whole unit, halves up', () => {
    expect(round(1700000000.4)).toBe(1700000000);
    expect(round(1700000000.5)).toBe(1700000001);
    expect(round(12)).toBe(12);
  });
});
