import { decodeCursor, encodeCursor } from './cursor';

describe('change cursor', () => {
  it('encodes ids as zero-padded chg_ cursors', () => {
    expect(encodeCursor(0)).toBe('chg_000000000000');
    expect(encodeCursor(42)).toBe('chg_000000000042');
  });

  it('decodes what it encodes', () => {
    for (const id of [0, 1, 42, 999_999_999_999]) {
      expect(decodeCursor(encodeCursor(id))).toBe(id);
    }
  });

  it('accepts a bare non-negative integer', () => {
    expect(decodeCursor('17')).toBe(17);
    expect(decodeCursor(' chg_000000000007 ')).toBe(7);
  });

  it.each([null, undefined, '', 'garbage', 'chg_', 'chg_abc', '-5', '1.5', 'chg_-3'])(
    'decodes %p to 0',
    (input) => {
      expect(decodeCursor(input)).toBe(0);
    },
  );

  it('decodes ids beyond the safe integer range to 0', () => {
    expect(decodeCursor('99999999999999999999')).toBe(0);
  });
});
