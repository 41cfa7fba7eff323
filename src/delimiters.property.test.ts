import { describe, test, expect } from '@jest/globals';
import fc from 'fast-check';
import { addDelimiters, createDelimiters, isDelimited, removeDelimiters } from './delimiters';

const delimiterPairGen = fc
  .tuple(fc.constantFrom('{', '[', '(', '«', '$'), fc.constantFrom('}', ']', ')', '»', '#'))
  .map(([open, close]) => createDelimiters(open, close));

describe('Delimiter utilities properties', () => {
  test('addDelimiters is idempotent', () => {
    fc.assert(
      fc.property(fc.string({ maxLength: 20 }), delimiterPairGen, (s, d) => {
        const once = addDelimiters(s, d);
        expect(addDelimiters(once, d)).toBe(once);
        expect(isDelimited(once, d)).toBe(true);
      }),
      { numRuns: 200 }
    );
  });

  test('removeDelimiters undoes addDelimiters for keys without delimiter characters at the ends', () => {
    fc.assert(
      fc.property(fc.string({ maxLength: 20 }), delimiterPairGen, (s, d) => {
        const chars = Array.from(s);
        const edgeIsDelimiter = chars.length > 0 &&
          [chars[0], chars[chars.length - 1]].some(c => c === d.open || c === d.close);
        fc.pre(!edgeIsDelimiter);
        expect(removeDelimiters(addDelimiters(s, d), d)).toBe(s);
      }),
      { numRuns: 200 }
    );
  });

  test('removeDelimiters leaves non-delimited strings alone', () => {
    fc.assert(
      fc.property(fc.string({ maxLength: 20 }), delimiterPairGen, (s, d) => {
        fc.pre(!isDelimited(s, d));
        expect(removeDelimiters(s, d)).toBe(s);
      }),
      { numRuns: 200 }
    );
  });
});
