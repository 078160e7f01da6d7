import { describe, expect, it } from 'vitest';
import { integerBetweenRange, stringRange } from './combinators.js';
import { formatRangeViolation, isRangeViolation, RangeViolation } from './types.js';

describe('RangeViolation', () => {
  it('should be recognized by isRangeViolation', () => {
    expect(isRangeViolation(new RangeViolation(null, [], 1))).toBe(true);
    expect(isRangeViolation({ range: null, path: [], value: 1 })).toBe(false);
    expect(isRangeViolation(undefined)).toBe(false);
  });

  describe('formatRangeViolation', () => {
    it('should name the range, the path and the value', () => {
      const port = integerBetweenRange(1, 65535, 8080);
      const violation = new RangeViolation(port, ['port'], 70000);
      expect(formatRangeViolation(violation)).toBe(
        "Value 70000 at port is not in range 'integer between 1 and 65535'"
      );
    });

    it('should render indices and nested keys', () => {
      const violation = new RangeViolation(stringRange(''), ['servers', 0, 'host'], 5);
      expect(formatRangeViolation(violation)).toBe("Value 5 at servers[0].host is not in range 'string'");
    });

    it('should describe schema-shape violations without a range', () => {
      const violation = new RangeViolation(null, ['bogus'], 'x');
      expect(formatRangeViolation(violation)).toBe("Value 'x' at bogus does not fit the schema");
    });

    it('should render the root path', () => {
      const violation = new RangeViolation(null, [], 3);
      expect(formatRangeViolation(violation)).toBe('Value 3 at <root> does not fit the schema');
    });
  });
});
