import { InvalidArgumentError } from 'commander';
import { parsePositiveInteger } from '../../src/cli/options';

describe('parsePositiveInteger', () => {
  it('should parse whole numbers', () => {
    expect(parsePositiveInteger('250')).toBe(250);
    expect(parsePositiveInteger(' 7 ')).toBe(7);
  });

  it('should reject values that are not positive whole numbers', () => {
    for (const value of ['abc', '12abc', '-3', '1.5', '', '0']) {
      expect(() => parsePositiveInteger(value)).toThrow(InvalidArgumentError);
    }
    expect(() => parsePositiveInteger('abc')).toThrow('Must be a positive whole number.');
  });
});
