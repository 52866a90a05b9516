import { InvalidArgumentError } from 'commander';

/**
 * Option parser for counts such as `--max-files`. Rejects anything but a
 * positive whole number.
 */
export function parsePositiveInteger(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('Must be a positive whole number.');
  }
  const parsed = parseInt(value, 10);
  if (parsed === 0) {
    throw new InvalidArgumentError('Must be a positive whole number.');
  }
  return parsed;
}
