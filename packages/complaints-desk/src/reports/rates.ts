/**
 * `count * 100 / total` rounded half-up to two decimals.
 *
 * Computed on integers (hundredths of a percent) so 12.5 stays 12.5 and
 * 3.125 becomes 3.13 regardless of binary floating point.
 *
 * @throws RangeError when total is not a positive integer
 */
export function percentage(count: number, total: number): number {
  if (!Number.isInteger(total) || total <= 0) {
    throw new RangeError(`percentage requires a positive total, got ${total}`);
  }
  const hundredths = Math.floor((count * 20000 + total) / (2 * total));
  return hundredths / 100;
}
