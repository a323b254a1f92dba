/** Ticks are the daemon's microsecond counter; they wrap at 2^32. */
export const TICK_MODULUS = 2 ** 32;

/**
 * Ticks elapsed from `from` to `to` on the wrapping 32-bit clock.
 * Always in `[0, 2^32)`.
 */
export function tickDiff(from: number, to: number): number {
  let diff = to - from;
  if (diff < 0) diff += TICK_MODULUS;
  return diff % TICK_MODULUS;
}
