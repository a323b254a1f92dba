// Argument guards for the command facade.
// A bad argument is a programmer error: it throws before anything is sent.

import { MAX_GPIO, MAX_PIN } from "../commands.ts";

const UINT32_MAX = 0xffff_ffff;

/** Assert `value` is an integer within `[min, max]`. */
export function assertIntegerInRange(
  name: string,
  value: number,
  min: number,
  max: number,
): void {
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new TypeError(`${name} must be an integer, got ${String(value)}`);
  }
  if (value < min || value > max) {
    throw new RangeError(`${name} must be ${min}-${max}, got ${value}`);
  }
}

/** Assert `value` fits an unsigned 32-bit protocol field. */
export function assertUint32(name: string, value: number): void {
  assertIntegerInRange(name, value, 0, UINT32_MAX);
}

/** Assert `gpio` can be addressed through the 32-bit notification mask. */
export function assertGpio(gpio: number): void {
  assertIntegerInRange("gpio", gpio, 0, MAX_GPIO);
}

/** Assert `gpio` is a pin the daemon can configure, read or write. */
export function assertPin(gpio: number): void {
  assertIntegerInRange("gpio", gpio, 0, MAX_PIN);
}

/** Assert `data` is a byte buffer. */
export function assertBytes(name: string, data: Uint8Array): void {
  if (!(data instanceof Uint8Array)) {
    throw new TypeError(`${name} must be a Uint8Array`);
  }
}
