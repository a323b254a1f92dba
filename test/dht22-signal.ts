// Builds the edge sequence a DHT22 produces for a given 5-byte frame.

import { TICK_MODULUS } from "../src/utils/tick.ts";

export interface SignalEdge {
  level: 0 | 1;
  tick: number;
}

/** Low phase before each bit (µs). */
const BIT_LOW_US = 50;
const ZERO_HIGH_US = 26;
const ONE_HIGH_US = 70;

/** Checksum byte for four data bytes. */
export function dht22Checksum(bytes: readonly number[]): number {
  return bytes.reduce((sum, b) => sum + b, 0) & 0xff;
}

/**
 * Edges for the response to a start pulse released at `start`: the two
 * header pulses, 40 data bits (most significant first), and the final
 * release.
 */
export function dht22Edges(
  frame: readonly number[],
  start = 1_000_000,
): SignalEdge[] {
  const edges: SignalEdge[] = [];
  let t = start;
  const push = (level: 0 | 1) => edges.push({ level, tick: t % TICK_MODULUS });

  push(1);
  t += 20;
  push(0);
  t += 80;
  push(1);
  t += 80;
  push(0);
  for (const byte of frame) {
    for (let i = 7; i >= 0; i--) {
      t += BIT_LOW_US;
      push(1);
      t += (byte >> i) & 1 ? ONE_HIGH_US : ZERO_HIGH_US;
      push(0);
    }
  }
  t += BIT_LOW_US;
  push(1);
  return edges;
}
