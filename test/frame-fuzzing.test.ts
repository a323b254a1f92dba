import fc from "fast-check";
import { isOk, unwrapOk } from "option-t/plain_result";
import { describe, expect, it } from "vitest";
import { Dht22Decoder } from "../src/devices/dht22.ts";
import {
  encodeCommand,
  encodeExtended,
  encodeResponse,
} from "../src/frameBuilder.ts";
import { decodeResponse, parseCommandHeader } from "../src/frameParser.ts";
import { TICK_MODULUS, tickDiff } from "../src/utils/tick.ts";
import { dht22Checksum, dht22Edges } from "./dht22-signal.ts";

const uint32 = fc.integer({ max: 0xffffffff, min: 0 });
const byte = fc.integer({ max: 255, min: 0 });

describe("Frame Fuzzing Tests", () => {
  it("command headers decode to the fields they were built from", () => {
    fc.assert(
      fc.property(uint32, uint32, uint32, (command, p1, p2) => {
        const header = parseCommandHeader(encodeCommand(command, p1, p2));
        expect(unwrapOk(header)).toEqual({ command, extLength: 0, p1, p2 });
      }),
    );
  });

  it("extended frames carry their payload length", () => {
    fc.assert(
      fc.property(fc.uint8Array({ maxLength: 64 }), (payload) => {
        const frame = encodeExtended(75, 1, 0, payload);
        expect(unwrapOk(parseCommandHeader(frame)).extLength).toBe(
          payload.length,
        );
        expect(Array.from(frame.subarray(16))).toEqual(Array.from(payload));
      }),
    );
  });

  it("any int32 result survives the response frame", () => {
    fc.assert(
      fc.property(
        fc.integer({ max: 2 ** 31 - 1, min: -(2 ** 31) }),
        (result) => {
          const decoded = decodeResponse(encodeResponse(3, 0, 0, result));
          expect(isOk(decoded) && unwrapOk(decoded)).toBe(result);
        },
      ),
    );
  });

  it("tickDiff measures forward distance on the wrapping clock", () => {
    fc.assert(
      fc.property(uint32, uint32, (from, to) => {
        const diff = tickDiff(from, to);
        expect(diff).toBeGreaterThanOrEqual(0);
        expect(diff).toBeLessThan(TICK_MODULUS);
        expect((from + diff) % TICK_MODULUS).toBe(to);
      }),
    );
  });

  it("DHT22 frames with a valid checksum decode to their bytes", () => {
    fc.assert(
      fc.property(
        byte,
        byte,
        byte,
        byte,
        fc.integer({ max: TICK_MODULUS - 1, min: 0 }),
        (hHi, hLo, tHi, tLo, start) => {
          const data = [hHi, hLo, tHi, tLo];
          const decoder = new Dht22Decoder();
          const outcomes = dht22Edges([...data, dht22Checksum(data)], start)
            .map(({ level, tick }) => decoder.feed(level, tick))
            .filter((o) => o !== undefined);

          const magnitude = (((tHi & 0x7f) << 8) | tLo) / 10;
          expect(outcomes).toHaveLength(1);
          expect(decoder.humidity).toBe(((hHi << 8) | hLo) / 10);
          expect(decoder.temperature).toBe(tHi & 0x80 ? -magnitude : magnitude);
          expect(decoder.invalidReads).toBe(0);
        },
      ),
    );
  });
});
