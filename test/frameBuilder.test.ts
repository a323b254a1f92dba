import { describe, expect, it } from "vitest";
import { Command } from "../src/commands.ts";
import {
  COMMAND_HEADER_SIZE,
  encodeCommand,
  encodeExtended,
  encodeNotification,
  encodeResponse,
  packWords,
} from "../src/frameBuilder.ts";

describe("Frame Builder", () => {
  describe("encodeCommand", () => {
    it("writes four little-endian words", () => {
      const frame = encodeCommand(Command.WRITE, 17, 1);
      expect(Array.from(frame)).toEqual([
        4, 0, 0, 0, 17, 0, 0, 0, 1, 0, 0, 0, 0, 0, 0, 0,
      ]);
    });

    it("encodes the full uint32 range", () => {
      const frame = encodeCommand(Command.BS1, 0xffffffff, 0x12345678);
      expect(Array.from(frame.subarray(4, 12))).toEqual([
        0xff, 0xff, 0xff, 0xff, 0x78, 0x56, 0x34, 0x12,
      ]);
    });

    it("rejects values outside uint32", () => {
      expect(() => encodeCommand(Command.READ, -1, 0)).toThrow(RangeError);
      expect(() => encodeCommand(Command.READ, 2 ** 32, 0)).toThrow(
        RangeError,
      );
      expect(() => encodeCommand(Command.READ, 1.5, 0)).toThrow(TypeError);
    });
  });

  describe("encodeExtended", () => {
    it("sets the length field to the payload size", () => {
      const frame = encodeExtended(
        Command.SERW,
        3,
        0,
        new Uint8Array([0xaa, 0xbb, 0xcc]),
      );
      expect(frame.length).toBe(COMMAND_HEADER_SIZE + 3);
      expect(new DataView(frame.buffer).getUint32(12, true)).toBe(3);
      expect(Array.from(frame.subarray(16))).toEqual([0xaa, 0xbb, 0xcc]);
    });

    it("accepts an empty payload", () => {
      const frame = encodeExtended(Command.SPIW, 0, 0, new Uint8Array(0));
      expect(frame.length).toBe(COMMAND_HEADER_SIZE);
      expect(new DataView(frame.buffer).getUint32(12, true)).toBe(0);
    });
  });

  describe("packWords", () => {
    it("packs words little-endian", () => {
      expect(Array.from(packWords([1, 0x01020304]))).toEqual([
        1, 0, 0, 0, 4, 3, 2, 1,
      ]);
    });

    it("rejects negative words", () => {
      expect(() => packWords([-1])).toThrow("word[0] must be 0-4294967295");
    });
  });

  describe("daemon side", () => {
    it("stores the result as signed int32", () => {
      const frame = encodeResponse(Command.READ, 4, 0, -2);
      expect(Array.from(frame.subarray(12))).toEqual([0xfe, 0xff, 0xff, 0xff]);
    });

    it("encodes a notification record", () => {
      const bytes = encodeNotification({
        flags: 0x24,
        level: 0x80000001,
        seq: 7,
        tick: 0x01020304,
      });
      expect(Array.from(bytes)).toEqual([
        7, 0, 0x24, 0, 4, 3, 2, 1, 1, 0, 0, 0x80,
      ]);
    });
  });
});
