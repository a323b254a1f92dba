import { isOk, unwrapErr, unwrapOk } from "option-t/plain_result";
import { describe, expect, it, vi } from "vitest";
import {
  Command,
  type DigitalLevel,
  Level,
  Mode,
  Pull,
} from "../src/commands.ts";
import { ConnectionError } from "../src/errors.ts";
import { connect } from "../src/pi.ts";
import { MockTransport } from "../src/transport/mock-transport.ts";
import type { TcpTransportConfig } from "../src/transport/transport.ts";
import { FakeDaemon } from "./fake-daemon.ts";
import { createTestLogger, openPi } from "./helpers.ts";

describe("connect", () => {
  it("resolves the endpoint from the environment", async () => {
    const daemon = new FakeDaemon();
    const configs: TcpTransportConfig[] = [];
    const result = await connect(
      {},
      {
        env: { PIGPIO_ADDR: "10.0.0.2", PIGPIO_PORT: "9999" },
        logger: createTestLogger(),
        transportFactory: (config) => {
          configs.push(config);
          return daemon.factory(config);
        },
      },
    );
    const pi = unwrapOk(result);
    expect(pi.id).toBe("10.0.0.2:9999");
    expect(pi.connected).toBe(true);
    expect(configs).toEqual([
      { connectTimeout: 10_000, host: "10.0.0.2", port: 9999, type: "tcp" },
      { connectTimeout: 10_000, host: "10.0.0.2", port: 9999, type: "tcp" },
    ]);
    await pi.disconnect();
  });

  it("reports an unreachable daemon as ConnectionError", async () => {
    const result = await connect(
      { host: "pi.invalid" },
      {
        env: {},
        logger: createTestLogger(),
        transportFactory: () =>
          new MockTransport(
            { type: "mock" },
            { errorMessage: "getaddrinfo ENOTFOUND", shouldFailConnect: true },
          ),
      },
    );
    const error = unwrapErr(result);
    expect(error).toBeInstanceOf(ConnectionError);
    expect(error.message).toBe(
      "Unable to connect to mock: getaddrinfo ENOTFOUND",
    );
  });

  it("throws on an invalid port", () => {
    expect(() => connect({ port: 70000 }, { env: {} })).toThrow(
      "Invalid port: 70000",
    );
  });
});

describe("Pi", () => {
  it("sets and reads modes and pulls", async () => {
    const { daemon, pi } = await openPi();
    expect(unwrapOk(await pi.setMode(17, Mode.OUTPUT))).toBe(0);
    expect(unwrapOk(await pi.getMode(17))).toBe(Mode.OUTPUT);
    await pi.setPullUpDown(17, Pull.UP);
    expect(daemon.pulls.get(17)).toBe(Pull.UP);
    expect(daemon.commands(Command.MODES)[0]).toMatchObject({ p1: 17, p2: 1 });
    await pi.disconnect();
  });

  it("writes and reads levels", async () => {
    const { daemon, pi } = await openPi();
    await pi.write(4, Level.HIGH);
    expect(daemon.levels).toBe(1 << 4);
    expect(unwrapOk(await pi.read(4))).toBe(1);
    await pi.write(4, Level.LOW);
    expect(unwrapOk(await pi.read(4))).toBe(0);
    await pi.disconnect();
  });

  it("passes negative daemon codes through", async () => {
    const { daemon, pi } = await openPi();
    daemon.overrides.set(Command.WRITE, -41);
    const result = await pi.write(2, Level.HIGH);
    expect(isOk(result)).toBe(true);
    expect(unwrapOk(result)).toBe(-41);
    await pi.disconnect();
  });

  it("validates arguments before sending", async () => {
    const { daemon, pi } = await openPi();
    const badLevel: number = 2;
    expect(() => pi.read(54)).toThrow(RangeError);
    expect(() => pi.read(1.5)).toThrow(TypeError);
    expect(() => pi.write(4, badLevel as DigitalLevel)).toThrow(
      "level must be 0-1, got 2",
    );
    expect(() => pi.setWatchdog(4, 60_001)).toThrow(RangeError);
    expect(() => pi.setWatchdog(32, 10)).toThrow(RangeError);
    expect(() => pi.gpioTrigger(4, 101, Level.HIGH)).toThrow(RangeError);
    expect(() => pi.serialWriteByte(0, 256)).toThrow(RangeError);
    expect(() => pi.spiOpen(3, 50_000)).toThrow(RangeError);
    expect(daemon.received).toHaveLength(0);
    await pi.disconnect();
  });

  it("reads banks and ticks as unsigned values", async () => {
    const { daemon, pi } = await openPi();
    daemon.levels = 0x80000001;
    daemon.tick = 0xfffffff0;
    expect(unwrapOk(await pi.readBank1())).toBe(0x80000001);
    expect(unwrapOk(await pi.readBank2())).toBe(0);
    expect(unwrapOk(await pi.getCurrentTick())).toBe(0xfffffff0);
    await pi.disconnect();
  });

  it("sets and clears bank bits", async () => {
    const { daemon, pi } = await openPi();
    await pi.setBank1(0b1010);
    expect(daemon.levels).toBe(0b1010);
    await pi.clearBank1(0b0010);
    expect(daemon.levels).toBe(0b1000);
    await pi.setBank2(1);
    await pi.clearBank2(1);
    expect(daemon.commands(Command.BS2)[0].p1).toBe(1);
    expect(daemon.commands(Command.BC2)[0].p1).toBe(1);
    await pi.disconnect();
  });

  it("reports daemon information", async () => {
    const { pi } = await openPi();
    expect(unwrapOk(await pi.getHardwareRevision())).toBe(0xa02082);
    expect(unwrapOk(await pi.getPigpioVersion())).toBe(79);
    await pi.disconnect();
  });

  it("sends the trigger level as an extension word", async () => {
    const { daemon, pi } = await openPi();
    await pi.gpioTrigger(4, 10, Level.HIGH);
    const [trig] = daemon.commands(Command.TRIG);
    expect(trig).toMatchObject({ extLength: 4, p1: 4, p2: 10 });
    expect(Array.from(trig.payload)).toEqual([1, 0, 0, 0]);
    await pi.disconnect();
  });

  it("tracks watchdogs and cancels them on disconnect", async () => {
    const { daemon, pi } = await openPi();
    await pi.setWatchdog(4, 500);
    await pi.setWatchdog(5, 200);
    await pi.setWatchdog(5, 0);
    expect([...pi.watchdogs]).toEqual([4]);
    expect(daemon.watchdogs.get(4)).toBe(500);

    await pi.disconnect();
    expect(daemon.watchdogs.size).toBe(0);
    expect(pi.watchdogs.size).toBe(0);
    expect(pi.connected).toBe(false);
  });

  it("does not track a watchdog the daemon refused", async () => {
    const { daemon, pi } = await openPi();
    daemon.overrides.set(Command.WDOG, -2);
    await pi.setWatchdog(4, 500);
    expect(pi.watchdogs.size).toBe(0);
    await pi.disconnect();
  });

  describe("SPI", () => {
    it("opens with flags in the extension", async () => {
      const { daemon, pi } = await openPi();
      await pi.spiOpen(1, 500_000, 3);
      const [open] = daemon.commands(Command.SPIO);
      expect(open).toMatchObject({ p1: 1, p2: 500_000 });
      expect(Array.from(open.payload)).toEqual([3, 0, 0, 0]);
      await pi.disconnect();
    });

    it("reads, writes and transfers bytes", async () => {
      const { daemon, pi } = await openPi();
      const read = unwrapOk(await pi.spiRead(0, 3));
      expect(read.result).toBe(3);
      expect(Array.from(read.data)).toEqual([1, 2, 3]);

      expect(unwrapOk(await pi.spiWrite(0, Uint8Array.of(9, 8)))).toBe(2);
      expect(Array.from(daemon.commands(Command.SPIW)[0].payload)).toEqual([
        9, 8,
      ]);

      const xfer = unwrapOk(await pi.spiXfer(0, Uint8Array.of(0x0f, 0xf0)));
      expect(Array.from(xfer.data)).toEqual([0xf0, 0x0f]);
      await pi.spiClose(0);
      expect(daemon.commands(Command.SPIC)).toHaveLength(1);
      await pi.disconnect();
    });
  });

  describe("serial", () => {
    it("sends the device name as the payload", async () => {
      const { daemon, pi } = await openPi();
      const handle = unwrapOk(await pi.serialOpen("/dev/ttyAMA0", 9600));
      expect(handle).toBe(0);
      const [open] = daemon.commands(Command.SERO);
      expect(open).toMatchObject({ extLength: 12, p1: 9600, p2: 0 });
      expect(daemon.serialPorts.get(0)?.tty).toBe("/dev/ttyAMA0");
      await pi.disconnect();
    });

    it("returns the daemon code for a bad device", async () => {
      const { pi } = await openPi();
      expect(unwrapOk(await pi.serialOpen("/tmp/port", 9600))).toBe(-79);
      expect(() => pi.serialOpen("", 9600)).toThrow(TypeError);
      await pi.disconnect();
    });

    it("writes, polls and reads", async () => {
      const { daemon, pi } = await openPi();
      daemon.serialReply = (written) => Array.from(written).reverse();
      const handle = unwrapOk(await pi.serialOpen("/dev/ttyS0", 115200));
      await pi.serialWrite(handle, Uint8Array.of(1, 2, 3));
      expect(unwrapOk(await pi.serialDataAvailable(handle))).toBe(3);

      const first = unwrapOk(await pi.serialRead(handle, 2));
      expect(Array.from(first.data)).toEqual([3, 2]);
      const rest = unwrapOk(await pi.serialRead(handle, 10));
      expect(Array.from(rest.data)).toEqual([1]);
      const empty = unwrapOk(await pi.serialRead(handle, 10));
      expect(empty.result).toBe(0);

      await pi.serialWriteByte(handle, 0x41);
      expect(daemon.commands(Command.SERWB)[0]).toMatchObject({ p2: 0x41 });
      await pi.serialReadByte(handle);
      expect(unwrapOk(await pi.serialClose(handle))).toBe(0);
      await pi.disconnect();
    });
  });

  it("logs connect and disconnect", async () => {
    const { logger, pi } = await openPi();
    expect(logger.info).toHaveBeenCalledWith("connected to localhost:8888");
    await pi.disconnect();
    expect(logger.info).toHaveBeenLastCalledWith(
      "disconnected from localhost:8888",
    );
  });

  it("reconnects transparently after the command stream drops", async () => {
    const { daemon, pi } = await openPi();
    daemon.transports[0].simulateDisconnect();
    expect(unwrapOk(await pi.getPigpioVersion())).toBe(79);
    expect(daemon.transports[0].connectCount).toBe(2);
    await pi.disconnect();
  });

  it("can be disconnected twice", async () => {
    const { pi } = await openPi();
    await pi.disconnect();
    await expect(pi.disconnect()).resolves.toBeUndefined();
  });
});

describe("Pi with a spy transport", () => {
  it("sends exactly one frame per command", async () => {
    const daemon = new FakeDaemon();
    const sent = vi.fn();
    const result = await connect(
      {},
      {
        env: {},
        logger: createTestLogger(),
        transportFactory: (config) => {
          const transport = daemon.factory(config);
          transport.addEventListener("statechange", sent);
          return transport;
        },
      },
    );
    const pi = unwrapOk(result);
    await pi.read(3);
    expect(daemon.transports[0].sentData).toHaveLength(1);
    expect(sent).toHaveBeenCalledTimes(2);
    await pi.disconnect();
  });
});
