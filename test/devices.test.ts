import { isErr, unwrapErr, unwrapOk } from "option-t/plain_result";
import { describe, expect, it, vi } from "vitest";
import { Command, Mode } from "../src/commands.ts";
import { DigitalOutput, Led, Switch } from "../src/devices/digital-output.ts";
import {
  computeConcentration,
  Dsm501a,
  lowPulseMicros,
} from "../src/devices/dsm501a.ts";
import {
  MhZ14,
  mhZ14Checksum,
  parseCo2Response,
  readCo2Command,
} from "../src/devices/mh-z14.ts";
import { DaemonError, DecodeError } from "../src/errors.ts";
import { openPi } from "./helpers.ts";

const CO2_400_PPM = [0xff, 0x86, 0x01, 0x90, 0, 0, 0, 0, 0xe9];

describe("digital outputs", () => {
  it("switches a pin on and off", async () => {
    const { daemon, pi } = await openPi();
    const power = unwrapOk(await Switch.create(pi, 17));
    expect(daemon.modes.get(17)).toBe(Mode.OUTPUT);

    await power.on();
    expect(daemon.levels).toBe(1 << 17);
    expect(unwrapOk(await power.status())).toBe(true);
    await power.off();
    expect(unwrapOk(await power.status())).toBe(false);
    await pi.disconnect();
  });

  it("toggles an LED", async () => {
    const { daemon, pi } = await openPi();
    const led = unwrapOk(await Led.create(pi, 5));
    expect(unwrapOk(await led.toggle())).toBe(true);
    expect(daemon.levels).toBe(1 << 5);
    expect(unwrapOk(await led.toggle())).toBe(false);
    expect(daemon.levels).toBe(0);
    await pi.disconnect();
  });

  it("reports a pin the daemon will not configure", async () => {
    const { daemon, pi } = await openPi();
    daemon.overrides.set(Command.MODES, -41);
    const result = await Led.create(pi, 5);
    expect(unwrapErr(result)).toBeInstanceOf(DaemonError);
    await pi.disconnect();
  });

  it("rejects an invalid pin", async () => {
    const { pi } = await openPi();
    expect(() => new DigitalOutput(pi, 60)).toThrow(RangeError);
    await pi.disconnect();
  });
});

describe("DSM501A", () => {
  it("sums the low phases", () => {
    expect(
      lowPulseMicros([
        { level: 0, tick: 100 },
        { level: 1, tick: 400 },
        { level: 0, tick: 500 },
        { level: 1, tick: 900 },
      ]),
    ).toBe(700);
    expect(
      lowPulseMicros([
        { level: 0, tick: 2 ** 32 - 100 },
        { level: 1, tick: 50 },
      ]),
    ).toBe(150);
  });

  it("converts occupancy to particles per cubic metre", () => {
    expect(computeConcentration(30_000_000, 30, 30)).toBeCloseTo(
      15_000 / 0.02831685,
      6,
    );
    expect(computeConcentration(0, 30, 30)).toBe(0);
    expect(computeConcentration(1000, 0, 30)).toBe(0);
  });

  it("samples the pin for the window", async () => {
    const { daemon, pi } = await openPi();
    daemon.levels = 1 << 4;
    const now = vi.fn().mockReturnValueOnce(0).mockReturnValueOnce(1000);
    const sensor = new Dsm501a(pi, 4, { now });

    const pending = sensor.sample(0.2);
    await vi.waitFor(() => expect(daemon.watchdogs.get(4)).toBe(200), {
      interval: 1,
    });
    daemon.change(0, 1000);
    daemon.change(1 << 4, 301_000);
    daemon.change(0, 400_000);
    daemon.change(1 << 4, 500_000);

    const pcs = unwrapOk(await pending);
    expect(pcs).toBeCloseTo(40 / 0.02831685, 6);
    expect(daemon.watchdogs.has(4)).toBe(false);
    expect(pi.notifications.isSubscribed(4)).toBe(false);
    await pi.disconnect();
  });

  it("rejects a non-positive window", async () => {
    const { pi } = await openPi();
    expect(() => new Dsm501a(pi, 4).sample(0)).toThrow(RangeError);
    await pi.disconnect();
  });
});

describe("MH-Z14", () => {
  it("builds the read command with its checksum", () => {
    expect(Array.from(readCo2Command())).toEqual([
      0xff, 0x01, 0x86, 0, 0, 0, 0, 0, 0x79,
    ]);
    expect(mhZ14Checksum(Uint8Array.from(CO2_400_PPM))).toBe(0xe9);
  });

  it("parses a concentration response", () => {
    expect(unwrapOk(parseCo2Response(Uint8Array.from(CO2_400_PPM)))).toBe(400);
  });

  it("rejects corrupt responses", () => {
    const bad = Uint8Array.from(CO2_400_PPM);
    bad[3] = 0x91;
    expect(unwrapErr(parseCo2Response(bad)).message).toBe(
      "Decode error: checksum 233 does not match 232",
    );
    expect(isErr(parseCo2Response(new Uint8Array(8)))).toBe(true);
    expect(isErr(parseCo2Response(new Uint8Array(9)))).toBe(true);
  });

  it("reads CO2 over the serial port and closes it", async () => {
    const { daemon, pi } = await openPi();
    daemon.serialReply = () => CO2_400_PPM;
    const sensor = new MhZ14(pi, "/dev/ttyAMA0");

    expect(unwrapOk(await sensor.read())).toBe(400);
    const [open] = daemon.commands(Command.SERO);
    expect(open.p1).toBe(9600);
    expect(Array.from(daemon.commands(Command.SERW)[0].payload)).toEqual(
      Array.from(readCo2Command()),
    );
    expect(daemon.commands(Command.SERC)).toHaveLength(1);
    expect(daemon.serialPorts.size).toBe(0);
    await pi.disconnect();
  });

  it("gives up when the sensor stays silent", async () => {
    const { daemon, pi } = await openPi();
    const sensor = new MhZ14(pi, "/dev/ttyAMA0", { maxPolls: 3 });
    const result = await sensor.read();
    expect(unwrapErr(result)).toBeInstanceOf(DecodeError);
    expect(unwrapErr(result).message).toBe(
      "Decode error: no response on /dev/ttyAMA0 after 3 polls",
    );
    expect(daemon.commands(Command.SERDA)).toHaveLength(3);
    expect(daemon.serialPorts.size).toBe(0);
    await pi.disconnect();
  });

  it("reports a port the daemon cannot open", async () => {
    const { daemon, pi } = await openPi();
    const result = await new MhZ14(pi, "/dev/null").read();
    expect(unwrapErr(result).message).toBe(
      "Serial device not /dev/tty* (code: -79)",
    );
    expect(daemon.commands(Command.SERC)).toHaveLength(0);
    await pi.disconnect();
  });
});
