/**
 * Command codes and protocol constants for the pigpio daemon socket interface.
 *
 * This module centralizes the command codes the client sends, the pin
 * modes / levels / pull settings they carry, and the notification flag bits.
 */

/** Command codes understood by the daemon (subset used by this client). */
export const Command = {
  MODES: 0,
  MODEG: 1,
  PUD: 2,
  READ: 3,
  WRITE: 4,
  WDOG: 9,
  BR1: 10,
  BR2: 11,
  BC1: 12,
  BC2: 13,
  BS1: 14,
  BS2: 15,
  TICK: 16,
  HWVER: 17,
  NB: 19,
  NC: 21,
  PIGPV: 26,
  TRIG: 37,
  SPIO: 71,
  SPIC: 72,
  SPIR: 73,
  SPIW: 74,
  SPIX: 75,
  SERO: 76,
  SERC: 77,
  SERRB: 78,
  SERWB: 79,
  SERR: 80,
  SERW: 81,
  SERDA: 82,
  NOIB: 99,
} as const;

/** Numeric union of supported command codes. */
export type CommandCode = (typeof Command)[keyof typeof Command];

/** Human readable labels, used in log lines and error messages. */
export const COMMAND_LABELS: Record<CommandCode, string> = {
  [Command.MODES]: "Set mode",
  [Command.MODEG]: "Get mode",
  [Command.PUD]: "Set pull up/down",
  [Command.READ]: "Read level",
  [Command.WRITE]: "Write level",
  [Command.WDOG]: "Set watchdog",
  [Command.BR1]: "Read bank 1",
  [Command.BR2]: "Read bank 2",
  [Command.BC1]: "Clear bank 1",
  [Command.BC2]: "Clear bank 2",
  [Command.BS1]: "Set bank 1",
  [Command.BS2]: "Set bank 2",
  [Command.TICK]: "Current tick",
  [Command.HWVER]: "Hardware revision",
  [Command.NB]: "Notify begin",
  [Command.NC]: "Notify close",
  [Command.PIGPV]: "Daemon version",
  [Command.TRIG]: "Trigger pulse",
  [Command.SPIO]: "SPI open",
  [Command.SPIC]: "SPI close",
  [Command.SPIR]: "SPI read",
  [Command.SPIW]: "SPI write",
  [Command.SPIX]: "SPI transfer",
  [Command.SERO]: "Serial open",
  [Command.SERC]: "Serial close",
  [Command.SERRB]: "Serial read byte",
  [Command.SERWB]: "Serial write byte",
  [Command.SERR]: "Serial read",
  [Command.SERW]: "Serial write",
  [Command.SERDA]: "Serial data available",
  [Command.NOIB]: "Notify open in-band",
};

const COMMAND_CODES: readonly number[] = Object.values(Command);

/**
 * Return true when the provided code is one of the supported command codes.
 *
 * @param code - Numeric command code
 */
export function isCommandCode(code: number): code is CommandCode {
  return COMMAND_CODES.includes(code);
}

/** Label for a command code, falling back to the raw number. */
export function commandLabel(code: number): string {
  return isCommandCode(code) ? COMMAND_LABELS[code] : `Unknown (${code})`;
}

/** GPIO modes accepted by `MODES` and returned by `MODEG`. */
export const Mode = {
  INPUT: 0,
  OUTPUT: 1,
  ALT0: 4,
  ALT1: 5,
  ALT2: 6,
  ALT3: 7,
  ALT4: 3,
  ALT5: 2,
} as const;
export type GpioMode = (typeof Mode)[keyof typeof Mode];

/** Digital levels. `TIMEOUT` only appears in watchdog notifications. */
export const Level = {
  LOW: 0,
  HIGH: 1,
  TIMEOUT: 2,
} as const;
export type DigitalLevel = typeof Level.LOW | typeof Level.HIGH;
export type EventLevel = (typeof Level)[keyof typeof Level];

/** Pull resistor settings for `PUD`. */
export const Pull = {
  OFF: 0,
  DOWN: 1,
  UP: 2,
} as const;
export type PullSetting = (typeof Pull)[keyof typeof Pull];

/** Edge selectors for callbacks. */
export const Edge = {
  RISING: 0,
  FALLING: 1,
  EITHER: 2,
} as const;
export type EdgeSelector = (typeof Edge)[keyof typeof Edge];

/** Flag bits of a notification record. */
export const NotifyFlag = {
  GPIO_MASK: 0x1f,
  WATCHDOG: 1 << 5,
  ALIVE: 1 << 6,
  EVENT: 1 << 7,
} as const;

/** Highest GPIO addressable through the notification bitmask. */
export const MAX_GPIO = 31;
/** Highest GPIO the daemon reads, writes and configures (bank 2). */
export const MAX_PIN = 53;
/** Largest watchdog timeout the daemon accepts (ms). */
export const MAX_WATCHDOG_MS = 60_000;
/** Largest trigger pulse the daemon accepts (µs). */
export const MAX_TRIGGER_PULSE_US = 100;
/** Default daemon TCP port. */
export const DEFAULT_PORT = 8888;
