/**
 * Client for the pigpio daemon's socket interface.
 *
 * ```ts
 * import { isOk, unwrapOk } from "option-t/plain_result";
 * import { connect, Level, Mode } from "pigpio-remote";
 *
 * const connected = await connect({ host: "raspberrypi.local" });
 * if (isOk(connected)) {
 *   const pi = unwrapOk(connected);
 *   await pi.setMode(17, Mode.OUTPUT);
 *   await pi.write(17, Level.HIGH);
 *   await pi.disconnect();
 * }
 * ```
 */
export {
  Command,
  type CommandCode,
  commandLabel,
  DEFAULT_PORT,
  type DigitalLevel,
  Edge,
  type EdgeSelector,
  type EventLevel,
  type GpioMode,
  isCommandCode,
  Level,
  MAX_GPIO,
  MAX_PIN,
  MAX_TRIGGER_PULSE_US,
  MAX_WATCHDOG_MS,
  Mode,
  NotifyFlag,
  Pull,
  type PullSetting,
} from "./commands.ts";
export {
  type ConnectionConfig,
  type ConnectionOptions,
  DEFAULT_CONNECT_TIMEOUT,
  DEFAULT_HOST,
  type Environment,
  resolveConnectionConfig,
} from "./config.ts";
export * from "./devices/index.ts";
export {
  ConnectionError,
  DAEMON_ERROR_CODES,
  DaemonError,
  DecodeError,
  describeDaemonError,
  PigpioError,
  ProtocolError,
  requireSuccess,
} from "./errors.ts";
export {
  COMMAND_HEADER_SIZE,
  encodeCommand,
  encodeExtended,
  encodeNotification,
  encodeResponse,
  NOTIFICATION_SIZE,
  type NotificationRecord,
  packWords,
} from "./frameBuilder.ts";
export {
  type CommandHeader,
  decodeResponse,
  parseCommandHeader,
  parseNotification,
  parseResponse,
  type ResponseFrame,
} from "./frameParser.ts";
export {
  createLogger,
  type Logger,
  type LoggerOptions,
  type LogLevel,
  silentLogger,
} from "./logger.ts";
export {
  type CallbackEvent,
  type CallbackHandler,
  edgeMatches,
  NotificationListener,
  type NotificationListenerOptions,
} from "./notifications.ts";
export {
  type ConnectDependencies,
  connect,
  type DaemonResult,
  Pi,
} from "./pi.ts";
export {
  type CommandChannel,
  CommandSession,
  type CommandSessionOptions,
  type PayloadResponse,
} from "./session.ts";
export * from "./transport/index.ts";
export { TICK_MODULUS, tickDiff } from "./utils/tick.ts";
