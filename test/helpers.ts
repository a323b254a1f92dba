// Shared setup: a Pi connected to an in-process fake daemon.

import { unwrapOk } from "option-t/plain_result";
import { vi } from "vitest";
import type { Logger } from "../src/logger.ts";
import { connect, type Pi } from "../src/pi.ts";
import { FakeDaemon } from "./fake-daemon.ts";

export interface TestLogger extends Logger {
  debug: ReturnType<typeof vi.fn>;
  info: ReturnType<typeof vi.fn>;
  warn: ReturnType<typeof vi.fn>;
  error: ReturnType<typeof vi.fn>;
}

export function createTestLogger(): TestLogger {
  return { debug: vi.fn(), error: vi.fn(), info: vi.fn(), warn: vi.fn() };
}

export async function openPi(): Promise<{
  daemon: FakeDaemon;
  logger: TestLogger;
  pi: Pi;
}> {
  const daemon = new FakeDaemon();
  const logger = createTestLogger();
  const connected = await connect(
    { id: "pi-test" },
    { env: {}, logger, transportFactory: daemon.factory },
  );
  return { daemon, logger, pi: unwrapOk(connected) };
}
