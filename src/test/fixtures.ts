import { Logger, LogLevel } from "../logging/logger";
import { ProvisionerSettings, ProvisionerSettingsSchema } from "../types/schemas";

/** Defaults, with every wait shortened to zero. */
export function testSettings(): ProvisionerSettings {
  return ProvisionerSettingsSchema.parse({
    container: { readiness: { interval_ms: 0, max_attempts: 30 } },
    vm: { settle_delay_ms: 0 },
  });
}

export function memoryLogger(level: LogLevel = LogLevel.DEBUG): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  const logger = new Logger({ level, sink: line => lines.push(line) });
  return { logger, lines };
}
