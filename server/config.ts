import { appConfigSchema, type AppConfig } from "@shared/schema";

/**
 * Build the application config from environment variables.
 * Unset variables fall back to the schema defaults; invalid values throw.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return appConfigSchema.parse({
    connection: {
      path: env.SERIAL_PORT || undefined,
      baudRate: env.BAUD_RATE,
      openTimeoutMs: env.OPEN_TIMEOUT_MS,
      settleMs: env.CONNECT_SETTLE_MS,
    },
    motion: {
      stepSize: env.STEP_SIZE,
      batchSize: env.BATCH_SIZE,
      readyTimeoutMs: env.READY_TIMEOUT_MS,
      commandTimeoutMs: env.COMMAND_TIMEOUT_MS,
    },
    patternDir: env.PATTERN_DIR || undefined,
    homeBeforeRun: env.HOME_BEFORE_RUN,
  });
}
