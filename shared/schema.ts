import { z } from "zod";

// Environment flags arrive as strings; only "true"/"1" switch them on
const booleanFlag = z
  .union([z.boolean(), z.string()])
  .transform((value) => value === true || value === "true" || value === "1");

export const connectionSettingsSchema = z.object({
  path: z.string().min(1).optional(),
  baudRate: z.coerce.number().int().positive().default(115200),
  openTimeoutMs: z.coerce.number().int().positive().default(1000),
  settleMs: z.coerce.number().int().nonnegative().default(2000),
});

export const motionSettingsSchema = z.object({
  stepSize: z.coerce.number().positive().finite().default(0.005),
  batchSize: z.coerce.number().int().positive().default(20),
  // 0 waits forever
  readyTimeoutMs: z.coerce.number().int().nonnegative().default(60000),
  commandTimeoutMs: z.coerce.number().int().nonnegative().default(120000),
});

export const appConfigSchema = z.object({
  connection: connectionSettingsSchema,
  motion: motionSettingsSchema,
  patternDir: z.string().min(1).default("./theta_rho_files"),
  homeBeforeRun: booleanFlag.default(false),
});

// Bare command tokens such as HOME; no arguments, no whitespace
export const commandNameSchema = z
  .string()
  .regex(/^[A-Za-z][A-Za-z0-9_]*$/, "Command must be a single bare token");

// Export types
export type ConnectionSettings = z.infer<typeof connectionSettingsSchema>;
export type MotionSettings = z.infer<typeof motionSettingsSchema>;
export type AppConfig = z.infer<typeof appConfigSchema>;
