/**
 * @bastion/account — Configuration.
 *
 * Loads and validates policy constants from environment variables using Zod.
 */

import { AddressSchema } from "@bastion/types";
import type { Address } from "@bastion/types";
import { pino } from "pino";
import type { Logger } from "pino";
import { z } from "zod";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z
  .object({
    LOG_LEVEL: z
      .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
      .default("info"),
    NODE_ENV: z
      .enum(["development", "production", "test"])
      .default("development"),

    // Delegation policy
    DELEGATION_MIN_DURATION_SECONDS: z.coerce.number().int().min(1).default(3600),
    DELEGATION_MAX_DURATION_SECONDS: z.coerce.number().int().min(1).default(31536000),

    // Recovery
    EMERGENCY_DELAY_SECONDS: z.coerce.number().int().min(1).default(2592000),
    DEFAULT_RECOVERY_DELAY_SECONDS: z.coerce.number().int().min(1).default(172800),

    // Outer dispatcher
    ENTRY_POINT_ADDRESS: AddressSchema.optional(),
  })
  .refine((c) => c.DELEGATION_MIN_DURATION_SECONDS <= c.DELEGATION_MAX_DURATION_SECONDS, {
    message: "must not exceed DELEGATION_MAX_DURATION_SECONDS",
    path: ["DELEGATION_MIN_DURATION_SECONDS"],
  });

export type AppConfig = z.infer<typeof ConfigSchema>;

/**
 * Options the components take, derived from configuration.
 */
export interface BastionPolicy {
  readonly delegation: {
    readonly minDuration: number;
    readonly maxDuration: number;
  };
  readonly emergencyDelay: number;
  readonly defaultRecoveryDelay: number;
  readonly entryPoint: Address | undefined;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}

export function toPolicy(config: AppConfig): BastionPolicy {
  return {
    delegation: {
      minDuration: config.DELEGATION_MIN_DURATION_SECONDS,
      maxDuration: config.DELEGATION_MAX_DURATION_SECONDS,
    },
    emergencyDelay: config.EMERGENCY_DELAY_SECONDS,
    defaultRecoveryDelay: config.DEFAULT_RECOVERY_DELAY_SECONDS,
    entryPoint: config.ENTRY_POINT_ADDRESS,
  };
}

/**
 * Root logger; pretty-printed in development.
 */
export function createLogger(config: AppConfig): Logger {
  return pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });
}
