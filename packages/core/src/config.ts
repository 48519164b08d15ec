/**
 * Configuration Management
 * Loads and validates base configuration from environment variables
 */

import { z } from "zod";
import "dotenv/config";
import { ConfigError } from "./errors.js";
import type { LogFormat, LogLevel } from "./logger.js";

// Base environment schema - shared across all packages
const baseEnvSchema = z.object({
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  LOG_FORMAT: z.enum(["pretty", "json"]).default("pretty"),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
});

export type BaseEnv = z.infer<typeof baseEnvSchema>;

/**
 * Base configuration - shared across all packages
 */
export interface BaseConfig {
  log: {
    level: LogLevel;
    format: LogFormat;
  };

  env: {
    nodeEnv: "development" | "production" | "test";
  };
}

let baseConfigInstance: BaseConfig | null = null;

/**
 * Format zod issues the same way for every config schema
 */
export function formatConfigIssues(error: z.ZodError): string {
  return error.issues
    .map((e) => `  - ${e.path.join(".") || "(root)"}: ${e.message}`)
    .join("\n");
}

/**
 * Load and validate base configuration
 */
export function loadBaseConfig(
  source: Record<string, string | undefined> = process.env
): BaseConfig {
  const parseResult = baseEnvSchema.safeParse(source);

  if (!parseResult.success) {
    throw new ConfigError(
      `Configuration validation failed:\n${formatConfigIssues(parseResult.error)}`,
      { issues: parseResult.error.issues.length }
    );
  }

  const env = parseResult.data;

  return {
    log: {
      level: env.LOG_LEVEL,
      format: env.LOG_FORMAT,
    },
    env: {
      nodeEnv: env.NODE_ENV,
    },
  };
}

/**
 * Get base configuration (lazy-loaded singleton)
 */
export function getBaseConfig(): BaseConfig {
  if (!baseConfigInstance) {
    baseConfigInstance = loadBaseConfig();
  }
  return baseConfigInstance;
}

/**
 * Reset config (for testing)
 */
export function resetBaseConfig(): void {
  baseConfigInstance = null;
}

/**
 * Helper to require environment variable
 */
export function requireEnv(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new ConfigError(`Missing required environment variable: ${name}`, { name });
  }
  return value;
}

/**
 * Helper to get optional environment variable with default
 */
export function getEnv(name: string, defaultValue: string): string {
  return process.env[name] ?? defaultValue;
}
