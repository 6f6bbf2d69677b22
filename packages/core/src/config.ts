/**
 * Configuration Management
 * Loads and validates configuration from environment variables
 */

import { z } from "zod";
import "dotenv/config";
import { ConfigError } from "./errors.js";

const envSchema = z.object({
  // Supabase
  SUPABASE_URL: z.string().url().optional(),
  SUPABASE_KEY: z.string().optional(),

  // Scoring
  SCORING_REFERENCE_YEAR: z.coerce.number().int().min(1900).max(3000).optional(),

  // General
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
});

export type BaseEnv = z.infer<typeof envSchema>;

/**
 * Base configuration - shared by every package
 */
export interface BaseConfig {
  supabase?: {
    url: string;
    key: string;
  };

  scoring: {
    /** Year used as "now" when computing years since the last study */
    referenceYear?: number;
  };

  env: {
    logLevel: "debug" | "info" | "warn" | "error";
    nodeEnv: "development" | "production" | "test";
  };
}

let baseConfigInstance: BaseConfig | null = null;

/**
 * Load and validate configuration from an environment map
 */
export function loadBaseConfig(source: NodeJS.ProcessEnv = process.env): BaseConfig {
  const parseResult = envSchema.safeParse(source);

  if (!parseResult.success) {
    const errors = parseResult.error.issues
      .map((e) => `  - ${e.path.join(".")}: ${e.message}`)
      .join("\n");
    throw new ConfigError(`Configuration validation failed:\n${errors}`, {
      variables: parseResult.error.issues.map((e) => e.path.join(".")),
    });
  }

  const env = parseResult.data;

  return {
    supabase: env.SUPABASE_URL && env.SUPABASE_KEY
      ? {
          url: env.SUPABASE_URL,
          key: env.SUPABASE_KEY,
        }
      : undefined,

    scoring: {
      referenceYear: env.SCORING_REFERENCE_YEAR,
    },

    env: {
      logLevel: env.LOG_LEVEL,
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
