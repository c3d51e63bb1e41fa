/**
 * Configuration management for llvision
 */

import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';
import { resolve } from 'path';
import { ConfigurationError } from '../errors/index.js';

export const DEFAULT_CAMERA_NAME = 'limelight';
export const DEFAULT_SNAPSHOT_PORT = 5807;

const configSchema = z.object({
  // NT4 server; unset team and server means an in-process table
  networkTables: z.object({
    team: z.coerce.number().int().min(1).max(25599).optional(),
    server: z.string().min(1).optional(),
    port: z.coerce.number().int().min(1).max(65535).optional(),
  }),

  // Camera defaults used by createLimelightFromEnv()
  limelight: z.object({
    name: z.string().default(DEFAULT_CAMERA_NAME),
    snapshotPort: z.coerce.number().int().min(1).max(65535).default(DEFAULT_SNAPSHOT_PORT),
    /**
     * Abort the snapshot request after this many milliseconds.
     * Unset means the HTTP client's own defaults apply.
     */
    snapshotTimeoutMs: z.coerce.number().int().positive().optional(),
  }),
});

export type Config = z.infer<typeof configSchema>;

function loadConfig(): Config {
  // Existing environment variables win over .env entries
  dotenvConfig({ path: resolve(process.cwd(), '.env') });

  const rawConfig = {
    networkTables: {
      team: process.env.NT_TEAM,
      server: process.env.NT_SERVER,
      port: process.env.NT_PORT,
    },

    limelight: {
      name: process.env.LIMELIGHT_NAME,
      snapshotPort: process.env.LIMELIGHT_SNAPSHOT_PORT,
      snapshotTimeoutMs: process.env.LIMELIGHT_SNAPSHOT_TIMEOUT_MS,
    },
  };

  const parsed = configSchema.safeParse(rawConfig);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid configuration: ${parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ')}`
    );
  }
  return parsed.data;
}

// Singleton config instance
let configInstance: Config | null = null;

export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

// For testing - reset config
export function resetConfig(): void {
  configInstance = null;
}

// Validate config without loading (for startup checks)
export function validateConfig(): { valid: boolean; errors?: string[] } {
  try {
    loadConfig();
    return { valid: true };
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return {
        valid: false,
        errors: [error.message],
      };
    }
    throw error;
  }
}
