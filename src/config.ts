/**
 * Configuration for the memory notes server.
 * Sources, later wins: schema defaults, an optional JSON file, MEMORY_FILE.
 */

import { z } from 'zod';
import { existsSync, readFileSync } from 'fs';
import { resolve } from 'path';
import { logger } from './logger.js';
import { DEFAULT_MEMORY_FILE } from './store.markdown.js';

export const DEFAULT_CONFIG_FILE = 'memory-notes.config.json';

export const ServerConfigSchema = z.object({
  name: z.string().min(1).default('memory-notes-mcp'),
  version: z.string().min(1).default('0.1.0'),
  instructions: z
    .string()
    .optional()
    .default(
      'Long-term memory about the user. Call add_memory when the user shares a preference or a fact about themselves, or asks you to remember something. Call get_memories before answering questions that may depend on what was stored earlier.'
    ),
});

export const StorageConfigSchema = z.object({
  filePath: z.string().min(1).default(DEFAULT_MEMORY_FILE),
});

export const ConfigSchema = z.object({
  server: ServerConfigSchema.default({}),
  storage: StorageConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type StorageConfig = z.infer<typeof StorageConfigSchema>;

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

function readConfigFile(configPath: string): unknown {
  if (!existsSync(configPath)) return {};
  try {
    const raw: unknown = JSON.parse(readFileSync(configPath, 'utf-8'));
    logger.info({ configPath }, 'Configuration file loaded');
    return raw;
  } catch (error) {
    logger.error({ err: error, configPath }, 'Failed to read configuration file, using defaults');
    return {};
  }
}

/**
 * Resolve the effective configuration. An invalid file is logged and ignored
 * rather than failing startup; the storage path comes back absolute.
 */
export function loadConfig(opts: LoadConfigOptions = {}): Config {
  const env = opts.env ?? process.env;
  const cwd = opts.cwd ?? process.cwd();
  const configPath = resolve(cwd, env.MEMORY_CONFIG || DEFAULT_CONFIG_FILE);

  let config: Config;
  const fromFile = ConfigSchema.safeParse(readConfigFile(configPath));
  if (fromFile.success) {
    config = fromFile.data;
  } else {
    logger.error({ configPath, errors: formatIssues(fromFile.error) }, 'Invalid configuration file, using defaults');
    config = ConfigSchema.parse({});
  }

  if (env.MEMORY_FILE) {
    config.storage.filePath = env.MEMORY_FILE;
  }
  config.storage.filePath = resolve(cwd, config.storage.filePath);
  return config;
}

function formatIssues(error: z.ZodError): string[] {
  return error.errors.map((err) => `${err.path.join('.')}: ${err.message}`);
}

/**
 * Validate a configuration object without applying it
 */
export function validateConfig(config: unknown): { valid: boolean; errors?: string[] } {
  const result = ConfigSchema.safeParse(config);
  if (result.success) return { valid: true };
  return { valid: false, errors: formatIssues(result.error) };
}
