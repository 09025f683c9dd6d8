import { z } from 'zod';
import * as fs from 'fs';
import * as path from 'path';
import type { InvalidConfigurationError, Result } from '../core/result.js';
import { formatZodIssues, invalidConfiguration, ok } from '../core/result.js';

const unitInterval = z.number().min(0).max(1);

export const MemoryConfigSchema = z.object({
  stmCapacity: z.number().int().positive().default(7),
  ltmCapacity: z.number().int().positive().default(1000),
  promotionThreshold: unitInterval.default(0.5),
  defaultImportance: unitInterval.default(0.5),
  similarLimit: z.number().int().positive().default(5),
  reinforceFactor: z.number().positive().default(1.2),
  reinforceWindow: z.number().int().nonnegative().default(3),
});

export const RegistryConfigSchema = z.object({
  maxStreamLength: z.number().int().nonnegative().default(100),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('warn'),
  colors: z.boolean().default(true),
});

export const ConfigSchema = z.object({
  version: z.number().default(1),
  memory: MemoryConfigSchema.default({}),
  registry: RegistryConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type MemoryConfig = z.infer<typeof MemoryConfigSchema>;
export type MemoryConfigInput = z.input<typeof MemoryConfigSchema>;
export type RegistryConfig = z.infer<typeof RegistryConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

export const CONFIG_FILE = 'substrate.config.json';

export function defaultConfig(): Config {
  return ConfigSchema.parse({});
}

export function resolveConfigPath(configPath?: string, cwd: string = process.cwd()): string {
  return path.resolve(cwd, configPath ?? CONFIG_FILE);
}

export function parseConfig(raw: unknown): Result<Config, InvalidConfigurationError> {
  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    return invalidConfiguration('Invalid configuration', formatZodIssues(parsed.error));
  }
  return ok(parsed.data);
}

/**
 * Load settings from disk. A missing file means defaults; a file that cannot
 * be parsed or fails validation is reported, never replaced.
 */
export function loadConfig(configPath?: string): Result<Config, InvalidConfigurationError> {
  const file = resolveConfigPath(configPath);

  if (!fs.existsSync(file)) {
    return ok(defaultConfig());
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return invalidConfiguration(`Cannot read configuration at ${file}`, [reason]);
  }

  return parseConfig(raw);
}

export function writeDefaultConfig(
  configPath?: string,
  force: boolean = false
): Result<string, InvalidConfigurationError> {
  const file = resolveConfigPath(configPath);

  if (fs.existsSync(file) && !force) {
    return invalidConfiguration(`Configuration already exists at ${file}. Use --force to overwrite.`);
  }

  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, JSON.stringify(defaultConfig(), null, 2) + '\n');
  return ok(file);
}

export function getConfigValue(config: Config, key: string): unknown {
  let current: unknown = config;
  for (const k of key.split('.')) {
    if (typeof current !== 'object' || current === null) {
      return undefined;
    }
    current = (current as Record<string, unknown>)[k];
  }
  return current;
}
