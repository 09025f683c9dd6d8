import type { Config, MemoryConfigInput } from '../config/index.js';
import { loadConfig } from '../config/index.js';
import type { Logger } from '../core/logger.js';
import { createLogger } from '../core/logger.js';
import { ModuleRegistry } from '../core/registry.js';
import type { InvalidConfigurationError, Result } from '../core/result.js';
import { ok } from '../core/result.js';
import { MemorySystemModule } from '../memory/system.js';

export interface RuntimeOptions {
  config?: string;
  verbose?: boolean;
}

export interface Runtime {
  config: Config;
  logger: Logger;
  memory: MemorySystemModule;
  registry: ModuleRegistry;
}

export function createRuntime(
  options: RuntimeOptions,
  overrides: MemoryConfigInput = {}
): Result<Runtime, InvalidConfigurationError> {
  const loaded = loadConfig(options.config);
  if (!loaded.ok) return loaded;

  const config = loaded.value;
  const logger = createLogger({
    level: options.verbose ? 'debug' : config.logging.level,
    colors: config.logging.colors,
  });

  const memory = MemorySystemModule.create({ ...config.memory, ...overrides, logger });
  if (!memory.ok) return memory;

  const registry = new ModuleRegistry({ maxStreamLength: config.registry.maxStreamLength, logger });
  const registered = registry.register(memory.value);
  if (!registered.ok) return registered;

  return ok({ config, logger, memory: memory.value, registry });
}

export function printConfigError(error: InvalidConfigurationError, print: (line: string) => void): void {
  print(error.message);
  for (const issue of error.issues) {
    print(`  ${issue}`);
  }
}
