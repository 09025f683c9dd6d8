import type { CognitiveModule, CognitiveState, Feedback, ModuleResponse } from './module.js';
import type { InvalidConfigurationError, Result } from './result.js';
import { invalidConfiguration, ok } from './result.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';

export const DEFAULT_MAX_STREAM_LENGTH = 100;

export interface RegistryOptions {
  maxStreamLength?: number;
  logger?: Logger;
}

export interface RegistryStatus {
  modules: Array<{ name: string; state: CognitiveState }>;
  streamLength: number;
}

/**
 * Holds named modules and routes input to them. Every response produced
 * through `dispatch` lands in a bounded response stream, oldest dropped first.
 */
export class ModuleRegistry {
  private modules = new Map<string, CognitiveModule>();
  private responses: ModuleResponse[] = [];
  private maxStreamLength: number;
  private logger: Logger;

  constructor(options: RegistryOptions = {}) {
    this.maxStreamLength = Math.max(0, options.maxStreamLength ?? DEFAULT_MAX_STREAM_LENGTH);
    this.logger = options.logger ?? silentLogger;
  }

  register(module: CognitiveModule): Result<void, InvalidConfigurationError> {
    if (this.modules.has(module.name)) {
      return invalidConfiguration(`Module already registered: ${module.name}`);
    }

    this.modules.set(module.name, module);
    this.logger.debug('Registered module', { name: module.name });
    return ok(undefined);
  }

  unregister(name: string): boolean {
    return this.modules.delete(name);
  }

  get(name: string): CognitiveModule | undefined {
    return this.modules.get(name);
  }

  names(): string[] {
    return [...this.modules.keys()];
  }

  dispatch(
    input: unknown,
    target?: string
  ): Result<ModuleResponse[], InvalidConfigurationError> {
    let recipients: CognitiveModule[];

    if (target !== undefined) {
      const module = this.modules.get(target);
      if (!module) {
        return invalidConfiguration(`Unknown module: ${target}`);
      }
      recipients = [module];
    } else {
      recipients = [...this.modules.values()];
    }

    const produced = recipients.map((module) => module.process(input));
    for (const response of produced) {
      this.record(response);
    }

    return ok(produced);
  }

  broadcastFeedback(feedback: Feedback): void {
    for (const module of this.modules.values()) {
      module.update(feedback);
    }
  }

  stream(): ModuleResponse[] {
    return [...this.responses];
  }

  clearStream(): void {
    this.responses = [];
  }

  status(): RegistryStatus {
    return {
      modules: [...this.modules.values()].map((m) => ({ name: m.name, state: m.state })),
      streamLength: this.responses.length,
    };
  }

  private record(response: ModuleResponse): void {
    this.responses.push(response);
    if (this.responses.length > this.maxStreamLength) {
      this.responses.splice(0, this.responses.length - this.maxStreamLength);
    }
  }
}
