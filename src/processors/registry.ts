import type { ChallengeType, OcrOracle, Processor } from './types.js';

import { invalidParameter, unsupportedCaptchaType } from '../errors.js';

import { CalculationProcessor } from './calculation-processor.js';
import { TextProcessor } from './text-processor.js';

/**
 * Maps challenge-type tags to processors. Registering a type that is
 * already present replaces the previous processor.
 */
export class ProcessorRegistry {
  private readonly processors = new Map<string, Processor>();

  register(type: ChallengeType, processor: Processor): void {
    if (type.trim().length === 0) {
      throw invalidParameter('Challenge type must be a non-empty string', { type });
    }
    this.processors.set(type, processor);
  }

  unregister(type: ChallengeType): boolean {
    return this.processors.delete(type);
  }

  has(type: ChallengeType): boolean {
    return this.processors.has(type);
  }

  resolve(type: ChallengeType): Processor {
    const processor = this.processors.get(type);
    if (processor === undefined) {
      throw unsupportedCaptchaType(type, this.knownTypes());
    }
    return processor;
  }

  knownTypes(): string[] {
    return [...this.processors.keys()];
  }
}

export const registerDefaultProcessors = (registry: ProcessorRegistry, oracle: OcrOracle): ProcessorRegistry => {
  registry.register('text', new TextProcessor(oracle));
  registry.register('calculation', new CalculationProcessor(oracle));
  return registry;
};

export const createDefaultRegistry = (oracle: OcrOracle): ProcessorRegistry =>
  registerDefaultProcessors(new ProcessorRegistry(), oracle);
