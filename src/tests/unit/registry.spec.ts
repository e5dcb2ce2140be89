import { describe, expect, it } from 'vitest';

import type { Processor } from '../../processors/types.js';

import { RecognizerError } from '../../errors.js';
import { CalculationProcessor } from '../../processors/calculation-processor.js';
import { ProcessorRegistry, createDefaultRegistry } from '../../processors/registry.js';
import { TextProcessor } from '../../processors/text-processor.js';

const oracle = { classification: () => Promise.resolve('abc') };

const fixedProcessor = (name: string, output: string): Processor => ({
  name,
  process: () => Promise.resolve(output),
});

describe('ProcessorRegistry', () => {
  it('registers the built-in types', () => {
    const registry = createDefaultRegistry(oracle);
    expect(registry.knownTypes()).toEqual(['text', 'calculation']);
    expect(registry.resolve('text')).toBeInstanceOf(TextProcessor);
    expect(registry.resolve('calculation')).toBeInstanceOf(CalculationProcessor);
  });

  it('replaces an existing registration', async () => {
    const registry = createDefaultRegistry(oracle);
    registry.register('text', fixedProcessor('custom', 'XYZ'));
    expect(registry.knownTypes()).toEqual(['text', 'calculation']);
    expect(await registry.resolve('text').process(Buffer.alloc(1), {})).toBe('XYZ');
  });

  it('accepts new challenge types', () => {
    const registry = new ProcessorRegistry();
    registry.register('slider', fixedProcessor('slider', '42'));
    expect(registry.has('slider')).toBe(true);
    expect(registry.unregister('slider')).toBe(true);
    expect(registry.has('slider')).toBe(false);
  });

  it('rejects unknown types with the registered list', () => {
    const registry = createDefaultRegistry(oracle);
    try {
      registry.resolve('audio');
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(RecognizerError);
      if (e instanceof RecognizerError) {
        expect(e.code).toBe(3000);
        expect(e.message).toBe('Unsupported captcha type: audio');
        expect(e.details).toEqual({ requestedType: 'audio', knownTypes: ['text', 'calculation'] });
      }
    }
  });

  it('rejects blank type tags', () => {
    expect(() => new ProcessorRegistry().register('  ', fixedProcessor('x', 'y'))).toThrow('Challenge type must be a non-empty string');
  });
});
