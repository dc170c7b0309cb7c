import { describe, it, expect } from 'vitest';
import pino from 'pino';
import { TechniqueRegistry, createTechniqueRegistry } from '../lib/technique-registry';
import { ConfigurationError } from '../lib/errors';
import { OpenGraphTechnique } from '../lib/techniques/opengraph';
import { DEFAULT_TEXT_TYPES } from '../lib/extracted';
import type { TechniqueFactory } from '../types';

const noop: TechniqueFactory = () => ({ name: 'noop', extract: () => ({}) });

describe('TechniqueRegistry', () => {
  it('registers the built-in techniques', () => {
    expect(createTechniqueRegistry().ids()).toEqual([
      'opengraph',
      'twitter-card',
      'head-tags',
      'json-ld',
      'html5-semantic-tags',
      'semantic-tags',
    ]);
  });

  it('builds techniques from resolved factories', () => {
    const factory = createTechniqueRegistry().resolve('opengraph');
    const technique = factory({
      techniques: ['opengraph'],
      textTypes: DEFAULT_TEXT_TYPES,
      urlCategories: [],
      sourceUrl: null,
      logger: pino({ level: 'silent' }),
    });
    expect(technique).toBeInstanceOf(OpenGraphTechnique);
    expect(technique.name).toBe('opengraph');
  });

  it('throws ConfigurationError naming an unknown identifier', () => {
    const registry = new TechniqueRegistry();
    expect(() => registry.resolve('custom.missing')).toThrow(ConfigurationError);
    expect(() => registry.resolve('custom.missing')).toThrow('Unknown extraction technique: "custom.missing"');
  });

  it('resolves every identifier before returning', () => {
    const registry = new TechniqueRegistry({ noop });
    expect(registry.resolveAll(['noop', 'noop']).map((entry) => entry.id)).toEqual(['noop', 'noop']);
    expect(() => registry.resolveAll(['noop', 'other'])).toThrow(ConfigurationError);
  });

  it('rejects duplicate and blank identifiers', () => {
    const registry = new TechniqueRegistry({ noop });
    expect(() => registry.register('noop', noop)).toThrow('Technique "noop" is already registered');
    expect(() => registry.register(' ', noop)).toThrow(ConfigurationError);
  });

  it('keeps registries independent', () => {
    const first = createTechniqueRegistry().register('custom', noop);
    const second = createTechniqueRegistry();
    expect(first.has('custom')).toBe(true);
    expect(second.has('custom')).toBe(false);
  });
});
