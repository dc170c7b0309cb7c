/**
 * Technique registry
 * Maps technique identifiers to factories so configuration can name
 * techniques as strings without any runtime lookup by module path.
 */

import type { TechniqueFactory } from '../types';
import { ConfigurationError } from './errors';
import { HeadTagsTechnique } from './techniques/head-tags';
import { JsonLdTechnique } from './techniques/json-ld';
import { OpenGraphTechnique } from './techniques/opengraph';
import { Html5SemanticTagsTechnique, SemanticTagsTechnique } from './techniques/semantic-tags';
import { TwitterCardTechnique } from './techniques/twitter-card';

export const BUILTIN_TECHNIQUES: Readonly<Record<string, TechniqueFactory>> = Object.freeze({
  opengraph: (context) => new OpenGraphTechnique(context),
  'twitter-card': (context) => new TwitterCardTechnique(context),
  'head-tags': (context) => new HeadTagsTechnique(context),
  'json-ld': (context) => new JsonLdTechnique(context),
  'html5-semantic-tags': (context) => new Html5SemanticTagsTechnique(context),
  'semantic-tags': (context) => new SemanticTagsTechnique(context),
});

export class TechniqueRegistry {
  private readonly factories = new Map<string, TechniqueFactory>();

  constructor(initial: Readonly<Record<string, TechniqueFactory>> = {}) {
    for (const [id, factory] of Object.entries(initial)) {
      this.register(id, factory);
    }
  }

  register(id: string, factory: TechniqueFactory): this {
    if (!id.trim()) {
      throw new ConfigurationError(id, 'Technique identifier must be a non-empty string');
    }
    if (this.factories.has(id)) {
      throw new ConfigurationError(id, `Technique "${id}" is already registered`);
    }
    this.factories.set(id, factory);
    return this;
  }

  has(id: string): boolean {
    return this.factories.has(id);
  }

  ids(): string[] {
    return [...this.factories.keys()];
  }

  resolve(id: string): TechniqueFactory {
    const factory = this.factories.get(id);
    if (!factory) {
      throw new ConfigurationError(id);
    }
    return factory;
  }

  /**
   * Resolve every identifier up front; the first unknown one throws
   */
  resolveAll(ids: readonly string[]): Array<{ id: string; factory: TechniqueFactory }> {
    return ids.map((id) => ({ id, factory: this.resolve(id) }));
  }
}

/**
 * A fresh registry holding the built-in techniques
 */
export function createTechniqueRegistry(): TechniqueRegistry {
  return new TechniqueRegistry(BUILTIN_TECHNIQUES);
}
