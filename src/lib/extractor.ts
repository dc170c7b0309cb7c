/**
 * Extraction pipeline
 * Runs the configured techniques in order and merges their candidates
 */

import type { Logger } from 'pino';
import type { Category, TechniqueContext, TextTypes } from '../types';
import { Extracted, DEFAULT_TEXT_TYPES, type ExtractedInit } from './extracted';
import { MalformedInputError } from './errors';
import { parseHtml } from './html-parser';
import { setOwn } from './own-record';
import { logger as defaultLogger } from './logger';
import { createTechniqueRegistry, type TechniqueRegistry } from './technique-registry';
import { parseSourceUrl, resolveUrl } from './url-resolver';

export const DEFAULT_TECHNIQUES: readonly string[] = Object.freeze(['opengraph']);

export const DEFAULT_URL_CATEGORIES: readonly Category[] = Object.freeze(['images', 'urls']);

export type ResultFactory<R extends Extracted> = (init: ExtractedInit) => R;

export interface ExtractorSettings {
  /** Technique identifiers, highest priority first */
  techniques?: readonly string[];
  /** Accessor name -> category for first-or-null accessors on the result */
  textTypes?: TextTypes;
  /** Categories whose relative candidates are resolved against the source URL */
  urlCategories?: readonly Category[];
  registry?: TechniqueRegistry;
  logger?: Logger;
}

export interface ExtractorOptions<R extends Extracted> extends ExtractorSettings {
  createResult: ResultFactory<R>;
}

export class Extractor<R extends Extracted = Extracted> {
  readonly techniques: readonly string[];
  readonly textTypes: TextTypes;
  readonly urlCategories: readonly Category[];
  private readonly registry: TechniqueRegistry;
  private readonly createResult: ResultFactory<R>;
  private readonly logger: Logger;

  constructor(options: ExtractorOptions<R>) {
    this.techniques = Object.freeze([...(options.techniques ?? DEFAULT_TECHNIQUES)]);
    this.textTypes = Object.freeze({ ...(options.textTypes ?? DEFAULT_TEXT_TYPES) });
    this.urlCategories = Object.freeze([...(options.urlCategories ?? DEFAULT_URL_CATEGORIES)]);
    this.registry = options.registry ?? createTechniqueRegistry();
    this.createResult = options.createResult;
    this.logger = (options.logger ?? defaultLogger).child({ component: 'extractor' });
  }

  /**
   * Extract metadata from markup. Relative URLs in URL-bearing categories
   * are resolved only when a source URL is given.
   */
  extract(html: string, sourceUrl?: string | null): R {
    if (typeof html !== 'string' || html.trim() === '') {
      throw new MalformedInputError('Markup must be a non-empty string');
    }
    const baseUrl = parseSourceUrl(sourceUrl);

    const resolved = this.registry.resolveAll(this.techniques);
    const $ = parseHtml(html);

    const accumulated = new Map<Category, string[]>();
    for (const { id, factory } of resolved) {
      const technique = factory(this.createContext(baseUrl));
      const output = technique.extract(html, $);

      const counts: Record<Category, number> = {};
      for (const [category, candidates] of Object.entries(output)) {
        const list = accumulated.get(category);
        if (list) {
          for (const candidate of candidates) list.push(candidate);
        } else {
          accumulated.set(category, [...candidates]);
        }
        setOwn(counts, category, candidates.length);
      }
      this.logger.debug({ technique: id, candidates: counts }, 'Technique finished');
    }

    if (baseUrl !== null) {
      for (const category of this.urlCategories) {
        const list = accumulated.get(category);
        if (list) {
          accumulated.set(
            category,
            list.map((candidate) => resolveUrl(candidate, baseUrl))
          );
        }
      }
    }

    return this.createResult({
      values: accumulated,
      sourceUrl: baseUrl,
      textTypes: this.textTypes,
    });
  }

  /**
   * Identifiers the registry behind this extractor can resolve
   */
  availableTechniques(): string[] {
    return this.registry.ids();
  }

  private createContext(sourceUrl: string | null): TechniqueContext {
    return Object.freeze({
      techniques: this.techniques,
      textTypes: this.textTypes,
      urlCategories: this.urlCategories,
      sourceUrl,
      logger: this.logger,
    });
  }
}

/**
 * Extractor producing the base Extracted result
 */
export function createExtractor(settings: ExtractorSettings = {}): Extractor {
  return new Extractor({
    ...settings,
    createResult: (init) => new Extracted(init),
  });
}
