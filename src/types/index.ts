/**
 * Type definitions for the metadata extraction pipeline
 */

import type { CheerioAPI } from 'cheerio';
import type { Logger } from 'pino';

/**
 * A named kind of extractable fact (titles, descriptions, images, urls, ...).
 * The set is open: techniques may report categories nothing else knows about.
 */
export type Category = string;

/**
 * Candidate values per category, in the order a technique found them
 */
export type CategoryMap = Record<Category, readonly string[]>;

/**
 * Singular accessor name -> category, e.g. `title` -> `titles`
 */
export type TextTypes = Readonly<Record<string, Category>>;

/**
 * Configuration a technique instance receives when it is created for a call
 */
export interface TechniqueContext {
  readonly techniques: readonly string[];
  readonly textTypes: TextTypes;
  readonly urlCategories: readonly Category[];
  readonly sourceUrl: string | null;
  readonly logger: Logger;
}

export interface Technique {
  readonly name: string;
  extract(html: string, $: CheerioAPI): CategoryMap;
}

export type TechniqueFactory = (context: TechniqueContext) => Technique;

/**
 * Serialized form of an extraction result
 */
export interface ExtractedJson {
  sourceUrl: string | null;
  values: Record<Category, string[]>;
  [accessor: string]: string | null | Record<Category, string[]>;
}
