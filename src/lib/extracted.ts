/**
 * Extraction result
 * Merged candidate lists per category plus first-or-null accessors
 */

import type { Category, ExtractedJson, TextTypes } from '../types';
import { getOwn, setOwn } from './own-record';

export const DEFAULT_TEXT_TYPES: TextTypes = Object.freeze({
  title: 'titles',
  description: 'descriptions',
  image: 'images',
  url: 'urls',
});

export interface ExtractedInit {
  values: ReadonlyMap<Category, readonly string[]>;
  sourceUrl?: string | null;
  textTypes?: TextTypes;
}

export class Extracted {
  public readonly sourceUrl: string | null;
  public readonly textTypes: TextTypes;
  private readonly lists: ReadonlyMap<Category, readonly string[]>;

  constructor(init: ExtractedInit) {
    const lists = new Map<Category, readonly string[]>();
    for (const [category, candidates] of init.values) {
      lists.set(category, Object.freeze([...candidates]));
    }

    this.lists = lists;
    this.sourceUrl = init.sourceUrl ?? null;
    this.textTypes = Object.freeze({ ...(init.textTypes ?? DEFAULT_TEXT_TYPES) });
  }

  get title(): string | null {
    return this.singular('title');
  }

  get description(): string | null {
    return this.singular('description');
  }

  get image(): string | null {
    return this.singular('image');
  }

  get url(): string | null {
    return this.singular('url');
  }

  get titles(): readonly string[] {
    return this.values('titles');
  }

  get descriptions(): readonly string[] {
    return this.values('descriptions');
  }

  get images(): readonly string[] {
    return this.values('images');
  }

  get urls(): readonly string[] {
    return this.values('urls');
  }

  /**
   * First candidate of the category behind a configured accessor, or null
   * when the accessor is not configured or the category has no candidates
   */
  singular(accessor: string): string | null {
    const category = getOwn(this.textTypes, accessor);
    if (category === undefined) return null;
    return this.values(category)[0] ?? null;
  }

  values(category: Category): readonly string[] {
    return this.lists.get(category) ?? [];
  }

  categories(): Category[] {
    return [...this.lists.keys()];
  }

  accessors(): string[] {
    return Object.keys(this.textTypes);
  }

  /**
   * Lists for categories no configured accessor points at
   */
  get unexpectedValues(): Record<Category, readonly string[]> {
    const known = new Set(Object.values(this.textTypes));
    const unexpected: Record<Category, readonly string[]> = {};
    for (const [category, candidates] of this.lists) {
      if (!known.has(category)) {
        setOwn(unexpected, category, candidates);
      }
    }
    return unexpected;
  }

  toJSON(): ExtractedJson {
    const values: Record<Category, string[]> = {};
    for (const [category, candidates] of this.lists) {
      setOwn(values, category, [...candidates]);
    }

    const json: ExtractedJson = { sourceUrl: this.sourceUrl, values };
    for (const accessor of this.accessors()) {
      if (accessor === 'sourceUrl' || accessor === 'values') continue;
      setOwn<ExtractedJson[string]>(json, accessor, this.singular(accessor));
    }
    return json;
  }
}
