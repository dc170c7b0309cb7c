/**
 * Fallback techniques that read document structure instead of metadata
 */

import type { CheerioAPI } from 'cheerio';
import type { Category, CategoryMap } from '../../types';
import { BaseTechnique } from './base-technique';

function normalizeText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Headings (h1 before h2 before h3), paragraphs and images anywhere in the page
 */
export class SemanticTagsTechnique extends BaseTechnique {
  readonly name: string = 'semantic-tags';

  protected readonly textSelectors: ReadonlyArray<readonly [Category, string]> = [
    ['titles', 'h1'],
    ['titles', 'h2'],
    ['titles', 'h3'],
    ['descriptions', 'p'],
  ];

  protected readonly attributeSelectors: ReadonlyArray<readonly [Category, string, string]> = [
    ['images', 'img', 'src'],
  ];

  extract(_html: string, $: CheerioAPI): CategoryMap {
    const output: Record<Category, string[]> = {};

    for (const [category, selector] of this.textSelectors) {
      $(selector).each((_, element) => {
        const text = normalizeText($(element).text());
        if (text) this.add(output, category, text);
      });
    }

    for (const [category, selector, attribute] of this.attributeSelectors) {
      $(selector).each((_, element) => {
        const value = $(element).attr(attribute)?.trim();
        if (value) this.add(output, category, value);
      });
    }

    return output;
  }
}

/**
 * Same idea scoped to <article> elements, plus embedded video sources
 */
export class Html5SemanticTagsTechnique extends SemanticTagsTechnique {
  readonly name: string = 'html5-semantic-tags';

  protected readonly textSelectors: ReadonlyArray<readonly [Category, string]> = [
    ['titles', 'article h1'],
    ['descriptions', 'article p'],
  ];

  protected readonly attributeSelectors: ReadonlyArray<readonly [Category, string, string]> = [
    ['images', 'article img', 'src'],
    ['videos', 'article video', 'src'],
    ['videos', 'article video source', 'src'],
  ];
}
