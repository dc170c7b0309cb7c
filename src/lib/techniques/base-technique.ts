/**
 * Shared building blocks for extraction techniques
 */

import type { CheerioAPI } from 'cheerio';
import type { Category, CategoryMap, Technique, TechniqueContext } from '../../types';
import { getOwn, setOwn } from '../own-record';

/**
 * Base class for techniques. Instances are created per extraction call,
 * so anything stored on `this` lives for one document only.
 */
export abstract class BaseTechnique implements Technique {
  abstract readonly name: string;

  constructor(protected readonly context: TechniqueContext) {}

  abstract extract(html: string, $: CheerioAPI): CategoryMap;

  /**
   * Append a candidate, creating the category list on first use
   */
  protected add(output: Record<Category, string[]>, category: Category, value: string): void {
    const list = getOwn(output, category);
    if (list) {
      list.push(value);
    } else {
      setOwn(output, category, [value]);
    }
  }
}

/**
 * Maps namespaced <meta> keys (og:title, twitter:image, ...) to categories.
 * One candidate per matching element, in document order.
 */
export abstract class MetaTagTechnique extends BaseTechnique {
  protected abstract readonly keyMap: Readonly<Record<string, Category>>;

  /** Attributes holding the key, checked in order */
  protected readonly keyAttributes: readonly string[] = ['property', 'name'];

  extract(_html: string, $: CheerioAPI): CategoryMap {
    const output: Record<Category, string[]> = {};

    $('meta').each((_, element) => {
      const meta = $(element);
      const content = meta.attr('content');
      if (content === undefined) return;

      for (const attribute of this.keyAttributes) {
        const key = meta.attr(attribute)?.trim().toLowerCase();
        if (!key) continue;

        const category = getOwn(this.keyMap, key);
        if (category !== undefined) {
          this.add(output, category, content);
          return;
        }
      }
    });

    return output;
  }
}
