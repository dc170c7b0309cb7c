/**
 * schema.org JSON-LD blocks
 * Flattens arrays and @graph containers, then reads common properties
 */

import type { CheerioAPI } from 'cheerio';
import type { Category, CategoryMap } from '../../types';
import { BaseTechnique } from './base-technique';

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [value];
}

export class JsonLdTechnique extends BaseTechnique {
  readonly name: string = 'json-ld';

  extract(_html: string, $: CheerioAPI): CategoryMap {
    const output: Record<Category, string[]> = {};

    $('script[type="application/ld+json"]').each((_, element) => {
      const jsonText = $(element).html();
      if (!jsonText || !jsonText.trim()) return;

      let parsed: unknown;
      try {
        parsed = JSON.parse(jsonText);
      } catch (error) {
        this.context.logger.debug({ err: error, technique: this.name }, 'Skipping invalid JSON-LD block');
        return;
      }

      for (const item of this.collectItems(parsed)) {
        this.readItem(item, output);
      }
    });

    return output;
  }

  /**
   * Objects in document order, each followed by its @graph members.
   * Walks with an explicit stack so nesting depth is bounded only by JSON.parse.
   */
  private collectItems(root: unknown): JsonObject[] {
    const items: JsonObject[] = [];
    const pending: unknown[] = [root];

    while (pending.length > 0) {
      const value = pending.pop();
      if (Array.isArray(value)) {
        for (let i = value.length - 1; i >= 0; i--) pending.push(value[i]);
      } else if (isJsonObject(value)) {
        items.push(value);
        if (Array.isArray(value['@graph'])) pending.push(value['@graph']);
      }
    }
    return items;
  }

  private readItem(item: JsonObject, output: Record<Category, string[]>): void {
    const headline = item['headline'];
    const name = item['name'];
    if (typeof headline === 'string') {
      this.add(output, 'titles', headline);
    } else if (typeof name === 'string') {
      this.add(output, 'titles', name);
    }

    if (typeof item['description'] === 'string') {
      this.add(output, 'descriptions', item['description']);
    }

    for (const image of asArray(item['image'])) {
      const url = typeof image === 'string' ? image : isJsonObject(image) ? image['url'] : undefined;
      if (typeof url === 'string') this.add(output, 'images', url);
    }

    if (typeof item['url'] === 'string') this.add(output, 'urls', item['url']);

    if (typeof item['datePublished'] === 'string') {
      this.add(output, 'dates', item['datePublished']);
    }

    const keywords = item['keywords'];
    if (typeof keywords === 'string') {
      for (const keyword of keywords.split(',')) {
        const tag = keyword.trim();
        if (tag) this.add(output, 'tags', tag);
      }
    } else if (Array.isArray(keywords)) {
      for (const keyword of keywords) {
        if (typeof keyword === 'string' && keyword.trim()) this.add(output, 'tags', keyword.trim());
      }
    }
  }
}
