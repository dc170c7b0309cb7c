/**
 * Plain <head> metadata: <title>, meta description and author,
 * canonical and image_src links, RSS/Atom feed links
 */

import type { CheerioAPI } from 'cheerio';
import type { Category, CategoryMap } from '../../types';
import { getOwn } from '../own-record';
import { BaseTechnique } from './base-technique';

const FEED_TYPES = new Set(['application/rss+xml', 'application/atom+xml']);

const META_NAMES: Readonly<Record<string, Category>> = Object.freeze({
  description: 'descriptions',
  author: 'authors',
});

export class HeadTagsTechnique extends BaseTechnique {
  readonly name: string = 'head-tags';

  extract(_html: string, $: CheerioAPI): CategoryMap {
    const output: Record<Category, string[]> = {};

    $('title').each((_, element) => {
      const title = $(element).text().trim();
      if (title) this.add(output, 'titles', title);
    });

    $('meta[name]').each((_, element) => {
      const name = $(element).attr('name')?.trim().toLowerCase() ?? '';
      const content = $(element).attr('content');
      if (content === undefined) return;

      const category = getOwn(META_NAMES, name);
      if (category) this.add(output, category, content);
    });

    $('link[href]').each((_, element) => {
      const link = $(element);
      const href = link.attr('href') ?? '';
      const rels = (link.attr('rel') ?? '').toLowerCase().split(/\s+/);

      if (rels.includes('canonical')) {
        this.add(output, 'urls', href);
      } else if (rels.includes('image_src')) {
        this.add(output, 'images', href);
      } else if (rels.includes('alternate') && FEED_TYPES.has((link.attr('type') ?? '').toLowerCase())) {
        this.add(output, 'feeds', href);
      }
    });

    return output;
  }
}
