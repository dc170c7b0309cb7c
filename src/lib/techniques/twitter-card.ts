/**
 * Twitter card meta tags
 */

import type { Category } from '../../types';
import { MetaTagTechnique } from './base-technique';

export const TWITTER_CARD_KEYS: Readonly<Record<string, Category>> = Object.freeze({
  'twitter:title': 'titles',
  'twitter:description': 'descriptions',
  'twitter:image': 'images',
  'twitter:image:src': 'images',
  'twitter:url': 'urls',
});

export class TwitterCardTechnique extends MetaTagTechnique {
  readonly name: string = 'twitter-card';
  protected readonly keyMap = TWITTER_CARD_KEYS;
  protected readonly keyAttributes: readonly string[] = ['name', 'property'];
}
