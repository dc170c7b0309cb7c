/**
 * OpenGraph meta tags (og:title, og:description, og:image, og:url)
 */

import type { Category } from '../../types';
import { MetaTagTechnique } from './base-technique';

export const OPENGRAPH_KEYS: Readonly<Record<string, Category>> = Object.freeze({
  'og:title': 'titles',
  'og:description': 'descriptions',
  'og:image': 'images',
  'og:image:url': 'images',
  'og:image:secure_url': 'images',
  'og:url': 'urls',
});

export class OpenGraphTechnique extends MetaTagTechnique {
  readonly name: string = 'opengraph';
  protected readonly keyMap = OPENGRAPH_KEYS;
}
