/**
 * Markup parsing, the one capability the pipeline borrows from outside
 */

import * as cheerio from 'cheerio';
import { MalformedInputError } from './errors';

export function parseHtml(markup: string): cheerio.CheerioAPI {
  if (markup.trim() === '') {
    throw new MalformedInputError('Markup must be a non-empty string');
  }

  try {
    return cheerio.load(markup);
  } catch (error) {
    throw new MalformedInputError('Markup could not be parsed', { cause: error });
  }
}
