import { describe, it, expect } from 'vitest';
import { Extracted, DEFAULT_TEXT_TYPES } from '../lib/extracted';

function build(values: Record<string, string[]>, sourceUrl?: string | null) {
  return new Extracted({ values: new Map(Object.entries(values)), sourceUrl });
}

describe('Extracted', () => {
  it('returns the first candidate through singular accessors', () => {
    const result = build({
      titles: ['First', 'Second'],
      descriptions: ['Desc'],
      images: ['https://example.com/a.png'],
      urls: ['https://example.com/'],
    });

    expect(result.title).toBe('First');
    expect(result.description).toBe('Desc');
    expect(result.image).toBe('https://example.com/a.png');
    expect(result.url).toBe('https://example.com/');
    expect(result.titles).toEqual(['First', 'Second']);
  });

  it('returns null and empty lists for missing categories', () => {
    const result = build({});
    expect(result.title).toBeNull();
    expect(result.images).toEqual([]);
    expect(result.values('anything')).toEqual([]);
    expect(result.singular('not-configured')).toBeNull();
  });

  it('returns null for an empty candidate list', () => {
    expect(build({ titles: [] }).title).toBeNull();
  });

  it('does not treat Object.prototype members as accessors', () => {
    expect(build({ titles: ['x'] }).singular('toString')).toBeNull();
  });

  it('keeps categories no accessor points at as unexpected values', () => {
    const result = build({ titles: ['T'], tags: ['a', 'b'], feeds: ['/rss'] });
    expect(result.unexpectedValues).toEqual({ tags: ['a', 'b'], feeds: ['/rss'] });
    expect(result.categories()).toEqual(['titles', 'tags', 'feeds']);
  });

  it('copies and freezes candidate lists', () => {
    const titles = ['Original'];
    const result = new Extracted({ values: new Map([['titles', titles]]) });
    titles.push('Added later');

    expect(result.titles).toEqual(['Original']);
    expect(Object.isFrozen(result.titles)).toBe(true);
  });

  it('defaults the text types and the source URL', () => {
    const result = build({});
    expect(result.textTypes).toEqual(DEFAULT_TEXT_TYPES);
    expect(result.accessors()).toEqual(['title', 'description', 'image', 'url']);
    expect(result.sourceUrl).toBeNull();
  });

  it('uses a custom accessor mapping', () => {
    const result = new Extracted({
      values: new Map([
        ['titles', ['T']],
        ['dates', ['2024-01-15']],
      ]),
      textTypes: { title: 'titles', date: 'dates' },
    });

    expect(result.singular('date')).toBe('2024-01-15');
    expect(result.description).toBeNull();
    expect(result.unexpectedValues).toEqual({});
  });

  it('serializes an accessor named __proto__', () => {
    const result = new Extracted({
      values: new Map([['titles', ['T']]]),
      textTypes: { ['__proto__']: 'titles' },
    });

    expect(result.singular('__proto__')).toBe('T');
    expect(JSON.stringify(result)).toBe('{"sourceUrl":null,"values":{"titles":["T"]},"__proto__":"T"}');
  });

  it('serializes accessors, values and the source URL', () => {
    const result = build({ titles: ['T'], tags: ['x'] }, 'https://example.com/');

    expect(result.toJSON()).toEqual({
      sourceUrl: 'https://example.com/',
      title: 'T',
      description: null,
      image: null,
      url: null,
      values: { titles: ['T'], tags: ['x'] },
    });
    expect(JSON.parse(JSON.stringify(result))).toEqual(result.toJSON());
  });
});
