import { describe, it, expect } from 'vitest';
import { loadConfig } from '../lib/config';

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig({})).toEqual({
      PORT: 3000,
      HOST: '0.0.0.0',
      ALLOWED_ORIGINS: '*',
      LOG_LEVEL: 'info',
      TECHNIQUES: ['opengraph'],
      MAX_HTML_LENGTH: 5_000_000,
    });
  });

  it('parses the technique list and numeric values', () => {
    const config = loadConfig({
      PORT: '8080',
      TECHNIQUES: ' opengraph, twitter-card ,,head-tags ',
      MAX_HTML_LENGTH: '1000',
      LOG_LEVEL: 'debug',
    });

    expect(config.PORT).toBe(8080);
    expect(config.TECHNIQUES).toEqual(['opengraph', 'twitter-card', 'head-tags']);
    expect(config.MAX_HTML_LENGTH).toBe(1000);
    expect(config.LOG_LEVEL).toBe('debug');
  });

  it('rejects an empty technique list', () => {
    expect(() => loadConfig({ TECHNIQUES: ' , ' })).toThrow(
      'Invalid configuration for TECHNIQUES: TECHNIQUES must name at least one technique'
    );
  });

  it('rejects an out-of-range port', () => {
    expect(() => loadConfig({ PORT: '70000' })).toThrow(/Invalid configuration for PORT/);
  });
});
