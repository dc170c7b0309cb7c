/**
 * Main Hono application
 * Exposes the extraction pipeline over HTTP
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import type { AppConfig } from './lib/config';
import { ConfigurationError, MalformedInputError, TechniqueFailure } from './lib/errors';
import { createExtractor, type Extractor } from './lib/extractor';
import { logExtraction, logRequest, logger } from './lib/logger';
import { setOwn } from './lib/own-record';
import { extractRequestSchema } from './lib/validators';

export function createApp(
  config: AppConfig,
  extractor: Extractor = createExtractor({ techniques: config.TECHNIQUES })
) {
  const app = new Hono();
  const schema = extractRequestSchema(config.MAX_HTML_LENGTH);

  // CORS middleware
  app.use(
    '*',
    cors({
      origin: config.ALLOWED_ORIGINS === '*' ? '*' : config.ALLOWED_ORIGINS.split(','),
    })
  );

  // Request logging middleware
  app.use('*', async (c, next) => {
    const start = Date.now();
    await next();

    logRequest({
      method: c.req.method,
      path: c.req.path,
      statusCode: c.res.status,
      responseTime: Date.now() - start,
      userAgent: c.req.header('user-agent'),
      origin: c.req.header('origin'),
    });
  });

  app.get('/health', (c) => {
    return c.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.get('/techniques', (c) => {
    return c.json({ techniques: extractor.techniques, available: extractor.availableTechniques() });
  });

  app.post('/extract', async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json({ error: 'Request body must be valid JSON' }, 400);
    }

    const parseResult = schema.safeParse(body);
    if (!parseResult.success) {
      const firstError = parseResult.error.issues[0];
      const errorMessage = firstError ? firstError.message : 'Invalid request body';
      return c.json({ error: errorMessage }, 400);
    }

    const { html, url } = parseResult.data;

    try {
      const start = Date.now();
      const result = extractor.extract(html, url);

      const candidates: Record<string, number> = {};
      for (const category of result.categories()) {
        setOwn(candidates, category, result.values(category).length);
      }
      logExtraction({
        sourceUrl: result.sourceUrl,
        techniques: extractor.techniques,
        candidates,
        duration: Date.now() - start,
      });

      return c.json(result.toJSON(), 200);
    } catch (error) {
      if (error instanceof MalformedInputError) {
        return c.json({ error: error.message, code: error.code }, 400);
      }
      if (error instanceof TechniqueFailure) {
        logger.warn({ err: error, technique: error.technique }, 'Technique failed');
        return c.json({ error: error.message, code: error.code }, 422);
      }
      if (error instanceof ConfigurationError) {
        logger.error({ err: error, technique: error.technique }, 'Extractor misconfigured');
        return c.json({ error: error.message, code: error.code }, 500);
      }
      logger.error({ err: error }, 'Error processing extraction request');
      return c.json({ error: 'Internal server error' }, 500);
    }
  });

  return app;
}
