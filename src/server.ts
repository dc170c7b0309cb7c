/**
 * Node entry point
 */

import { serve } from '@hono/node-server';
import { createApp } from './index';
import { loadConfig } from './lib/config';
import { logger } from './lib/logger';

const config = loadConfig();
logger.level = config.LOG_LEVEL;

const app = createApp(config);

serve({ fetch: app.fetch, port: config.PORT, hostname: config.HOST }, (info) => {
  logger.info(
    { port: info.port, address: info.address, techniques: config.TECHNIQUES },
    'Metadata extraction server listening'
  );
});
