import { serve } from '@hono/node-server';
import { createApp } from './api/server';
import { getConfig } from './config/env';
import { logger } from './utils/logger';

const { PORT: port } = getConfig();
const app = createApp();

serve({ fetch: app.fetch, port }, (info) => {
  logger.info(`Leveraged strategy engine (Node+Hono) listening on port ${info.port}`);
});
