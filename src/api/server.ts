import { Hono } from 'hono';
import { createRuntime, type Runtime } from '../services/runtime';
import { strategyRoute } from './routes/strategy';
import { eventsRoute } from './routes/events';
import { healthRoute } from './routes/health';
import { streamRoute } from './routes/stream';
import { plansRoute } from './routes/plans';
import { adminRoute } from './routes/admin';
import { jsonRespond, respondError } from './utils/respond';

// Hono app composition. Routes remain thin; all logic lives in services.
export function createApp(runtime: Runtime = createRuntime()) {
  const app = new Hono();
  app.route('/strategy', strategyRoute(runtime));
  app.route('/events', eventsRoute(runtime));
  app.route('/health', healthRoute(runtime));
  app.route('/stream', streamRoute(runtime));
  app.route('/plans', plansRoute(runtime));
  app.route('/admin', adminRoute(runtime));
  app.get('/', (c) => c.redirect('/strategy'));
  app.notFound((c) => jsonRespond(c, { error: 'Not found' }, 404));
  app.onError((err, c) => respondError(c, err));
  return app;
}
