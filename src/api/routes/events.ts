import { Hono } from 'hono';
import type { Runtime } from '../../services/runtime';
import { jsonRespond } from '../utils/respond';

// Committed strategy events from the JSON log, oldest first. `?type=` filters by event type.
export function eventsRoute(runtime: Runtime) {
  const route = new Hono();

  route.get('/', async (c) => {
    const type = c.req.query('type');
    const events = await runtime.store.readAll();
    const filtered = type ? events.filter((e) => e.event.type === type) : events;
    return jsonRespond(c, { count: filtered.length, events: filtered });
  });

  return route;
}
