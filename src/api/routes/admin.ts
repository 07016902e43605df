import { Hono } from 'hono';
import type { Runtime } from '../../services/runtime';
import { jsonRespond } from '../utils/respond';
import { describeStrategy } from './strategy';

export function adminRoute(runtime: Runtime) {
  const route = new Hono();

  // Rebuild the demo world and clear the event log.
  route.post('/reset', async (c) => {
    const world = await runtime.reset();
    return jsonRespond(c, { ok: true, strategy: describeStrategy(world) });
  });

  return route;
}
