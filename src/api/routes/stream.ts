import { Hono } from 'hono';
import { streamSSE } from 'hono/streaming';
import { subscribe } from '../../services/eventBus';
import type { Runtime } from '../../services/runtime';
import { reasonOf } from '../../domain/errors';
import { logger, stringifyWithBigInt } from '../../utils/logger';
import { describeStrategy } from './strategy';

export function streamRoute(runtime: Runtime) {
  const route = new Hono();

  // Server-sent events: one snapshot, then every committed strategy event.
  route.get('/', (c) =>
    streamSSE(c, async (stream) => {
      await stream.writeSSE({ event: 'snapshot', data: stringifyWithBigInt(describeStrategy(runtime.world())) });

      const unsub = subscribe((evt) => {
        stream.writeSSE({ event: evt.type, data: stringifyWithBigInt(evt.data) }).catch((err: unknown) => {
          logger.warn(`sse write failed: ${reasonOf(err)}`);
        });
      });

      // Keep the stream open until the client disconnects
      await new Promise<void>((resolve) => {
        c.req.raw.signal.addEventListener('abort', () => resolve(), { once: true });
      });
      unsub();
    }),
  );

  return route;
}
