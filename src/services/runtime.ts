import { reasonOf } from '../domain/errors';
import { EventStore } from '../persistence/eventStore';
import { logger } from '../utils/logger';
import { emit, emitStrategyEvent } from './eventBus';
import { createWorld, type World, type WorldOptions } from './world';

export interface Runtime {
  readonly store: EventStore;
  world(): World;
  reset(): Promise<World>;
}

// Holds the live demo world and forwards its committed events to the bus and the event log.
export function createRuntime(options: { store?: EventStore; world?: WorldOptions } = {}): Runtime {
  const store = options.store ?? new EventStore();
  let current: World | null = null;

  function build(): World {
    const world = createWorld(options.world);
    world.strategy.onEvent((event) => {
      emitStrategyEvent(event);
      store.append(event).catch((err: unknown) => {
        logger.error(`failed to persist ${event.type} event: ${reasonOf(err)}`);
      });
    });
    return world;
  }

  return {
    store,
    world() {
      if (!current) current = build();
      return current;
    },
    async reset() {
      await store.clear();
      current = build();
      emit({ type: 'reset', timestamp: new Date().toISOString(), data: { strategy: current.strategy.address } });
      logger.info('demo world reset');
      return current;
    },
  };
}
