import type { StrategyEvent } from '../domain/types';
import { reasonOf } from '../domain/errors';
import { logger } from '../utils/logger';

export type BusEvent =
  | { type: 'strategy'; timestamp: string; data: StrategyEvent }
  | { type: 'reset'; timestamp: string; data: { strategy: string } };

type Subscriber = (evt: BusEvent) => void;

const subscribers = new Set<Subscriber>();

export function subscribe(fn: Subscriber): () => void {
  subscribers.add(fn);
  return () => subscribers.delete(fn);
}

export function emit(evt: BusEvent): void {
  for (const fn of subscribers) {
    try {
      fn(evt);
    } catch (err) {
      logger.error(`event subscriber failed on ${evt.type}: ${reasonOf(err)}`);
    }
  }
}

export function emitStrategyEvent(data: StrategyEvent): void {
  emit({ type: 'strategy', timestamp: new Date().toISOString(), data });
}
