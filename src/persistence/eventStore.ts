import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname, resolve } from 'path';
import { z } from 'zod';
import type { StrategyEvent } from '../domain/types';
import { getConfig } from '../config/env';
import { stringifyWithBigInt } from '../utils/logger';

export interface StoredEvent {
  sequence: number;
  timestamp: string;
  event: Record<string, unknown>; // bigints as decimal strings
}

const StoredEventSchema = z.object({
  sequence: z.number().int().nonnegative(),
  timestamp: z.string(),
  event: z.record(z.unknown()),
});

const StoredEventsSchema = z.array(StoredEventSchema);

// Append-only JSON log of committed strategy events.
export class EventStore {
  private readonly path: string;
  private queue: Promise<void> = Promise.resolve();

  constructor(path: string = getConfig().EVENTS_PATH) {
    this.path = resolve(process.cwd(), path);
  }

  get location(): string {
    return this.path;
  }

  // Waits for queued appends first.
  async readAll(): Promise<StoredEvent[]> {
    await this.queue;
    return this.load();
  }

  private async load(): Promise<StoredEvent[]> {
    let raw: string;
    try {
      raw = await readFile(this.path, 'utf8');
    } catch (err) {
      if (isMissingFile(err)) return [];
      throw err;
    }
    return StoredEventsSchema.parse(JSON.parse(raw || '[]'));
  }

  // Writes are serialised so concurrent appends never interleave.
  append(event: StrategyEvent): Promise<StoredEvent> {
    const result = this.queue.then(async () => {
      const events = await this.load();
      const stored: StoredEvent = {
        sequence: events.length,
        timestamp: new Date().toISOString(),
        event: StoredEventSchema.shape.event.parse(JSON.parse(stringifyWithBigInt(event))),
      };
      events.push(stored);
      await this.write(events);
      return stored;
    });
    this.queue = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  async clear(): Promise<void> {
    await this.queue;
    await this.write([]);
  }

  private async write(events: StoredEvent[]): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    await writeFile(this.path, JSON.stringify(events, null, 2), 'utf8');
  }
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
