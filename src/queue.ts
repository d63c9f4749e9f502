import type * as rx from 'rxjs';

import { type Batch, type QueuedItem } from './dispatcher.types';
import { type StopSignal } from './rxjs.utils';

interface Taker<T> {
  resolve: (item: T | undefined) => void;
}

interface Putter<T> {
  item: T;
  resolve: () => void;
}

/**
 * Bounded FIFO shared by producers and workers. `put` waits while the queue is
 * full and `take` waits while it is empty; neither drops items.
 */
export class BatchQueue<T extends object> {
  private readonly items: T[] = [];
  private readonly takers: Array<Taker<T>> = [];
  private readonly putters: Array<Putter<T>> = [];

  constructor(public readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  public get size(): number {
    return this.items.length + this.putters.length;
  }

  public async put(item: T): Promise<void> {
    const taker = this.takers.shift();
    if (taker !== undefined) {
      taker.resolve(item);
      return;
    }

    if (this.items.length < this.capacity) {
      this.items.push(item);
      return;
    }

    await new Promise<void>((resolve) => {
      this.putters.push({ item, resolve });
    });
  }

  public poll(): T | undefined {
    const item = this.items.shift();
    if (item !== undefined) {
      this.admitPutter();
    }
    return item;
  }

  /**
   * Resolves with the oldest item, waiting for one if needed. Resolves with
   * `undefined` if `stop` fires before an item arrives.
   */
  public async take(stop?: StopSignal): Promise<T | undefined> {
    const item = this.poll();
    if (item !== undefined) return item;
    if (stop?.isSet === true) return undefined;

    return await new Promise<T | undefined>((resolve) => {
      let subscription: rx.Subscription | undefined;
      const taker: Taker<T> = {
        resolve: (value) => {
          subscription?.unsubscribe();
          resolve(value);
        },
      };
      this.takers.push(taker);

      subscription = stop?.stopped$.subscribe(() => {
        const index = this.takers.indexOf(taker);
        if (index >= 0) this.takers.splice(index, 1);
        resolve(undefined);
      });
    });
  }

  private admitPutter(): void {
    const putter = this.putters.shift();
    if (putter !== undefined) {
      this.items.push(putter.item);
      putter.resolve();
    }
  }
}

/**
 * Waits for the first item of a batch, then takes up to `maxItems - 1` more
 * items that are already queued, grouped by kind. Resolves with `undefined`
 * only when `stop` ends the wait for the first item.
 */
export async function drainAndCollate(
  queue: BatchQueue<QueuedItem>,
  maxItems: number,
  stop?: StopSignal
): Promise<Batch | undefined> {
  const first = await queue.take(stop);
  if (first === undefined) return undefined;

  const batch: Batch = new Map([[first.kind, [first.payload]]]);
  for (let n = 1; n < maxItems; n++) {
    const next = queue.poll();
    if (next === undefined) break;

    const payloads = batch.get(next.kind);
    if (payloads === undefined) {
      batch.set(next.kind, [next.payload]);
    } else {
      payloads.push(next.payload);
    }
  }
  return batch;
}

export function batchSize(batch: Batch): number {
  let size = 0;
  batch.forEach((payloads) => (size += payloads.length));
  return size;
}
