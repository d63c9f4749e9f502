import { type RemoteSender } from './dispatcher.types';
import {
  type AnnotationFields,
  type AnnotationRecord,
  type Measurement,
} from './events.types';
import { sleep } from './utils';

export async function waitFor(condition: () => boolean, timeoutMillis = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMillis;
  while (!condition()) {
    if (Date.now() > deadline) {
      throw new Error(`Condition not met within ${timeoutMillis}ms`);
    }
    await sleep(5);
  }
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

/** In-process stand-in for the metrics service. */
export class FakeSender implements RemoteSender {
  private nextId = 1;

  public readonly sendBatch = jest.fn<Promise<unknown>, [Measurement[], Measurement[]]>(
    async () => await Promise.resolve(undefined)
  );

  public readonly createAnnotation = jest.fn<Promise<AnnotationRecord>, [string, AnnotationFields]>(
    async () => await Promise.resolve({ id: this.nextId++ })
  );

  public readonly updateAnnotation = jest.fn<
    Promise<unknown>,
    [string, number, Partial<AnnotationFields>]
  >(async () => await Promise.resolve({ updated: true }));

  /** Every measurement received so far, gauges and counters alike. */
  public get received(): Measurement[] {
    return this.sendBatch.mock.calls.flatMap(([gauges, counters]) => [...gauges, ...counters]);
  }
}
