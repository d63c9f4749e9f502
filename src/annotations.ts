import { type MonitoringEvent } from './events.types';

/**
 * Ids of the annotations opened by `startAnnotation`, keyed by the raw host
 * and service of the event. Reads and writes are synchronous, so concurrent
 * start/end calls interleave only between whole operations.
 */
export class AnnotationRegistry {
  private readonly ids = new Map<string, number>();

  public get size(): number {
    return this.ids.size;
  }

  public remember(event: MonitoringEvent, id: number): void {
    this.ids.set(keyOf(event), id);
  }

  /** Removes and returns the id stored for the event's host and service. */
  public release(event: MonitoringEvent): number | undefined {
    const key = keyOf(event);
    const id = this.ids.get(key);
    this.ids.delete(key);
    return id;
  }
}

function keyOf(event: MonitoringEvent): string {
  return JSON.stringify([event.host ?? null, event.service]);
}
