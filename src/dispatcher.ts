import { AnnotationRegistry } from './annotations';
import { resolveDispatcherConfig } from './config';
import {
  type Batch,
  type DispatcherConfig,
  type DispatcherOptions,
  type IMetricsDispatcher,
  type QueuedItem,
  type RemoteSender,
} from './dispatcher.types';
import {
  type AnnotationRecord,
  type Measurement,
  MetricKind,
  type MonitoringEvent,
} from './events.types';
import { loggerFor } from './logger';
import { Failure, type Result, ShapingError, Success } from './model';
import { batchSize, BatchQueue, drainAndCollate } from './queue';
import { StopSignal } from './rxjs.utils';
import { eventToAnnotation, eventToMeasurement } from './shaping';
import { round } from './utils';

const logger = loggerFor('dispatcher');

/**
 * Buffers measurements in a bounded queue and forwards them in batches to a
 * `RemoteSender` from a pool of concurrent workers.
 *
 * Each `start()` spawns a new generation of workers bound to its own
 * `StopSignal`. A worker drains a batch, sends it, and only then checks its
 * signal, so `stop()` never interrupts a send in flight. Workers waiting for
 * the next item when the signal fires exit without taking one.
 */
export class MetricsDispatcher implements IMetricsDispatcher {
  public readonly config: DispatcherConfig;

  private readonly queue: BatchQueue<QueuedItem>;
  private readonly annotations = new AnnotationRegistry();
  // worker promise -> generation
  private readonly workers = new Map<Promise<void>, number>();

  private stopSignal: StopSignal | undefined;
  private generation = 0;

  constructor(
    private readonly sender: RemoteSender,
    options: DispatcherOptions = {}
  ) {
    this.config = resolveDispatcherConfig(options);
    this.queue = new BatchQueue<QueuedItem>(this.config.queueSize);
  }

  public get isRunning(): boolean {
    return this.stopSignal !== undefined;
  }

  public get activeWorkers(): number {
    return this.workers.size;
  }

  /** Items buffered and not yet drained by a worker. */
  public get pending(): number {
    return this.queue.size;
  }

  public start(): void {
    if (this.stopSignal !== undefined) return;

    const signal = new StopSignal(++this.generation);
    this.stopSignal = signal;
    logger.info(
      'Starting %d workers (generation %d, maxItems %d)',
      this.config.threads,
      signal.generation,
      this.config.maxItems
    );

    for (let id = 1; id <= this.config.threads; id++) {
      const worker: Promise<void> = this.runWorker(id, signal).finally(() => {
        this.workers.delete(worker);
      });
      this.workers.set(worker, signal.generation);
    }
  }

  public stop(): void {
    const signal = this.stopSignal;
    if (signal === undefined) return;

    logger.info('Stopping workers of generation %d', signal.generation);
    signal.set();
    this.stopSignal = undefined;
  }

  /**
   * Resolves once every worker of the stopped generations has exited, that is
   * once their in-flight sends are done. Workers of a running generation are
   * not waited for.
   */
  public async awaitTermination(): Promise<void> {
    const running = this.stopSignal?.generation;
    const stopping = [...this.workers]
      .filter(([, generation]) => generation !== running)
      .map(([worker]) => worker);
    await Promise.all(stopping);
  }

  public conflictsWith(other: unknown): boolean {
    return other instanceof MetricsDispatcher;
  }

  public async submit(
    kind: MetricKind,
    events: MonitoringEvent | readonly MonitoringEvent[]
  ): Promise<Measurement> {
    const list: readonly MonitoringEvent[] = isEventList(events) ? events : [events];
    if (list.length === 0) {
      throw new ShapingError('No events to submit');
    }

    const payloads = list.map(eventToMeasurement);
    for (const payload of payloads) {
      await this.queue.put({ kind, payload });
    }
    return payloads[payloads.length - 1];
  }

  public async gauge(events: MonitoringEvent | readonly MonitoringEvent[]): Promise<Measurement> {
    return await this.submit(MetricKind.GAUGE, events);
  }

  public async counter(events: MonitoringEvent | readonly MonitoringEvent[]): Promise<Measurement> {
    return await this.submit(MetricKind.COUNTER, events);
  }

  public async annotate(event: MonitoringEvent): Promise<AnnotationRecord> {
    const { name, ...fields } = eventToAnnotation(event);
    return await this.sender.createAnnotation(name, fields);
  }

  public async startAnnotation(event: MonitoringEvent): Promise<AnnotationRecord> {
    const record = await this.annotate(event);
    this.annotations.remember(event, record.id);
    return record;
  }

  public async endAnnotation(event: MonitoringEvent): Promise<unknown> {
    const { name } = eventToAnnotation(event);
    const id = this.annotations.release(event);
    if (id === undefined) return undefined;

    return await this.sender.updateAnnotation(name, id, { endTime: round(event.time) });
  }

  private async runWorker(id: number, signal: StopSignal): Promise<void> {
    logger.debug('Worker %d of generation %d started', id, signal.generation);

    for (;;) {
      const batch = await drainAndCollate(this.queue, this.config.maxItems, signal);
      if (batch === undefined) break;

      let result: Result;
      try {
        result = await this.sendBatch(batch);
      } catch (err: unknown) {
        result = toFailure(err, batchSize(batch));
      }
      if (result instanceof Success) {
        logger.debug('Success! %d events sent by worker %d', result.events, id);
      } else {
        logger.error('Failure! worker %d dropped %d events: %s', id, result.events, result.reason);
      }

      if (signal.isSet) break;
    }

    logger.debug('Worker %d of generation %d exited', id, signal.generation);
  }

  private async sendBatch(batch: Batch): Promise<Result> {
    const events = batchSize(batch);
    await this.sender.sendBatch(
      batch.get(MetricKind.GAUGE) ?? [],
      batch.get(MetricKind.COUNTER) ?? []
    );
    return new Success(events);
  }
}

function isEventList(
  events: MonitoringEvent | readonly MonitoringEvent[]
): events is readonly MonitoringEvent[] {
  return Array.isArray(events);
}

function toFailure(err: unknown, events: number): Failure {
  if (err instanceof Failure) return err;
  const reason = err instanceof Error ? err.message : String(err);
  return new Failure(`Unexpected error sending events: ${reason}`, events);
}
