import {
  type AnnotationFields,
  type AnnotationRecord,
  type Measurement,
  type MetricKind,
  type MonitoringEvent,
} from './events.types';

export interface IMetricsDispatcher {
  start: () => void;
  stop: () => void;
  awaitTermination: () => Promise<void>;
  conflictsWith: (other: unknown) => boolean;
  submit: (
    kind: MetricKind,
    events: MonitoringEvent | readonly MonitoringEvent[]
  ) => Promise<Measurement>;
  annotate: (event: MonitoringEvent) => Promise<AnnotationRecord>;
  startAnnotation: (event: MonitoringEvent) => Promise<AnnotationRecord>;
  endAnnotation: (event: MonitoringEvent) => Promise<unknown>;
}

/**
 * Performs the network calls on behalf of the dispatcher. Implementations
 * reject (or throw) on failure. The dispatcher logs and drops a failed batch;
 * retrying is up to the sender, which knows which part was delivered.
 */
export interface RemoteSender {
  sendBatch: (gauges: Measurement[], counters: Measurement[]) => Promise<unknown>;
  createAnnotation: (name: string, fields: AnnotationFields) => Promise<AnnotationRecord>;
  updateAnnotation: (
    name: string,
    id: number,
    fields: Partial<AnnotationFields>
  ) => Promise<unknown>;
}

export interface DispatcherOptions {
  threads?: number;
  queueSize?: number;
  maxItems?: number;
}

export interface DispatcherConfig {
  threads: number;
  queueSize: number;
  maxItems: number;
}

export interface RetryConfig {
  retryCount: number;
  retryDelayMillis: number;
}

export interface QueuedItem {
  kind: MetricKind;
  payload: Measurement;
}

export type Batch = Map<MetricKind, Measurement[]>;
