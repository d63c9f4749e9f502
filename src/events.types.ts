export enum MetricKind {
  GAUGE = 'gauge',
  COUNTER = 'counter',
}

/**
 * An event as produced by the upstream monitoring pipeline. `service` names
 * the metric, `host` is its source and `time` is expressed in seconds.
 */
export interface MonitoringEvent {
  readonly service: string;
  readonly host?: string;
  readonly metric?: number;
  readonly time: number;
  readonly state?: string;
  readonly description?: string;
  readonly endTime?: number;
}

export interface Measurement {
  name: string;
  source?: string;
  value: number;
  measureTime: number;
}

export interface AnnotationFields {
  title: string;
  source?: string;
  description?: string;
  startTime: number;
  endTime?: number;
}

export interface Annotation extends AnnotationFields {
  name: string;
}

export interface AnnotationRecord {
  id: number;
  [field: string]: unknown;
}
