export { AnnotationRegistry } from './annotations';
export {
  configFromEnv,
  resolveDispatcherConfig,
  resolveRetryConfig,
  type HostConfig,
} from './config';
export { MetricsDispatcher } from './dispatcher';
export type {
  Batch,
  DispatcherConfig,
  DispatcherOptions,
  IMetricsDispatcher,
  QueuedItem,
  RemoteSender,
  RetryConfig,
} from './dispatcher.types';
export {
  MetricKind,
  type Annotation,
  type AnnotationFields,
  type AnnotationRecord,
  type Measurement,
  type MonitoringEvent,
} from './events.types';
export { logger, loggerFor } from './logger';
export { ConfigError, Failure, ShapingError, Success, type Result } from './model';
export { batchSize, BatchQueue, drainAndCollate } from './queue';
export { StopSignal } from './rxjs.utils';
export { LibratoSender, type LibratoSenderConfig } from './sender';
export { eventToAnnotation, eventToCounter, eventToGauge, safeName } from './shaping';
