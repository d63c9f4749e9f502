import axios, { type AxiosResponse } from 'axios';
import * as rx from 'rxjs';

import { resolveRetryConfig } from './config';
import { type RemoteSender, type RetryConfig } from './dispatcher.types';
import {
  type AnnotationFields,
  type AnnotationRecord,
  type Measurement,
  MetricKind,
} from './events.types';
import { loggerFor } from './logger';
import { Failure } from './model';
import { retryOnError$ } from './rxjs.utils';
import { chunked } from './utils';

const logger = loggerFor('sender');

export const DEFAULT_BASE_URL = 'https://metrics-api.librato.com';
export const DEFAULT_MAX_MEASUREMENTS_PER_REQUEST = 300;

export interface LibratoSenderConfig {
  user: string;
  apiKey: string;
  baseUrl?: string;
  timeoutMillis?: number;
  maxMeasurementsPerRequest?: number;
  /** Retries of a failed metrics request; off by default. */
  retryConfig?: RetryConfig;
}

type TaggedMeasurement = [MetricKind, Measurement];

/** Posts measurements and annotations to the Librato metrics API. */
export class LibratoSender implements RemoteSender {
  private readonly baseUrl: string;
  private readonly maxMeasurementsPerRequest: number;
  private readonly retryConfig: RetryConfig;

  constructor(private readonly config: LibratoSenderConfig) {
    this.baseUrl = (config.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.maxMeasurementsPerRequest =
      config.maxMeasurementsPerRequest ?? DEFAULT_MAX_MEASUREMENTS_PER_REQUEST;
    this.retryConfig = resolveRetryConfig(config.retryConfig);
  }

  public async sendBatch(gauges: Measurement[], counters: Measurement[]): Promise<number> {
    const tagged: TaggedMeasurement[] = [
      ...gauges.map((g): TaggedMeasurement => [MetricKind.GAUGE, g]),
      ...counters.map((c): TaggedMeasurement => [MetricKind.COUNTER, c]),
    ];

    // one request at a time: a chunk is retried on its own and a chunk that
    // still fails stops the rest, so no chunk is ever posted twice
    for (const chunk of chunked(tagged, this.maxMeasurementsPerRequest)) {
      const body = {
        gauges: chunk.filter(([kind]) => kind === MetricKind.GAUGE).map(([, m]) => toWire(m)),
        counters: chunk.filter(([kind]) => kind === MetricKind.COUNTER).map(([, m]) => toWire(m)),
      };
      await this.postWithRetry('/v1/metrics', body, chunk.length);
    }
    return tagged.length;
  }

  public async createAnnotation(name: string, fields: AnnotationFields): Promise<AnnotationRecord> {
    const response = await this.request(
      'post',
      `/v1/annotations/${encodeURIComponent(name)}`,
      annotationToWire(fields),
      1
    );

    const data: unknown = response.data;
    if (!isAnnotationRecord(data)) {
      throw new Failure('Annotation response carries no id', 1);
    }
    return data;
  }

  public async updateAnnotation(
    name: string,
    id: number,
    fields: Partial<AnnotationFields>
  ): Promise<unknown> {
    const response = await this.request(
      'put',
      `/v1/annotations/${encodeURIComponent(name)}/${id}`,
      annotationToWire(fields),
      1
    );
    return response.data;
  }

  private async postWithRetry(path: string, body: object, events: number): Promise<void> {
    const { retryCount, retryDelayMillis } = this.retryConfig;
    const outcome = await rx.lastValueFrom(
      retryOnError$<AxiosResponse | Failure>(
        retryCount,
        retryDelayMillis,
        async () => await this.request('post', path, body, events),
        (err) =>
          err instanceof Failure ? err : new Failure(`Error posting events: ${String(err)}`, events)
      )
    );
    if (outcome instanceof Failure) throw outcome;
  }

  private async request(
    method: 'post' | 'put',
    path: string,
    body: object,
    events: number
  ): Promise<AxiosResponse> {
    const url = `${this.baseUrl}${path}`;
    const options = {
      auth: { username: this.config.user, password: this.config.apiKey },
      headers: { 'Content-Type': 'application/json' },
      timeout: this.config.timeoutMillis ?? 0,
      // error statuses are turned into a Failure below
      validateStatus: () => true,
    };

    let response: AxiosResponse;
    try {
      response = await (method === 'post'
        ? axios.post(url, body, options)
        : axios.put(url, body, options));
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      logger.debug('Runtime error on %s %s: %s', method.toUpperCase(), path, message);
      throw new Failure(`Error posting events: ${message}`, events);
    }

    if (response.status >= 400) {
      logger.debug('Unexpected response on %s %s, got %d', method.toUpperCase(), path, response.status);
      throw new Failure(`Got ${response.status}`, events);
    }
    return response;
  }
}

function toWire(m: Measurement): Record<string, string | number> {
  const wire: Record<string, string | number> = {
    name: m.name,
    value: m.value,
    measure_time: m.measureTime,
  };
  if (m.source !== undefined) wire.source = m.source;
  return wire;
}

function annotationToWire(fields: Partial<AnnotationFields>): Record<string, string | number> {
  const wire: Record<string, string | number> = {};
  if (fields.title !== undefined) wire.title = fields.title;
  if (fields.source !== undefined) wire.source = fields.source;
  if (fields.description !== undefined) wire.description = fields.description;
  if (fields.startTime !== undefined) wire.start_time = fields.startTime;
  if (fields.endTime !== undefined) wire.end_time = fields.endTime;
  return wire;
}

function isAnnotationRecord(data: unknown): data is AnnotationRecord {
  return (
    typeof data === 'object' &&
    data !== null &&
    'id' in data &&
    typeof data.id === 'number'
  );
}
