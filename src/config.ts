import {
  type DispatcherConfig,
  type DispatcherOptions,
  type RetryConfig,
} from './dispatcher.types';
import { ConfigError } from './model';
import { type LibratoSenderConfig } from './sender';

export const DEFAULT_THREADS = 4;
export const DEFAULT_QUEUE_SIZE = 1000;
export const NO_RETRY: RetryConfig = { retryCount: 0, retryDelayMillis: 0 };

export function resolveDispatcherConfig(options: DispatcherOptions = {}): DispatcherConfig {
  const threads = positiveInteger('threads', options.threads ?? DEFAULT_THREADS);
  const queueSize = positiveInteger('queueSize', options.queueSize ?? DEFAULT_QUEUE_SIZE);
  const maxItems = positiveInteger(
    'maxItems',
    options.maxItems ?? Math.max(1, Math.floor(queueSize / threads))
  );

  return { threads, queueSize, maxItems };
}

export function resolveRetryConfig(retryConfig: RetryConfig = NO_RETRY): RetryConfig {
  if (!Number.isInteger(retryConfig.retryCount) || retryConfig.retryCount < 0) {
    throw new ConfigError(`retryCount must be a non-negative integer, got ${retryConfig.retryCount}`);
  }
  if (!Number.isFinite(retryConfig.retryDelayMillis) || retryConfig.retryDelayMillis < 0) {
    throw new ConfigError(
      `retryDelayMillis must be a non-negative number, got ${retryConfig.retryDelayMillis}`
    );
  }
  return retryConfig;
}

export interface HostConfig {
  dispatcher: DispatcherOptions;
  sender: LibratoSenderConfig;
}

/** Reads the settings of a host process from environment variables. */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): HostConfig {
  const user = env.LIBRATO_USER;
  const apiKey = env.LIBRATO_API_KEY;
  if (user === undefined || user === '' || apiKey === undefined || apiKey === '') {
    throw new ConfigError('LIBRATO_USER and LIBRATO_API_KEY must be set');
  }

  return {
    dispatcher: {
      threads: numberFrom(env, 'DISPATCHER_THREADS'),
      queueSize: numberFrom(env, 'DISPATCHER_QUEUE_SIZE'),
      maxItems: numberFrom(env, 'DISPATCHER_MAX_ITEMS'),
    },
    sender: {
      user,
      apiKey,
      baseUrl: env.LIBRATO_BASE_URL === '' ? undefined : env.LIBRATO_BASE_URL,
    },
  };
}

function positiveInteger(name: string, value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigError(`${name} must be a positive integer, got ${value}`);
  }
  return value;
}

function numberFrom(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;

  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new ConfigError(`${name} must be a number, got "${raw}"`);
  }
  return value;
}
