import { configFromEnv } from './config';
import { MetricsDispatcher } from './dispatcher';
import { type MonitoringEvent } from './events.types';
import { logger } from './logger';
import { LibratoSender } from './sender';
import { sleep } from './utils';

const main = async (): Promise<void> => {
  const duration = 1000 * 60 * 0.5;
  const config = configFromEnv();

  const dispatcher = new MetricsDispatcher(new LibratoSender(config.sender), config.dispatcher);
  logger.info(
    'Dispatching with %d workers, queue size %d, at most %d items per batch',
    dispatcher.config.threads,
    dispatcher.config.queueSize,
    dispatcher.config.maxItems
  );

  // events submitted before start are buffered, not lost
  await dispatcher.gauge(sample('demo startup', 'demo-host', 1));
  dispatcher.start();

  await dispatcher.startAnnotation({
    service: 'demo run',
    host: 'demo-host',
    state: 'running',
    description: 'simulated load',
    time: Date.now() / 1000,
  });

  // simulate background events
  const emitters: Array<[Generator<MonitoringEvent>, 'gauge' | 'counter', number]> = [
    [eventEmitter('demo cpu'), 'gauge', 200],
    [eventEmitter('demo requests'), 'counter', 150],
    [eventEmitter('demo queue depth'), 'gauge', 100],
  ];

  const timers = emitters.map(([emitter, kind, latency]) => {
    return setInterval(() => {
      const events = Array.from({ length: 50 }, () => emitter.next().value);
      dispatcher[kind](events).catch((err: unknown) => {
        logger.error('Unable to submit events: %s', err);
      });
    }, latency);
  });

  // after a while, stop the dispatcher
  await sleep(duration);
  logger.info('Stopping');
  timers.forEach((timer) => {
    clearInterval(timer);
  });

  await dispatcher.endAnnotation({ service: 'demo run', host: 'demo-host', time: Date.now() / 1000 });
  dispatcher.stop();
  await dispatcher.awaitTermination();
  logger.info('Done! %d events left unsent', dispatcher.pending);
};

function sample(service: string, host: string, metric: number): MonitoringEvent {
  return { service, host, metric, time: Date.now() / 1000 };
}

function* eventEmitter(service: string): Generator<MonitoringEvent, never> {
  let lastValue: number = 1;
  while (true) {
    yield sample(service, 'demo-host', lastValue++);
  }
}

main().catch((err) => {
  logger.error(err);
  process.exitCode = 1;
});
