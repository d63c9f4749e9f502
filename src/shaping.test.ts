import { type MonitoringEvent } from './events.types';
import { ShapingError } from './model';
import { eventToAnnotation, eventToGauge, safeName } from './shaping';

describe('shaping.safeName', () => {
  it('replaces spaces with periods', () => {
    expect(safeName('api latency p99')).toBe('api.latency.p99');
  });

  it('strips characters outside the allow-list', () => {
    expect(safeName('disk/usage (root)%')).toBe('diskusage.root');
    expect(safeName('a-b_c:d.e')).toBe('a-b_c:d.e');
  });

  it('truncates to 255 characters', () => {
    const name = safeName('x'.repeat(300));
    expect(name).toHaveLength(255);
  });
});

describe('shaping.eventToGauge', () => {
  const event: MonitoringEvent = {
    service: 'cpu user',
    host: 'web 1.example.com',
    metric: 0.42,
    time: 1700000000.6,
  };

  it('preserves name, source, value and time', () => {
    expect(eventToGauge(event)).toEqual({
      name: 'cpu.user',
      source: 'web.1.example.com',
      value: 0.42,
      measureTime: 1700000001,
    });
  });

  it('is deterministic', () => {
    expect(eventToGauge(event)).toEqual(eventToGauge({ ...event }));
  });

  it('omits the source when there is no host', () => {
    expect(eventToGauge({ service: 'queue depth', metric: 3, time: 10 })).toEqual({
      name: 'queue.depth',
      value: 3,
      measureTime: 10,
    });
  });

  it('rejects events without a numeric metric', () => {
    expect(() => eventToGauge({ service: 'cpu', time: 10 })).toThrow(ShapingError);
  });

  it('rejects events whose name sanitizes to nothing', () => {
    expect(() => eventToGauge({ service: '%%%', metric: 1, time: 10 })).toThrow(
      'Service name "%%%" is empty once sanitized'
    );
  });
});

describe('shaping.eventToAnnotation', () => {
  it('builds the title from service and state', () => {
    expect(
      eventToAnnotation({
        service: 'deploy api',
        host: 'build-7',
        state: 'ok',
        description: 'release 12',
        time: 99.4,
        endTime: 120.5,
      })
    ).toEqual({
      name: 'deploy.api',
      title: 'deploy api ok',
      source: 'build-7',
      description: 'release 12',
      startTime: 99,
      endTime: 121,
    });
  });

  it('leaves out absent fields', () => {
    expect(eventToAnnotation({ service: 'www', time: 5 })).toEqual({
      name: 'www',
      title: 'www ',
      startTime: 5,
    });
  });
});
