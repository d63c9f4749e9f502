import { AnnotationRegistry } from './annotations';

describe('annotations.AnnotationRegistry', () => {
  it('releases the id remembered for a host and service once', () => {
    const registry = new AnnotationRegistry();
    registry.remember({ host: 'web-1', service: 'deploy', time: 1 }, 42);

    expect(registry.release({ host: 'web-1', service: 'deploy', time: 9 })).toBe(42);
    expect(registry.release({ host: 'web-1', service: 'deploy', time: 9 })).toBeUndefined();
    expect(registry.size).toBe(0);
  });

  it('keeps the last id when started twice', () => {
    const registry = new AnnotationRegistry();
    registry.remember({ host: 'web-1', service: 'deploy', time: 1 }, 1);
    registry.remember({ host: 'web-1', service: 'deploy', time: 2 }, 2);

    expect(registry.size).toBe(1);
    expect(registry.release({ host: 'web-1', service: 'deploy', time: 3 })).toBe(2);
  });

  it('does not mix up keys that only differ in how host and service split', () => {
    const registry = new AnnotationRegistry();
    registry.remember({ host: 'a b', service: 'c', time: 1 }, 1);
    registry.remember({ host: 'a', service: 'b c', time: 1 }, 2);

    expect(registry.release({ host: 'a b', service: 'c', time: 1 })).toBe(1);
    expect(registry.release({ host: 'a', service: 'b c', time: 1 })).toBe(2);
  });

  it('tells events without a host apart', () => {
    const registry = new AnnotationRegistry();
    registry.remember({ service: 'deploy', time: 1 }, 5);

    expect(registry.release({ host: 'web-1', service: 'deploy', time: 1 })).toBeUndefined();
    expect(registry.release({ service: 'deploy', time: 1 })).toBe(5);
  });
});
