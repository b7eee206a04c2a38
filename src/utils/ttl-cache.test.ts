import { TtlCache } from './ttl-cache';

describe('TtlCache', () => {
  let now: number;
  let cache: TtlCache<string>;

  beforeEach(() => {
    now = 1_000;
    cache = new TtlCache<string>(500, () => now);
  });

  // Test: Fresh entry is returned
  it('should return a value stored within the TTL', () => {
    cache.set('route', 'assessment');
    now += 499;

    expect(cache.get('route')).toBe('assessment');
  });

  // Test: Expired entry is treated as absent and evicted on read
  it('should drop an entry once the TTL has elapsed', () => {
    cache.set('route', 'assessment');
    now += 500;

    expect(cache.size).toBe(1);
    expect(cache.get('route')).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  // Test: Overwriting refreshes the timestamp
  it('should restart the TTL when a key is set again', () => {
    cache.set('route', 'first');
    now += 400;
    cache.set('route', 'second');
    now += 400;

    expect(cache.get('route')).toBe('second');
  });

  // Test: Keys that are never read again do not pile up
  it('should sweep expired entries on write', () => {
    // Arrange
    cache.set('old-route', 'stale');
    now += 300;
    cache.set('recent-route', 'fresh');
    now += 200;

    // Act
    cache.set('new-route', 'newest');

    // Assert
    expect(cache.size).toBe(2);
    expect(cache.get('recent-route')).toBe('fresh');
    expect(cache.get('old-route')).toBeUndefined();
  });

  it('should return undefined for unknown keys', () => {
    expect(cache.get('missing')).toBeUndefined();
  });
});
