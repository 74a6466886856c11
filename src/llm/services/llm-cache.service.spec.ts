import { Logger } from '@nestjs/common';
import { createTestDatabase, testSettings } from '../../database/testing';
import { LlmCacheService } from './llm-cache.service';

describe('LlmCacheService', () => {
  const settings = testSettings({ CACHE_TTL_DAYS: '7' });
  let cache: LlmCacheService;

  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'debug').mockImplementation(() => undefined);
    cache = new LlmCacheService(createTestDatabase(settings), settings);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('keys on operation, model and text', () => {
    const a = cache.generateKey('text', 'summary', 'm1');
    expect(a).toHaveLength(64);
    expect(cache.generateKey('text', 'summary', 'm2')).not.toBe(a);
    expect(cache.generateKey('text', 'classify', 'm1')).not.toBe(a);
    expect(cache.generateKey('text', 'summary', 'm1')).toBe(a);
  });

  it('short-circuits compute for a live entry and counts hits', async () => {
    const compute = jest.fn(async () => 'fresh');
    const parse = (value: unknown) => (
      typeof value === 'string' ? value : null
    );
    const params = { operation: 'summary', model: 'm1', text: 'body' };

    await expect(cache.remember(params, parse, compute)).resolves.toBe('fresh');
    await expect(cache.remember(params, parse, compute)).resolves.toBe('fresh');

    expect(compute).toHaveBeenCalledTimes(1);
    expect(cache.getStats()).toEqual({
      entries: 1,
      expired: 0,
      totalHits: 1,
      avgHitsPerEntry: 1,
    });
  });

  it('ignores and clears expired entries', () => {
    const past = new Date(Date.now() - 8 * 24 * 3600 * 1000);
    cache.set('k1', 'summary', 'm1', 'old', past);
    cache.set('k2', 'summary', 'm1', 'new');

    expect(cache.get('k1')).toBeNull();
    expect(cache.get('k2')).toBe('new');
    expect(cache.clearExpired()).toBe(1);
    expect(cache.getStats().entries).toBe(1);
  });

  it('does not store null results', async () => {
    const compute = jest.fn(async () => null);
    const parse = (value: unknown) => (
      typeof value === 'string' ? value : null
    );

    await cache.remember(
      { operation: 'title', model: 'm', text: 't' },
      parse,
      compute,
    );
    await cache.remember(
      { operation: 'title', model: 'm', text: 't' },
      parse,
      compute,
    );

    expect(compute).toHaveBeenCalledTimes(2);
  });
});
