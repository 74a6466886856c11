import { Inject, Injectable, Logger } from '@nestjs/common';
import { eq, lt, sql } from 'drizzle-orm';
import { Settings, SETTINGS } from '../../config/settings';
import { DAY_MS } from '../../common/utils/date.util';
import { sha256Hex } from '../../common/utils/text.util';
import { DatabaseService } from '../../database/database.service';
import { cacheEntries } from '../../database/schema';

export interface CacheStats {
  entries: number;
  expired: number;
  totalHits: number;
  avgHitsPerEntry: number;
}

@Injectable()
export class LlmCacheService {
  private readonly logger = new Logger(LlmCacheService.name);

  constructor(
    private readonly database: DatabaseService,
    @Inject(SETTINGS) private readonly settings: Settings,
  ) {}

  generateKey(text: string, operation: string, model: string): string {
    return sha256Hex(`${operation}:${model || 'default'}:${text}`);
  }

  get(cacheKey: string, now: Date = new Date()): unknown {
    const { db } = this.database;
    const entry = db
      .select()
      .from(cacheEntries)
      .where(eq(cacheEntries.cacheKey, cacheKey))
      .get();
    if (!entry || entry.expiresAt <= now.toISOString()) {
      return null;
    }

    db.update(cacheEntries)
      .set({ hitCount: sql`${cacheEntries.hitCount} + 1` })
      .where(eq(cacheEntries.id, entry.id))
      .run();
    this.logger.debug(
      `cache hit: key=${cacheKey.slice(0, 8)} op=${entry.operation}`,
    );
    return entry.response;
  }

  set(
    cacheKey: string,
    operation: string,
    model: string,
    response: unknown,
    now: Date = new Date(),
  ): void {
    const expiresAt = new Date(
      now.getTime() + this.settings.cacheTtlDays * DAY_MS,
    ).toISOString();

    this.database.db
      .insert(cacheEntries)
      .values({ cacheKey, operation, model, response, expiresAt })
      .onConflictDoUpdate({
        target: cacheEntries.cacheKey,
        set: { response, model, expiresAt },
      })
      .run();
  }

  /**
   * Returns a cached value for (operation, model, text) when present and valid,
   * otherwise computes, stores and returns it. Null results are not cached.
   */
  async remember<T>(
    params: { operation: string; model: string; text: string },
    parse: (value: unknown) => T | null,
    compute: () => Promise<T | null>,
  ): Promise<T | null> {
    if (!this.settings.llmCacheEnabled) {
      return compute();
    }

    const key = this.generateKey(params.text, params.operation, params.model);
    const cached = parse(this.get(key));
    if (cached != null) {
      return cached;
    }

    const fresh = await compute();
    if (fresh != null) {
      this.set(key, params.operation, params.model, fresh);
    }
    return fresh;
  }

  clearExpired(now: Date = new Date()): number {
    const result = this.database.db
      .delete(cacheEntries)
      .where(lt(cacheEntries.expiresAt, now.toISOString()))
      .run();
    this.logger.log(`cache cleanup done: removed=${result.changes}`);
    return result.changes;
  }

  getStats(now: Date = new Date()): CacheStats {
    const rows = this.database.db
      .select({
        expiresAt: cacheEntries.expiresAt,
        hitCount: cacheEntries.hitCount,
      })
      .from(cacheEntries)
      .all();
    const nowIso = now.toISOString();
    const totalHits = rows.reduce((sum, row) => sum + row.hitCount, 0);
    return {
      entries: rows.length,
      expired: rows.filter((row) => row.expiresAt <= nowIso).length,
      totalHits,
      avgHitsPerEntry: rows.length ? Number(
        (totalHits / rows.length).toFixed(2),
      ) : 0,
    };
  }
}
