import {
  BadRequestException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { and, desc, eq, lte, max } from 'drizzle-orm';
import { DatabaseService } from '../../database/database.service';
import {
  Edition,
  editions,
  EditionStats,
  editionStats,
  EditionStatus,
  NewEdition,
} from '../../database/schema';
import { canTransition } from '../utils/edition-status.util';

export type StatsDelta = Partial<
  Pick<
    EditionStats,
    | 'sentCount'
    | 'deliveredCount'
    | 'openedCount'
    | 'clickedCount'
    | 'unsubscribedCount'
    | 'bouncedCount'
    | 'complainedCount'
  >
>;

function rate(part: number, total: number): number {
  return total > 0 ? Number(((part / total) * 100).toFixed(2)) : 0;
}

@Injectable()
export class EditionsService {
  private readonly logger = new Logger(EditionsService.name);

  constructor(private readonly database: DatabaseService) {}

  get(id: number): Edition {
    const edition = this.database.db
      .select()
      .from(editions)
      .where(eq(editions.id, id))
      .get();
    if (!edition) {
      throw new NotFoundException(`edition ${id} not found`);
    }
    return edition;
  }

  listForNewsletter(newsletterId: number, limit = 50): Edition[] {
    return this.database.db
      .select()
      .from(editions)
      .where(eq(editions.newsletterId, newsletterId))
      .orderBy(desc(editions.editionNumber))
      .limit(limit)
      .all();
  }

  create(values: Omit<NewEdition, 'editionNumber'>): Edition {
    return this.database.transaction(() => {
      const row = this.database.db
        .select({ value: max(editions.editionNumber) })
        .from(editions)
        .where(eq(editions.newsletterId, values.newsletterId))
        .get();
      const edition = this.database.db
        .insert(editions)
        .values({ ...values, editionNumber: (row?.value ?? 0) + 1 })
        .returning()
        .get();
      this.database.db
        .insert(editionStats)
        .values({ editionId: edition.id })
        .run();
      return edition;
    });
  }

  /** Moves the edition forward; backward or skipping moves are rejected. */
  transition(
    id: number,
    to: EditionStatus,
    extra: Partial<Pick<Edition, 'sentAt' | 'scheduledFor'>> = {},
  ): Edition {
    const edition = this.get(id);
    if (!canTransition(edition.status, to)) {
      throw new BadRequestException(
        `edition ${id} cannot move from ${edition.status} to ${to}`,
      );
    }

    this.logger.log(`edition status: id=${id} from=${edition.status} to=${to}`);
    return this.database.db
      .update(editions)
      .set({ status: to, ...extra, updatedAt: new Date().toISOString() })
      .where(eq(editions.id, id))
      .returning()
      .get();
  }

  schedule(id: number, sendAt: Date): Edition {
    const edition = this.get(id);
    if (edition.status === 'scheduled') {
      return this.database.db
        .update(editions)
        .set({
          scheduledFor: sendAt.toISOString(),
          updatedAt: new Date().toISOString(),
        })
        .where(eq(editions.id, id))
        .returning()
        .get();
    }
    return this.transition(id, 'scheduled', {
      scheduledFor: sendAt.toISOString(),
    });
  }

  dueScheduled(now: Date = new Date()): Edition[] {
    return this.database.db
      .select()
      .from(editions)
      .where(
        and(
          eq(editions.status, 'scheduled'),
          eq(editions.testMode, false),
          lte(editions.scheduledFor, now.toISOString()),
        ),
      )
      .orderBy(editions.scheduledFor)
      .all();
  }

  getStats(editionId: number): EditionStats {
    const existing = this.database.db
      .select()
      .from(editionStats)
      .where(eq(editionStats.editionId, editionId))
      .get();
    if (existing) {
      return existing;
    }
    this.get(editionId);
    return this.database.db
      .insert(editionStats)
      .values({ editionId })
      .returning()
      .get();
  }

  /** Adds to the counters and recomputes open and click rates. */
  incrementStats(editionId: number, delta: StatsDelta): EditionStats {
    const current = this.getStats(editionId);
    const next = {
      sentCount: current.sentCount + (delta.sentCount ?? 0),
      deliveredCount: current.deliveredCount + (delta.deliveredCount ?? 0),
      openedCount: current.openedCount + (delta.openedCount ?? 0),
      clickedCount: current.clickedCount + (delta.clickedCount ?? 0),
      unsubscribedCount: current.unsubscribedCount + (
        delta.unsubscribedCount ?? 0
      ),
      bouncedCount: current.bouncedCount + (delta.bouncedCount ?? 0),
      complainedCount: current.complainedCount + (delta.complainedCount ?? 0),
    };
    return this.database.db
      .update(editionStats)
      .set({
        ...next,
        openRate: rate(next.openedCount, next.sentCount),
        clickRate: rate(next.clickedCount, next.sentCount),
        updatedAt: new Date().toISOString(),
      })
      .where(eq(editionStats.id, current.id))
      .returning()
      .get();
  }
}
