/**
 * PostgreSQL SubscriptionStore
 *
 * Each mutation is one UPDATE ... WHERE version = expected RETURNING. When
 * no row comes back, a follow-up read explains why (missing, cancelled,
 * version moved, a live claim, or a backwards date).
 *
 * A claim writes claimed_until; findDue and claim both skip rows whose
 * claim is still live, so a run that starts mid-attempt never sees them.
 */

import { and, asc, desc, eq, inArray, isNull, lte, ne, or, sql, type SQL } from 'drizzle-orm';
import { BILLABLE_STATUSES } from '@renewly/shared/constants';
import { compareBillingDates, type BillingDate } from '@renewly/shared/billing';
import type { Database } from '../db';
import { subscriptions } from '../schema';
import { ConflictError, NotFoundError, ValidationError } from '../billing/errors';
import type {
  ClaimLease,
  DueQuery,
  NewSubscription,
  Subscription,
  SubscriptionFilter,
  SubscriptionStore,
  SubscriptionUpdate,
} from '../billing/types';
import { withStorage } from './pg-errors';

type SubscriptionRow = typeof subscriptions.$inferSelect;

function toSubscription(row: SubscriptionRow): Subscription {
  return {
    id: row.id,
    userId: row.userId,
    planId: row.planId,
    status: row.status,
    nextBillingDate: row.nextBillingDate,
    version: row.version,
    trialEndsAt: row.trialEndsAt,
    claimedUntil: row.claimedUntil,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
    cancelledAt: row.cancelledAt,
  };
}

function unclaimed(now: Date): SQL | undefined {
  return or(isNull(subscriptions.claimedUntil), lte(subscriptions.claimedUntil, now));
}

export class DrizzleSubscriptionStore implements SubscriptionStore {
  constructor(private readonly db: Database) {}

  async findDue({ asOf, limit, now, after }: DueQuery): Promise<Subscription[]> {
    const conditions: Array<SQL | undefined> = [
      inArray(subscriptions.status, [...BILLABLE_STATUSES]),
      lte(subscriptions.nextBillingDate, asOf),
      unclaimed(now),
    ];
    if (after) {
      conditions.push(
        sql`(${subscriptions.nextBillingDate}, ${subscriptions.id}) > (${after.nextBillingDate}::date, ${after.id}::uuid)`
      );
    }

    return withStorage('findDue', async () => {
      const rows = await this.db
        .select()
        .from(subscriptions)
        .where(and(...conditions))
        .orderBy(asc(subscriptions.nextBillingDate), asc(subscriptions.id))
        .limit(limit);
      return rows.map(toSubscription);
    });
  }

  async get(id: string): Promise<Subscription | null> {
    return withStorage('getSubscription', async () => {
      const [row] = await this.db.select().from(subscriptions).where(eq(subscriptions.id, id)).limit(1);
      return row ? toSubscription(row) : null;
    });
  }

  async list(filter: SubscriptionFilter): Promise<Subscription[]> {
    return withStorage('listSubscriptions', async () => {
      const rows = await this.db
        .select()
        .from(subscriptions)
        .where(and(
          filter.userId === undefined ? undefined : eq(subscriptions.userId, filter.userId),
          filter.status === undefined ? undefined : eq(subscriptions.status, filter.status)
        ))
        .orderBy(desc(subscriptions.createdAt), desc(subscriptions.id))
        .limit(filter.limit);
      return rows.map(toSubscription);
    });
  }

  async create(input: NewSubscription): Promise<Subscription> {
    return withStorage('createSubscription', async () => {
      const [row] = await this.db
        .insert(subscriptions)
        .values({
          userId: input.userId,
          planId: input.planId,
          status: 'active',
          nextBillingDate: input.nextBillingDate,
          version: 0,
          trialEndsAt: input.trialEndsAt,
          createdAt: input.createdAt,
          updatedAt: input.createdAt,
        })
        .returning();
      return toSubscription(row);
    });
  }

  async claim(id: string, expectedVersion: number, lease: ClaimLease): Promise<Subscription> {
    return withStorage('claimSubscription', async () => {
      const [row] = await this.db
        .update(subscriptions)
        .set({ version: sql`${subscriptions.version} + 1`, claimedUntil: lease.until })
        .where(and(
          eq(subscriptions.id, id),
          eq(subscriptions.version, expectedVersion),
          ne(subscriptions.status, 'cancelled'),
          unclaimed(lease.now)
        ))
        .returning();
      if (!row) {
        return this.explainMiss(id, expectedVersion, { now: lease.now });
      }
      return toSubscription(row);
    });
  }

  async updateAfterAttempt(id: string, expectedVersion: number, update: SubscriptionUpdate): Promise<Subscription> {
    return withStorage('updateSubscription', async () => {
      const [row] = await this.db
        .update(subscriptions)
        .set({
          status: update.status,
          nextBillingDate: update.nextBillingDate,
          updatedAt: update.updatedAt,
          claimedUntil: null,
          version: sql`${subscriptions.version} + 1`,
          ...(update.status === 'cancelled' ? { cancelledAt: update.updatedAt } : {}),
        })
        .where(and(
          eq(subscriptions.id, id),
          eq(subscriptions.version, expectedVersion),
          ne(subscriptions.status, 'cancelled'),
          lte(subscriptions.nextBillingDate, update.nextBillingDate)
        ))
        .returning();
      if (!row) {
        return this.explainMiss(id, expectedVersion, { nextBillingDate: update.nextBillingDate });
      }
      return toSubscription(row);
    });
  }

  async release(id: string, expectedVersion: number): Promise<void> {
    await withStorage('releaseSubscription', async () => {
      await this.db
        .update(subscriptions)
        .set({ claimedUntil: null })
        .where(and(eq(subscriptions.id, id), eq(subscriptions.version, expectedVersion)));
    });
  }

  async cancel(id: string, at: Date): Promise<Subscription> {
    return withStorage('cancelSubscription', async () => {
      const [row] = await this.db
        .update(subscriptions)
        .set({
          status: 'cancelled',
          cancelledAt: at,
          updatedAt: at,
          version: sql`${subscriptions.version} + 1`,
        })
        .where(and(eq(subscriptions.id, id), ne(subscriptions.status, 'cancelled')))
        .returning();
      if (row) {
        return toSubscription(row);
      }
      // Already cancelled (no-op) or missing
      const existing = await this.get(id);
      if (!existing) {
        throw new NotFoundError('Subscription', id);
      }
      return existing;
    });
  }

  private async explainMiss(
    id: string,
    expectedVersion: number,
    checks: { nextBillingDate?: BillingDate; now?: Date } = {}
  ): Promise<never> {
    const current = await this.get(id);
    if (!current) {
      throw new NotFoundError('Subscription', id);
    }
    if (current.status === 'cancelled') {
      throw new ConflictError(`Subscription ${id} is cancelled`);
    }
    if (current.version !== expectedVersion) {
      throw new ConflictError(`Subscription ${id} changed (version ${current.version}, expected ${expectedVersion})`);
    }
    if (checks.now && current.claimedUntil && current.claimedUntil.getTime() > checks.now.getTime()) {
      throw new ConflictError(`Subscription ${id} is claimed until ${current.claimedUntil.toISOString()}`);
    }
    const { nextBillingDate } = checks;
    if (nextBillingDate && compareBillingDates(nextBillingDate, current.nextBillingDate) < 0) {
      throw new ValidationError(
        `Next billing date cannot move backwards (${current.nextBillingDate} -> ${nextBillingDate})`,
        'NEXT_BILLING_DATE_REGRESSION'
      );
    }
    throw new ConflictError(`Subscription ${id} was modified concurrently`);
  }
}
