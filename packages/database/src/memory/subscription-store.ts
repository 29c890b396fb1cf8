/**
 * In-memory SubscriptionStore
 *
 * Same guards as the Postgres store: every mutation checks the expected
 * version and bumps it, and a live claim hides the row from findDue.
 * Records are copied in and out so callers never hold a reference to
 * stored state.
 */

import { randomUUID } from 'crypto';
import { compareBillingDates } from '@renewly/shared/billing';
import { ConflictError, NotFoundError, ValidationError } from '../billing/errors';
import { isBillable } from '../billing/state-machine';
import type {
  ClaimLease,
  DueCursor,
  DueQuery,
  NewSubscription,
  Subscription,
  SubscriptionFilter,
  SubscriptionStore,
  SubscriptionUpdate,
} from '../billing/types';

function copy(subscription: Subscription): Subscription {
  return {
    ...subscription,
    createdAt: new Date(subscription.createdAt),
    updatedAt: new Date(subscription.updatedAt),
    cancelledAt: subscription.cancelledAt ? new Date(subscription.cancelledAt) : null,
    trialEndsAt: subscription.trialEndsAt ? new Date(subscription.trialEndsAt) : null,
    claimedUntil: subscription.claimedUntil ? new Date(subscription.claimedUntil) : null,
  };
}

function isClaimed(subscription: Subscription, now: Date): boolean {
  return subscription.claimedUntil !== null && subscription.claimedUntil.getTime() > now.getTime();
}

function compareDue(a: DueCursor, b: DueCursor): number {
  return compareBillingDates(a.nextBillingDate, b.nextBillingDate) || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0);
}

export class MemorySubscriptionStore implements SubscriptionStore {
  private readonly rows = new Map<string, Subscription>();

  async findDue({ asOf, limit, now, after }: DueQuery): Promise<Subscription[]> {
    return [...this.rows.values()]
      .filter((row) => isBillable(row.status) && compareBillingDates(row.nextBillingDate, asOf) <= 0)
      .filter((row) => !isClaimed(row, now))
      .filter((row) => !after || compareDue(row, after) > 0)
      .sort(compareDue)
      .slice(0, limit)
      .map(copy);
  }

  async get(id: string): Promise<Subscription | null> {
    const row = this.rows.get(id);
    return row ? copy(row) : null;
  }

  async list(filter: SubscriptionFilter): Promise<Subscription[]> {
    return [...this.rows.values()]
      .filter((row) => filter.userId === undefined || row.userId === filter.userId)
      .filter((row) => filter.status === undefined || row.status === filter.status)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || (a.id < b.id ? 1 : -1))
      .slice(0, filter.limit)
      .map(copy);
  }

  async create(input: NewSubscription): Promise<Subscription> {
    const row: Subscription = {
      id: randomUUID(),
      userId: input.userId,
      planId: input.planId,
      status: 'active',
      nextBillingDate: input.nextBillingDate,
      version: 0,
      trialEndsAt: input.trialEndsAt ? new Date(input.trialEndsAt) : null,
      claimedUntil: null,
      createdAt: new Date(input.createdAt),
      updatedAt: new Date(input.createdAt),
      cancelledAt: null,
    };
    this.rows.set(row.id, row);
    return copy(row);
  }

  async claim(id: string, expectedVersion: number, lease: ClaimLease): Promise<Subscription> {
    const row = this.guarded(id, expectedVersion);
    if (row.claimedUntil && isClaimed(row, lease.now)) {
      throw new ConflictError(`Subscription ${id} is claimed until ${row.claimedUntil.toISOString()}`);
    }
    row.claimedUntil = new Date(lease.until);
    row.version++;
    return copy(row);
  }

  async updateAfterAttempt(id: string, expectedVersion: number, update: SubscriptionUpdate): Promise<Subscription> {
    const row = this.guarded(id, expectedVersion);
    if (compareBillingDates(update.nextBillingDate, row.nextBillingDate) < 0) {
      throw new ValidationError(
        `Next billing date cannot move backwards (${row.nextBillingDate} -> ${update.nextBillingDate})`,
        'NEXT_BILLING_DATE_REGRESSION'
      );
    }
    row.status = update.status;
    row.nextBillingDate = update.nextBillingDate;
    row.updatedAt = new Date(update.updatedAt);
    if (update.status === 'cancelled') {
      row.cancelledAt = new Date(update.updatedAt);
    }
    row.claimedUntil = null;
    row.version++;
    return copy(row);
  }

  async release(id: string, expectedVersion: number): Promise<void> {
    const row = this.rows.get(id);
    if (row && row.version === expectedVersion) {
      row.claimedUntil = null;
    }
  }

  async cancel(id: string, at: Date): Promise<Subscription> {
    const row = this.rows.get(id);
    if (!row) {
      throw new NotFoundError('Subscription', id);
    }
    if (row.status !== 'cancelled') {
      row.status = 'cancelled';
      row.cancelledAt = new Date(at);
      row.updatedAt = new Date(at);
      row.version++;
    }
    return copy(row);
  }

  /** Test seeding: insert a fully specified record */
  insert(subscription: Subscription): void {
    this.rows.set(subscription.id, copy(subscription));
  }

  private guarded(id: string, expectedVersion: number): Subscription {
    const row = this.rows.get(id);
    if (!row) {
      throw new NotFoundError('Subscription', id);
    }
    if (row.status === 'cancelled') {
      throw new ConflictError(`Subscription ${id} is cancelled`);
    }
    if (row.version !== expectedVersion) {
      throw new ConflictError(`Subscription ${id} changed (version ${row.version}, expected ${expectedVersion})`);
    }
    return row;
  }
}
