import { eq } from 'drizzle-orm';
import type { Database } from '../db';
import { plans, users } from '../schema';
import type { Plan, PlanCatalog, User, UserDirectory } from '../billing/types';
import { withStorage } from './pg-errors';

export class DrizzlePlanCatalog implements PlanCatalog {
  constructor(private readonly db: Database) {}

  async getPlan(id: number): Promise<Plan | null> {
    return withStorage('getPlan', async () => {
      const [row] = await this.db
        .select({
          id: plans.id,
          name: plans.name,
          priceCents: plans.priceCents,
          billingCycle: plans.billingCycle,
          trialDays: plans.trialDays,
          isActive: plans.isActive,
        })
        .from(plans)
        .where(eq(plans.id, id))
        .limit(1);
      return row ?? null;
    });
  }
}

export class DrizzleUserDirectory implements UserDirectory {
  constructor(private readonly db: Database) {}

  async getUser(id: number): Promise<User | null> {
    return withStorage('getUser', async () => {
      const [row] = await this.db
        .select({ id: users.id, email: users.email, name: users.name, isActive: users.isActive })
        .from(users)
        .where(eq(users.id, id))
        .limit(1);
      return row ?? null;
    });
  }
}
