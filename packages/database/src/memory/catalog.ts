import type { Plan, PlanCatalog, User, UserDirectory } from '../billing/types';

export class MemoryPlanCatalog implements PlanCatalog {
  private readonly plans = new Map<number, Plan>();

  async getPlan(id: number): Promise<Plan | null> {
    const plan = this.plans.get(id);
    return plan ? { ...plan } : null;
  }

  add(plan: Plan): Plan {
    this.plans.set(plan.id, { ...plan });
    return plan;
  }
}

export class MemoryUserDirectory implements UserDirectory {
  private readonly users = new Map<number, User>();

  async getUser(id: number): Promise<User | null> {
    const user = this.users.get(id);
    return user ? { ...user } : null;
  }

  add(user: User): User {
    this.users.set(user.id, { ...user });
    return user;
  }
}
