// Wellness Retention Engine - Plan store
// Plans live in server memory only, so a follow-up can refer back to the plan
// it is about. Bounded: once full, the oldest plan is dropped.

import type { DailyPlanRequest, DailyPlanResponse, StoredPlan } from "./types.js";

export const DEFAULT_PLAN_STORE_CAPACITY = 1000;

export class PlanStore {
  private readonly plans = new Map<string, StoredPlan>();
  private readonly capacity: number;
  private readonly now: () => Date;

  constructor(capacity: number = DEFAULT_PLAN_STORE_CAPACITY, now: () => Date = () => new Date()) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Plan store capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.now = now;
  }

  get size(): number {
    return this.plans.size;
  }

  save(plan: DailyPlanResponse, request: Pick<DailyPlanRequest, "goal" | "current_streak">): StoredPlan {
    const stored: StoredPlan = {
      plan,
      goal: request.goal,
      currentStreak: request.current_streak,
      createdAt: this.now(),
    };

    // Map iteration order is insertion order, so the first key is the oldest.
    this.plans.delete(plan.plan_id);
    while (this.plans.size >= this.capacity) {
      const oldest = this.plans.keys().next();
      if (oldest.done) break;
      this.plans.delete(oldest.value);
    }
    this.plans.set(plan.plan_id, stored);
    return stored;
  }

  get(planId: string): StoredPlan | undefined {
    return this.plans.get(planId);
  }
}
