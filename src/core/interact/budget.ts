// src/core/interact/budget.ts
import type { BudgetCategory, BudgetCounters } from '../types/index.js';

export class InteractionBudget {
  private counters: BudgetCounters = {
    tabsClicked: 0,
    loadMoreClicks: 0,
    scrolls: 0,
    paginationDepth: 0,
  };

  constructor(private readonly ceilings: Readonly<BudgetCounters>) {}

  canSpend(category: BudgetCategory): boolean {
    return this.counters[category] < this.ceilings[category];
  }

  spend(category: BudgetCategory): number {
    if (!this.canSpend(category)) {
      throw new RangeError(`Interaction budget exhausted for ${category} (ceiling ${this.ceilings[category]})`);
    }
    this.counters[category] += 1;
    return this.counters[category];
  }

  used(category: BudgetCategory): number {
    return this.counters[category];
  }

  ceiling(category: BudgetCategory): number {
    return this.ceilings[category];
  }

  snapshot(): BudgetCounters {
    return { ...this.counters };
  }
}
