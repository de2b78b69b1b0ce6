// src/core/interact/__tests__/budget.test.ts
import { describe, it, expect } from '@jest/globals';
import { InteractionBudget } from '../budget.js';

describe('InteractionBudget', () => {
  const ceilings = { tabsClicked: 2, loadMoreClicks: 3, scrolls: 0, paginationDepth: 1 };

  it('counts up to the ceiling of each category', () => {
    const budget = new InteractionBudget(ceilings);

    expect(budget.spend('tabsClicked')).toBe(1);
    expect(budget.spend('tabsClicked')).toBe(2);
    expect(budget.canSpend('tabsClicked')).toBe(false);
    expect(budget.canSpend('loadMoreClicks')).toBe(true);
  });

  it('refuses to pass a ceiling', () => {
    const budget = new InteractionBudget(ceilings);

    expect(budget.canSpend('scrolls')).toBe(false);
    expect(() => budget.spend('scrolls')).toThrow('Interaction budget exhausted for scrolls (ceiling 0)');
    expect(budget.used('scrolls')).toBe(0);
  });

  it('returns an independent snapshot of the counters', () => {
    const budget = new InteractionBudget(ceilings);
    budget.spend('paginationDepth');

    const snapshot = budget.snapshot();
    budget.spend('loadMoreClicks');

    expect(snapshot).toEqual({ tabsClicked: 0, loadMoreClicks: 0, scrolls: 0, paginationDepth: 1 });
    expect(budget.ceiling('loadMoreClicks')).toBe(3);
  });
});
