/**
 * Pure reports over a collection snapshot.
 * Nothing here is cached; every call rescans the records it is given.
 */
import {
  CategoryShare,
  CategoryStats,
  Expense,
  ExpenseSummary,
  IndexedExpense,
  MonthlyStats,
  TrendPoint
} from './types';

export function total(expenses: Expense[]): number {
  return expenses.reduce((sum, e) => sum + e.Amount, 0);
}

export function count(expenses: Expense[]): number {
  return expenses.length;
}

/** `undefined` for an empty collection */
export function average(expenses: Expense[]): number | undefined {
  if (expenses.length === 0) return undefined;
  return total(expenses) / expenses.length;
}

/** `undefined` for an empty collection */
export function max(expenses: Expense[]): number | undefined {
  if (expenses.length === 0) return undefined;
  return Math.max(...expenses.map((e) => e.Amount));
}

export function summarize(expenses: Expense[]): ExpenseSummary {
  return {
    count: count(expenses),
    total: total(expenses),
    average: average(expenses),
    max: max(expenses)
  };
}

/** Largest spend first; equal sums fall back to category name */
export function groupByCategory(expenses: Expense[]): CategoryStats[] {
  const groups = new Map<string, { sum: number; count: number }>();
  for (const e of expenses) {
    const group = groups.get(e.Category) ?? { sum: 0, count: 0 };
    group.sum += e.Amount;
    group.count += 1;
    groups.set(e.Category, group);
  }

  return Array.from(groups.entries())
    .map(([category, { sum, count }]) => ({ category, sum, count, average: sum / count }))
    .sort((a, b) => b.sum - a.sum || a.category.localeCompare(b.category));
}

export function groupByMonth(expenses: Expense[]): MonthlyStats[] {
  const months = new Map<string, MonthlyStats>();
  for (const e of expenses) {
    const month = e.Date.slice(0, 7);
    const stats = months.get(month) ?? { month, total: 0, count: 0 };
    stats.total += e.Amount;
    stats.count += 1;
    months.set(month, stats);
  }

  // YYYY-MM sorts chronologically as a string
  return Array.from(months.values()).sort((a, b) => (a.month < b.month ? -1 : a.month > b.month ? 1 : 0));
}

export function categoryDistribution(expenses: Expense[]): CategoryShare[] {
  const grandTotal = total(expenses);
  return groupByCategory(expenses).map(({ category, sum }) => ({
    category,
    total: sum,
    share: grandTotal === 0 ? 0 : sum / grandTotal
  }));
}

/** Case-sensitive: compare against the stored, capitalized form */
export function filterByCategory(expenses: Expense[], category: string): Expense[] {
  return expenses.filter((e) => e.Category === category);
}

function compareDates(a: Expense, b: Expense): number {
  return a.Date < b.Date ? -1 : a.Date > b.Date ? 1 : 0;
}

export function cumulativeByDate(expenses: Expense[]): TrendPoint[] {
  let running = 0;
  return [...expenses].sort(compareDates).map((e) => {
    running += e.Amount;
    return { ...e, cumulative: running };
  });
}

export function distinctCategories(expenses: Expense[]): string[] {
  return Array.from(new Set(expenses.map((e) => e.Category))).sort();
}

function withPositions(expenses: Expense[]): IndexedExpense[] {
  return expenses.map((e, index) => ({ ...e, index }));
}

// Display order for tables; `index` is still the load-order position deleteAt expects
export function newestFirst(expenses: Expense[]): IndexedExpense[] {
  return withPositions(expenses).sort((a, b) => compareDates(b, a));
}

/** Same-day records keep load order, as in cumulativeByDate */
export function oldestFirst(expenses: Expense[]): IndexedExpense[] {
  return withPositions(expenses).sort(compareDates);
}
