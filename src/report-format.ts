import { Expense } from './types';

export const REPORT_HEADERS = ['ID', 'Description', 'Amount', 'Category', 'Date', 'Time'];

export interface ExpenseSummary {
  count: number;
  totalCents: number;
  /** Category totals in cents, in the order each category first appears */
  categories: Array<[string, number]>;
}

export function formatMoney(cents: number): string {
  return `$${(cents / 100).toFixed(2)}`;
}

export function shortId(id: string): string {
  return id.slice(0, 8);
}

export function summarizeExpenses(expenses: Expense[]): ExpenseSummary {
  const categories = new Map<string, number>();
  let totalCents = 0;

  for (const expense of expenses) {
    totalCents += expense.amount;
    categories.set(expense.category, (categories.get(expense.category) ?? 0) + expense.amount);
  }

  return { count: expenses.length, totalCents, categories: [...categories.entries()] };
}

export function expenseRow(expense: Expense, descriptionWidth: number): string[] {
  return [
    shortId(expense.id),
    expense.description.slice(0, descriptionWidth),
    formatMoney(expense.amount),
    expense.category,
    expense.date,
    expense.time || 'N/A'
  ];
}
