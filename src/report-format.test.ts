import { expenseRow, formatMoney, shortId, summarizeExpenses } from './report-format';
import { createMockExpense } from './test-utils/fixtures';

describe('formatMoney', () => {
  it('should format cents as dollars with two decimals', () => {
    expect(formatMoney(0)).toBe('$0.00');
    expect(formatMoney(1550)).toBe('$15.50');
    expect(formatMoney(123456)).toBe('$1234.56');
  });
});

describe('summarizeExpenses', () => {
  it('should count, total and group by category in first-seen order', () => {
    const summary = summarizeExpenses([
      createMockExpense({ amount: 1000, category: 'food' }),
      createMockExpense({ amount: 550, category: 'transport' }),
      createMockExpense({ amount: 250, category: 'food' })
    ]);

    expect(summary).toEqual({
      count: 3,
      totalCents: 1800,
      categories: [['food', 1250], ['transport', 550]]
    });
  });

  it('should handle no expenses', () => {
    expect(summarizeExpenses([])).toEqual({ count: 0, totalCents: 0, categories: [] });
  });
});

describe('expenseRow', () => {
  it('should truncate the description and mark unknown times', () => {
    const expense = createMockExpense({
      id: '3f2b8c1e-0000-4000-8000-000000000000',
      description: 'Weekly groceries at the market',
      amount: 4299,
      category: 'food',
      date: '2024-03-15',
      time: ''
    });

    expect(expenseRow(expense, 18)).toEqual([
      '3f2b8c1e',
      'Weekly groceries a',
      '$42.99',
      'food',
      '2024-03-15',
      'N/A'
    ]);
  });

  it('should keep a known time', () => {
    const expense = createMockExpense({ time: '08:45' });
    expect(expenseRow(expense, 23)[5]).toBe('08:45');
  });
});

describe('shortId', () => {
  it('should keep the first eight characters', () => {
    expect(shortId('abcdef0123456789')).toBe('abcdef01');
  });
});
