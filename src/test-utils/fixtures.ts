import { Expense, User } from '../types';

let sequence = 0;

export const createMockExpense = (overrides: Partial<Expense> = {}): Expense => {
  sequence += 1;
  return {
    id: `expense-${sequence}`,
    user_id: 'user-1',
    description: 'Test expense',
    amount: 1000,
    category: 'food',
    date: '2024-03-15',
    time: '',
    created_at: `2024-03-15T12:00:${String(sequence % 60).padStart(2, '0')}.000Z`,
    ...overrides
  };
};

export const createMockUser = (overrides: Partial<User> = {}): User => ({
  id: 'user-1',
  username: 'alice',
  email: 'alice@example.com',
  password_hash: 'scrypt$00$00',
  created_at: '2024-01-01T00:00:00.000Z',
  ...overrides
});
