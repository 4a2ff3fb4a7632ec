import chalk from 'chalk';
import { createMemoryStore } from './memory-store';
import { printAllUsers, printSingleUser } from './report';
import { createMockExpense, createMockUser } from './test-utils/fixtures';

describe('terminal report', () => {
  const alice = createMockUser({ id: 'user-alice', username: 'alice', email: 'alice@example.com' });
  const bob = createMockUser({ id: 'user-bob', username: 'bob', email: 'bob@example.com' });

  let log: jest.SpyInstance;

  beforeAll(() => {
    chalk.level = 0;
  });

  beforeEach(() => {
    log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    log.mockRestore();
  });

  const seededStore = async () => {
    const store = createMemoryStore();
    await store.createUser(bob);
    await store.createUser(alice);
    await store.insert(createMockExpense({ user_id: alice.id, amount: 1000, category: 'food', date: '2024-03-15' }));
    await store.insert(createMockExpense({ user_id: alice.id, amount: 550, category: 'transport', date: '2024-03-14' }));
    await store.insert(createMockExpense({ user_id: alice.id, amount: 4000, category: 'food', date: '2024-03-01' }));
    return store;
  };

  describe('printSingleUser', () => {
    it('should print totals and the category breakdown', async () => {
      await printSingleUser(await seededStore(), 'alice');

      expect(log).toHaveBeenCalledWith('EXPENSES FOR: alice');
      expect(log).toHaveBeenCalledWith('Email: alice@example.com');
      expect(log).toHaveBeenCalledWith('Total Expenses: 3 items');
      expect(log).toHaveBeenCalledWith('Total Amount: $55.50');
      expect(log).toHaveBeenCalledWith('  food: $50.00');
      expect(log).toHaveBeenCalledWith('  transport: $5.50');
    });

    it('should report an unknown user', async () => {
      await printSingleUser(await seededStore(), 'carol');

      expect(log).toHaveBeenCalledTimes(1);
      expect(log).toHaveBeenCalledWith("User 'carol' not found in database.");
    });

    it('should say when a user has no expenses', async () => {
      await printSingleUser(await seededStore(), 'bob');

      expect(log).toHaveBeenLastCalledWith('No expenses found for this user.');
    });
  });

  describe('printAllUsers', () => {
    it('should print each user and an overall summary', async () => {
      await printAllUsers(await seededStore());

      const lines = log.mock.calls.map(call => call[0]);
      expect(lines.indexOf('USER: alice (ID: user-alice)')).toBeLessThan(lines.indexOf('USER: bob (ID: user-bob)'));
      expect(lines).toContain('  Total Expenses: 3 items');
      expect(lines).toContain('  No expenses found for this user.');
      expect(lines).toContain('Total Users: 2');
      expect(lines).toContain('Total Expenses: 3');
      expect(lines).toContain('Total Amount: $55.50');
    });

    it('should handle an empty database', async () => {
      await printAllUsers(createMemoryStore());

      expect(log).toHaveBeenLastCalledWith('No users found in database.');
    });
  });
});
