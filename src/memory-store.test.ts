import { createMemoryStore } from './memory-store';
import { DuplicateAccountError } from './store';
import { computeStats } from './stats';
import { createMockExpense, createMockUser } from './test-utils/fixtures';

describe('createMemoryStore', () => {
  const alice = createMockUser({ id: 'user-alice', username: 'alice', email: 'alice@example.com' });
  const bob = createMockUser({ id: 'user-bob', username: 'bob', email: 'bob@example.com' });

  describe('users', () => {
    it('should find users by id, username and email', async () => {
      const store = createMemoryStore();
      await store.createUser(alice);

      expect(await store.findById('user-alice')).toEqual(alice);
      expect(await store.findByUsername('alice')).toEqual(alice);
      expect(await store.findByEmail('alice@example.com')).toEqual(alice);
      expect(await store.findByUsername('carol')).toBeNull();
    });

    it('should reject a duplicate username', async () => {
      const store = createMemoryStore();
      await store.createUser(alice);

      await expect(
        store.createUser({ ...alice, id: 'user-other', email: 'other@example.com' })
      ).rejects.toEqual(new DuplicateAccountError('username'));
    });

    it('should reject a duplicate email', async () => {
      const store = createMemoryStore();
      await store.createUser(alice);

      const attempt = store.createUser({ ...alice, id: 'user-other', username: 'alicia' });
      await expect(attempt).rejects.toBeInstanceOf(DuplicateAccountError);
      await expect(attempt).rejects.toHaveProperty('field', 'email');
    });

    it('should list users by username', async () => {
      const store = createMemoryStore();
      await store.createUser(bob);
      await store.createUser(alice);

      const users = await store.listUsers();
      expect(users.map(u => u.username)).toEqual(['alice', 'bob']);
    });
  });

  describe('expenses', () => {
    it('should list only the owner\'s expenses, newest first', async () => {
      const store = createMemoryStore();
      await store.insert(createMockExpense({ id: 'a1', user_id: alice.id, date: '2024-03-01' }));
      await store.insert(createMockExpense({
        id: 'a2', user_id: alice.id, date: '2024-03-10', created_at: '2024-03-10T08:00:00.000Z'
      }));
      await store.insert(createMockExpense({ id: 'b1', user_id: bob.id, date: '2024-03-05' }));
      await store.insert(createMockExpense({
        id: 'a3', user_id: alice.id, date: '2024-03-10', created_at: '2024-03-10T20:00:00.000Z'
      }));

      const expenses = await store.listByOwner(alice.id);
      expect(expenses.map(e => e.id)).toEqual(['a3', 'a2', 'a1']);
    });

    it('should not return live references to stored records', async () => {
      const store = createMemoryStore();
      await store.insert(createMockExpense({ id: 'a1', user_id: alice.id, amount: 100 }));

      const [listed] = await store.listByOwner(alice.id);
      listed.amount = 999;

      const [again] = await store.listByOwner(alice.id);
      expect(again.amount).toBe(100);
    });

    it('should only delete records the caller owns', async () => {
      const store = createMemoryStore();
      await store.insert(createMockExpense({ id: 'a1', user_id: alice.id }));

      expect(await store.deleteIfOwned('a1', bob.id)).toBe(false);
      expect(await store.listByOwner(alice.id)).toHaveLength(1);

      expect(await store.deleteIfOwned('a1', alice.id)).toBe(true);
      expect(await store.listByOwner(alice.id)).toHaveLength(0);
      expect(await store.deleteIfOwned('a1', alice.id)).toBe(false);
    });

    it('should drop a deleted record from the owner\'s stats only', async () => {
      const store = createMemoryStore();
      const today = '2024-03-15';
      await store.insert(createMockExpense({ id: 'a1', user_id: alice.id, amount: 1000, date: today }));
      await store.insert(createMockExpense({ id: 'a2', user_id: alice.id, amount: 250, date: today }));
      await store.insert(createMockExpense({ id: 'b1', user_id: bob.id, amount: 4000, date: today }));

      const bobBefore = computeStats(await store.listByOwner(bob.id), 'all', today);
      await store.deleteIfOwned('a1', alice.id);

      const aliceAfter = computeStats(await store.listByOwner(alice.id), 'all', today);
      const bobAfter = computeStats(await store.listByOwner(bob.id), 'all', today);

      expect(aliceAfter.total_spent).toBe(2.5);
      expect(bobAfter).toEqual(bobBefore);
      expect(bobAfter.total_spent).toBe(40);
    });
  });
});
