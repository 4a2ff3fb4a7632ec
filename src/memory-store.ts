import { compareNewestFirst, DuplicateAccountError, Store } from './store';
import { Expense, User } from './types';

/**
 * Process-local store. Backs the test suite and `STORE=memory` runs;
 * everything is lost on restart.
 */
export function createMemoryStore(): Store {
  const users = new Map<string, User>();
  const expenses = new Map<string, Expense>();

  const findUser = (predicate: (user: User) => boolean): User | null => {
    for (const user of users.values()) {
      if (predicate(user)) return { ...user };
    }
    return null;
  };

  return {
    async init(): Promise<void> {},

    async close(): Promise<void> {},

    async createUser(user: User): Promise<User> {
      if (findUser(u => u.username === user.username)) {
        throw new DuplicateAccountError('username');
      }
      if (findUser(u => u.email === user.email)) {
        throw new DuplicateAccountError('email');
      }
      users.set(user.id, { ...user });
      return user;
    },

    async findById(id: string): Promise<User | null> {
      return findUser(u => u.id === id);
    },

    async findByUsername(username: string): Promise<User | null> {
      return findUser(u => u.username === username);
    },

    async findByEmail(email: string): Promise<User | null> {
      return findUser(u => u.email === email);
    },

    async listUsers(): Promise<User[]> {
      return [...users.values()]
        .map(u => ({ ...u }))
        .sort((a, b) => (a.username < b.username ? -1 : a.username > b.username ? 1 : 0));
    },

    async listByOwner(ownerId: string): Promise<Expense[]> {
      return [...expenses.values()]
        .filter(e => e.user_id === ownerId)
        .map(e => ({ ...e }))
        .sort(compareNewestFirst);
    },

    async insert(record: Expense): Promise<Expense> {
      expenses.set(record.id, { ...record });
      return record;
    },

    async deleteIfOwned(id: string, ownerId: string): Promise<boolean> {
      const existing = expenses.get(id);
      if (!existing || existing.user_id !== ownerId) return false;
      return expenses.delete(id);
    }
  };
}
