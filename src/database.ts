import { MongoClient, MongoServerError, Collection, Db } from 'mongodb';
import { DuplicateAccountError, Store } from './store';
import { Expense, User } from './types';

export interface MongoStoreOptions {
  uri: string;
  dbName: string;
}

// Documents are read back without Mongo's own _id
const WITHOUT_ID = { projection: { _id: 0 } };

/**
 * Map a unique-index violation (code 11000) on the users collection to the
 * account field that collided. Other errors yield null.
 */
export function toDuplicateAccountError(error: unknown): DuplicateAccountError | null {
  if (!(error instanceof MongoServerError) || error.code !== 11000) return null;

  const keyPattern: unknown = error.keyPattern;
  if (typeof keyPattern === 'object' && keyPattern !== null && 'email' in keyPattern) {
    return new DuplicateAccountError('email');
  }
  return new DuplicateAccountError('username');
}

export function createMongoStore({ uri, dbName }: MongoStoreOptions): Store {
  let client: MongoClient | null = null;
  let connecting: Promise<{ users: Collection<User>; expenses: Collection<Expense> }> | null = null;

  async function connect(): Promise<{ users: Collection<User>; expenses: Collection<Expense> }> {
    if (!connecting) {
      connecting = (async () => {
        client = new MongoClient(uri);
        await client.connect();
        const db: Db = client.db(dbName);
        const users = db.collection<User>('users');
        const expenses = db.collection<Expense>('expenses');

        await users.createIndex({ id: 1 }, { unique: true });
        await users.createIndex({ username: 1 }, { unique: true });
        await users.createIndex({ email: 1 }, { unique: true });
        await expenses.createIndex({ id: 1 }, { unique: true });
        await expenses.createIndex({ user_id: 1, date: -1, created_at: -1 });

        return { users, expenses };
      })();
    }

    try {
      return await connecting;
    } catch (error) {
      // Let the next call retry instead of replaying a failed connection
      connecting = null;
      throw error;
    }
  }

  return {
    async init(): Promise<void> {
      await connect();
    },

    async createUser(user: User): Promise<User> {
      const { users } = await connect();
      try {
        await users.insertOne({ ...user });
      } catch (error) {
        throw toDuplicateAccountError(error) ?? error;
      }
      return user;
    },

    async findById(id: string): Promise<User | null> {
      const { users } = await connect();
      return users.findOne({ id }, WITHOUT_ID);
    },

    async findByUsername(username: string): Promise<User | null> {
      const { users } = await connect();
      return users.findOne({ username }, WITHOUT_ID);
    },

    async findByEmail(email: string): Promise<User | null> {
      const { users } = await connect();
      return users.findOne({ email }, WITHOUT_ID);
    },

    async listUsers(): Promise<User[]> {
      const { users } = await connect();
      return users.find({}, WITHOUT_ID).sort({ username: 1 }).toArray();
    },

    async listByOwner(ownerId: string): Promise<Expense[]> {
      const { expenses } = await connect();
      return expenses
        .find({ user_id: ownerId }, WITHOUT_ID)
        .sort({ date: -1, created_at: -1 })
        .toArray();
    },

    async insert(record: Expense): Promise<Expense> {
      const { expenses } = await connect();
      // insertOne stamps _id onto the object it is given
      await expenses.insertOne({ ...record });
      return record;
    },

    async deleteIfOwned(id: string, ownerId: string): Promise<boolean> {
      const { expenses } = await connect();
      const result = await expenses.deleteOne({ id, user_id: ownerId });
      return result.deletedCount === 1;
    },

    async close(): Promise<void> {
      if (client) await client.close();
      client = null;
      connecting = null;
    }
  };
}
