import { Expense, User } from './types';

/** Per-account expense persistence. */
export interface RecordStore {
  /** Newest first: date descending, then created_at descending. */
  listByOwner(ownerId: string): Promise<Expense[]>;
  insert(record: Expense): Promise<Expense>;
  /** Removes the record only when `ownerId` owns it. Resolves true if something was deleted. */
  deleteIfOwned(id: string, ownerId: string): Promise<boolean>;
}

/** Thrown by `createUser` when a unique account field is already taken. */
export class DuplicateAccountError extends Error {
  constructor(readonly field: 'username' | 'email') {
    super(`Duplicate ${field}`);
    this.name = 'DuplicateAccountError';
  }
}

export interface UserStore {
  createUser(user: User): Promise<User>;
  findById(id: string): Promise<User | null>;
  findByUsername(username: string): Promise<User | null>;
  findByEmail(email: string): Promise<User | null>;
  /** Sorted by username. */
  listUsers(): Promise<User[]>;
}

export interface Store extends RecordStore, UserStore {
  init(): Promise<void>;
  close(): Promise<void>;
}

export function compareNewestFirst(a: Expense, b: Expense): number {
  if (a.date !== b.date) return a.date < b.date ? 1 : -1;
  if (a.created_at !== b.created_at) return a.created_at < b.created_at ? 1 : -1;
  return 0;
}
