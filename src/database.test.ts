import { MongoServerError } from 'mongodb';
import { toDuplicateAccountError } from './database';
import { DuplicateAccountError } from './store';

describe('toDuplicateAccountError', () => {
  it('should map a duplicate email index error', () => {
    const error = new MongoServerError({ message: 'E11000 duplicate key', code: 11000, keyPattern: { email: 1 } });

    const mapped = toDuplicateAccountError(error);
    expect(mapped).toBeInstanceOf(DuplicateAccountError);
    expect(mapped?.field).toBe('email');
  });

  it('should map a duplicate username index error', () => {
    const error = new MongoServerError({ message: 'E11000 duplicate key', code: 11000, keyPattern: { username: 1 } });

    expect(toDuplicateAccountError(error)?.field).toBe('username');
  });

  it('should ignore other errors', () => {
    expect(toDuplicateAccountError(new MongoServerError({ message: 'boom', code: 2 }))).toBeNull();
    expect(toDuplicateAccountError(new Error('E11000'))).toBeNull();
  });
});
