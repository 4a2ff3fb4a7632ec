import express, { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { v4 as uuidv4 } from 'uuid';
import { endSession, hashPassword, requireAccount, sessionMiddleware, startSession, verifyPassword } from './auth';
import { AppConfig } from './config';
import { localIsoDate } from './dates';
import { computeStats } from './stats';
import { DuplicateAccountError, Store } from './store';
import { ApiError, AuthResult, Expense, ExpenseResponse, User, UserResponse } from './types';
import {
  isJsonObject,
  sanitizeInput,
  toLoginInput,
  toRegisterInput,
  validateExpenseInput,
  validateRegisterInput
} from './validation';

// Helper: Convert stored expense (amount in cents) to response (decimal amount)
export function toExpenseResponse(expense: Expense): ExpenseResponse {
  return {
    id: expense.id,
    description: expense.description,
    amount: expense.amount / 100,
    category: expense.category,
    date: expense.date,
    time: expense.time
  };
}

const DUPLICATE_MESSAGES: Record<DuplicateAccountError['field'], string> = {
  username: 'Username already exists',
  email: 'Email already registered'
};

export function createApp(store: Store, config: AppConfig, clock: () => Date = () => new Date()): Express {
  const app = express();

  // Middleware
  app.use(cors({ credentials: true, origin: true }));
  app.use(express.json());
  app.use(sessionMiddleware(config));

  // Request logging middleware
  app.use((req: Request, _res: Response, next: NextFunction) => {
    console.log(`${new Date().toISOString()} ${req.method} ${req.path}`);
    next();
  });

  // POST /register - Create an account and log it in
  app.post('/register', async (req: Request, res: Response) => {
    try {
      const validation = validateRegisterInput(req.body);
      if (!validation.valid || !isJsonObject(req.body)) {
        const error: ApiError = {
          error: 'Validation failed',
          details: validation.errors
        };
        return res.status(400).json(error);
      }

      const input = toRegisterInput(req.body);

      if (await store.findByUsername(input.username)) {
        throw new DuplicateAccountError('username');
      }
      if (await store.findByEmail(input.email)) {
        throw new DuplicateAccountError('email');
      }

      const user: User = {
        id: uuidv4(),
        username: input.username,
        email: input.email,
        password_hash: await hashPassword(input.password),
        created_at: new Date().toISOString()
      };
      await store.createUser(user);
      await startSession(req, user.id);
      console.log(`Registered user: ${user.username}`);

      const result: AuthResult = { success: true };
      return res.status(201).json(result);
    } catch (error) {
      // Also reached when a concurrent registration wins the unique index
      if (error instanceof DuplicateAccountError) {
        const result: AuthResult = { success: false, message: DUPLICATE_MESSAGES[error.field] };
        return res.status(400).json(result);
      }

      console.error('Error registering user:', error);
      const apiError: ApiError = { error: 'Failed to register user' };
      return res.status(500).json(apiError);
    }
  });

  // POST /login - Start a session for valid credentials
  app.post('/login', async (req: Request, res: Response) => {
    try {
      const input = toLoginInput(req.body);
      const user = input ? await store.findByUsername(input.username) : null;

      if (!input || !user || !(await verifyPassword(input.password, user.password_hash))) {
        const result: AuthResult = { success: false, message: 'Invalid credentials' };
        return res.status(401).json(result);
      }

      await startSession(req, user.id);
      const result: AuthResult = { success: true };
      return res.status(200).json(result);
    } catch (error) {
      console.error('Error logging in:', error);
      const apiError: ApiError = { error: 'Failed to log in' };
      return res.status(500).json(apiError);
    }
  });

  const logout = requireAccount(async (req, res) => {
    await endSession(req);
    const result: AuthResult = { success: true };
    res.json(result);
  });
  app.get('/logout', logout);
  app.post('/logout', logout);

  // GET /api/user - Current account
  app.get('/api/user', requireAccount(async (_req, res, userId) => {
    const user = await store.findById(userId);
    if (!user) {
      return res.status(404).json({ error: 'User not found' });
    }

    const response: UserResponse = { username: user.username, email: user.email };
    return res.json(response);
  }));

  // GET /api/expenses - Account's expenses, newest first
  app.get('/api/expenses', requireAccount(async (_req, res, userId) => {
    try {
      const expenses = await store.listByOwner(userId);
      return res.json(expenses.map(toExpenseResponse));
    } catch (error) {
      console.error('Error fetching expenses:', error);
      const apiError: ApiError = { error: 'Failed to fetch expenses' };
      return res.status(500).json(apiError);
    }
  }));

  // POST /api/expenses - Record a new expense
  app.post('/api/expenses', requireAccount(async (req, res, userId) => {
    try {
      const validation = validateExpenseInput(req.body);
      if (!validation.valid || !isJsonObject(req.body)) {
        const error: ApiError = {
          error: 'Validation failed',
          details: validation.errors
        };
        return res.status(400).json(error);
      }

      const input = sanitizeInput(req.body);

      const expense: Expense = {
        id: uuidv4(),
        user_id: userId,
        description: input.description,
        amount: Math.round(input.amount * 100), // Convert to cents for storage
        category: input.category,
        date: input.date,
        time: input.time ?? '',
        created_at: new Date().toISOString()
      };

      await store.insert(expense);
      console.log(`Created expense: ${expense.id}`);

      return res.status(201).json(toExpenseResponse(expense));
    } catch (error) {
      console.error('Error creating expense:', error);
      const apiError: ApiError = { error: 'Failed to create expense' };
      return res.status(500).json(apiError);
    }
  }));

  // DELETE /api/expenses/:id - Delete an expense the account owns
  app.delete('/api/expenses/:id', requireAccount(async (req, res, userId) => {
    try {
      const { id } = req.params;

      // Unknown or foreign ids are not reported back to the caller
      if (await store.deleteIfOwned(id, userId)) {
        console.log(`Deleted expense: ${id}`);
      }

      return res.status(200).json({ success: true });
    } catch (error) {
      console.error('Error deleting expense:', error);
      const apiError: ApiError = { error: 'Failed to delete expense' };
      return res.status(500).json(apiError);
    }
  }));

  // GET /api/stats - Spending statistics for the requested period
  app.get('/api/stats', requireAccount(async (req, res, userId) => {
    try {
      const period = typeof req.query.period === 'string' ? req.query.period : 'all';
      const expenses = await store.listByOwner(userId);

      return res.json(computeStats(expenses, period, localIsoDate(clock())));
    } catch (error) {
      console.error('Error fetching stats:', error);
      const apiError: ApiError = { error: 'Failed to fetch statistics' };
      return res.status(500).json(apiError);
    }
  }));

  // Health check endpoint
  app.get('/health', (_req: Request, res: Response) => {
    return res.json({ status: 'ok', timestamp: clock().toISOString() });
  });

  // 404 handler
  app.use((_req: Request, res: Response) => {
    return res.status(404).json({ error: 'Not found' });
  });

  // Error handler
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    console.error('Unhandled error:', err);
    return res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
