import { randomBytes, scrypt, timingSafeEqual } from 'crypto';
import { NextFunction, Request, RequestHandler, Response } from 'express';
import session from 'express-session';
import { AppConfig } from './config';
import { ApiError } from './types';

declare module 'express-session' {
  interface SessionData {
    userId: string;
  }
}

const SALT_BYTES = 16;
const KEY_LENGTH = 64;

function deriveKey(password: string, salt: string): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    scrypt(password, salt, KEY_LENGTH, (err, key) => (err ? reject(err) : resolve(key)));
  });
}

export async function hashPassword(password: string): Promise<string> {
  const salt = randomBytes(SALT_BYTES).toString('hex');
  const derived = await deriveKey(password, salt);
  return `scrypt$${salt}$${derived.toString('hex')}`;
}

export async function verifyPassword(password: string, stored: string): Promise<boolean> {
  const [scheme, salt, hash] = stored.split('$');
  if (scheme !== 'scrypt' || !salt || !hash) return false;

  const expected = Buffer.from(hash, 'hex');
  if (expected.length !== KEY_LENGTH) return false;

  const derived = await deriveKey(password, salt);
  return timingSafeEqual(derived, expected);
}

export function sessionMiddleware(config: AppConfig): RequestHandler {
  return session({
    name: 'session',
    secret: config.sessionSecret,
    resave: false,
    saveUninitialized: false,
    cookie: {
      httpOnly: true,
      sameSite: 'lax',
      secure: config.cookieSecure
    }
  });
}

/** Swap in a fresh session id, then bind it to the account. */
export function startSession(req: Request, userId: string): Promise<void> {
  return new Promise((resolve, reject) => {
    req.session.regenerate(err => {
      if (err) return reject(err);
      req.session.userId = userId;
      req.session.save(saveErr => (saveErr ? reject(saveErr) : resolve()));
    });
  });
}

export function endSession(req: Request): Promise<void> {
  return new Promise((resolve, reject) => {
    req.session.destroy(err => (err ? reject(err) : resolve()));
  });
}

export type AccountHandler = (req: Request, res: Response, userId: string) => Promise<unknown>;

/**
 * Wraps a route that needs a logged-in account. The handler receives the
 * session's user id; anonymous requests get a 401.
 */
export function requireAccount(handler: AccountHandler): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const userId = req.session.userId;
    if (!userId) {
      const error: ApiError = { error: 'Authentication required' };
      res.status(401).json(error);
      return;
    }
    handler(req, res, userId).catch(next);
  };
}
