export type StoreKind = 'mongo' | 'memory';

export interface AppConfig {
  port: number;
  mongoUri: string;
  dbName: string;
  storeKind: StoreKind;
  sessionSecret: string;
  cookieSecure: boolean;
}

export const DEFAULT_SESSION_SECRET = 'dev-key-please-change-in-production';

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const port = parseInt(env.PORT ?? '', 10);

  return {
    port: Number.isInteger(port) && port > 0 ? port : 4048,
    mongoUri: env.MONGODB_URI || 'mongodb://localhost:27017',
    dbName: env.DB_NAME || 'expense_tracker',
    storeKind: env.STORE === 'memory' ? 'memory' : 'mongo',
    sessionSecret: env.SESSION_SECRET || DEFAULT_SESSION_SECRET,
    cookieSecure: env.SESSION_COOKIE_SECURE?.toLowerCase() === 'true'
  };
}
