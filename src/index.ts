import 'dotenv/config';
import { createApp } from './app';
import { DEFAULT_SESSION_SECRET, loadConfig } from './config';
import { createMongoStore } from './database';
import { createMemoryStore } from './memory-store';

const config = loadConfig();
const store = config.storeKind === 'memory'
  ? createMemoryStore()
  : createMongoStore({ uri: config.mongoUri, dbName: config.dbName });
const app = createApp(store, config);

async function shutdown(): Promise<void> {
  console.log('\nShutting down gracefully...');
  try {
    await store.close();
    process.exit(0);
  } catch (error) {
    console.error('Error during shutdown:', error);
    process.exit(1);
  }
}

// Graceful shutdown
process.on('SIGINT', () => void shutdown());
process.on('SIGTERM', () => void shutdown());

// Initialize store and start server
async function start(): Promise<void> {
  try {
    await store.init();
    if (config.sessionSecret === DEFAULT_SESSION_SECRET) {
      console.warn('SESSION_SECRET is not set; using the development default');
    }
    app.listen(config.port, () => {
      console.log(`Expense Tracker API running on http://localhost:${config.port} (${config.storeKind} store)`);
      console.log('Available endpoints:');
      console.log('  POST   /register          - Create an account');
      console.log('  POST   /login             - Log in');
      console.log('  GET    /logout            - Log out');
      console.log('  GET    /api/user          - Current account');
      console.log('  GET    /api/expenses      - List expenses');
      console.log('  POST   /api/expenses      - Record an expense');
      console.log('  DELETE /api/expenses/:id  - Delete an expense');
      console.log('  GET    /api/stats         - Spending statistics (query: period)');
      console.log('  GET    /health            - Health check');
    });
  } catch (error) {
    console.error('Failed to start server:', error);
    process.exit(1);
  }
}

void start();

export default app;
