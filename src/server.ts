import dotenv from 'dotenv';
import { createApp } from './app';
import { loadConfig, type AppConfig } from './config';
import { Database } from './db/database';
import { HttpRemoteAuthority } from './remote/httpAuthority';
import { SimulatedRemoteAuthority } from './remote/simulatedAuthority';
import type { RemoteAuthority } from './remote/types';
import { SyncQueue } from './services/syncQueue';
import { SyncScheduler } from './services/syncScheduler';
import { SyncService } from './services/syncService';
import { TaskService } from './services/taskService';

dotenv.config();

function createAuthority(config: AppConfig): RemoteAuthority {
  const { remote } = config;
  if (remote.mode === 'http') {
    return new HttpRemoteAuthority({ baseUrl: remote.apiBaseUrl, timeoutMs: remote.timeoutMs });
  }
  return new SimulatedRemoteAuthority({ failureRate: remote.failureRate, delayMs: remote.delayMs });
}

async function start() {
  const config = loadConfig();
  const db = new Database(config.databasePath);
  await db.initialize();
  console.log(`[db] Database initialized at ${config.databasePath}`);

  // Initialize services
  const syncQueue = new SyncQueue(db);
  const syncService = new SyncService(db, syncQueue, createAuthority(config), config.sync);
  const taskService = new TaskService(db, syncQueue);
  const scheduler = new SyncScheduler(syncService, config.syncIntervalMs);

  const app = createApp({ taskService, syncService });
  const server = app.listen(config.port, () => {
    console.log(`Server running on port ${config.port} (remote: ${config.remote.mode})`);
  });
  scheduler.start();

  // Graceful shutdown
  const shutdown = (signal: string) => {
    console.log(`${signal} received, shutting down gracefully`);
    scheduler.stop();
    server.close(() => {
      db.close()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          console.error('Failed to close database:', error);
          process.exit(1);
        });
    });
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

start().catch((error: unknown) => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
