import express, { type Express } from 'express';
import cors from 'cors';
import { createTaskRouter } from './routes/tasks';
import { createSyncRouter } from './routes/sync';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { requestLogger } from './middleware/requestLogger';
import type { TaskService } from './services/taskService';
import type { SyncService } from './services/syncService';

export interface AppServices {
  taskService: TaskService;
  syncService: SyncService;
}

export interface AppOptions {
  logRequests?: boolean;
}

export function createApp({ taskService, syncService }: AppServices, options: AppOptions = {}): Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());
  if (options.logRequests ?? true) {
    app.use(requestLogger);
  }

  // Routes
  app.use('/api/tasks', createTaskRouter(taskService));
  app.use('/api', createSyncRouter(syncService));

  // Error handling
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
