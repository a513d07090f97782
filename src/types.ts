export type SyncStatusValue = 'pending' | 'synced' | 'error';

export type OperationType = 'create' | 'update' | 'delete';

export const OPERATION_TYPES: readonly OperationType[] = ['create', 'update', 'delete'];

export interface Task {
  id: string;
  title: string;
  description: string | null;
  completed: boolean;
  created_at: string;
  updated_at: string;
  is_deleted: boolean;
  sync_status: SyncStatusValue;
  server_id: string | null;
  last_synced_at: string | null;
}

// Row shape as stored by sqlite3 (booleans are 0/1)
export interface TaskRow {
  id: string;
  title: string;
  description: string | null;
  completed: number;
  created_at: string;
  updated_at: string;
  is_deleted: number;
  sync_status: SyncStatusValue;
  server_id: string | null;
  last_synced_at: string | null;
}

export interface CreateTaskInput {
  title: string;
  description?: string | null;
  completed?: boolean;
}

export interface UpdateTaskInput {
  title?: string;
  description?: string | null;
  completed?: boolean;
}

export interface SyncQueueItem {
  id: number;
  task_id: string;
  operation_type: OperationType;
  task_data: string;
  retry_count: number;
  created_at: string;
  last_attempt: string | null;
  error_message: string | null;
}

export type QueueStatusFilter = 'pending' | 'failed';

export interface SyncQueueOptions {
  limit: number;
  offset: number;
  status?: QueueStatusFilter;
}

// Effective state of a task as held by the remote authority
export interface RemoteTaskState {
  id: string;
  title: string;
  description: string | null;
  completed: boolean;
  is_deleted: boolean;
  updated_at: string;
  operation: OperationType;
}

export interface SyncAck {
  serverId: string;
  adopt?: RemoteTaskState;
}

export type SyncItemStatus = 'success' | 'error' | 'exhausted' | 'skipped';

export interface SyncItemResult {
  operationId: number;
  taskId: string;
  operation: OperationType;
  status: SyncItemStatus;
  error?: string;
}

export interface SyncReport {
  success: boolean;
  processed: number;
  synced: number;
  failed: number;
  skipped: number;
  exhausted: number;
  details: SyncItemResult[];
}

export interface SyncStatus {
  pendingCount: number;
  errorCount: number;
  lastSyncTime: string | null;
  inProgress: boolean;
}

export interface RetryResult {
  retried: number;
  failed: number;
}

export interface SyncSettings {
  maxRetries: number;
  batchSize: number;
  retryBackoffMs: number;
}
