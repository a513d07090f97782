import axios, { type AxiosInstance } from 'axios';
import { DeliveryError } from '../errors';
import { isOperationType } from '../services/syncQueue';
import { isRecord } from '../utils/guards';
import type { OperationType, RemoteTaskState, Task } from '../types';
import type { DeliveryResult, RemoteAuthority } from './types';

export interface HttpAuthorityOptions {
  baseUrl: string;
  timeoutMs?: number;
  client?: AxiosInstance;
}

// A response body is only trusted as remote state if it carries every field
function toRemoteState(body: unknown, operation: OperationType): RemoteTaskState | undefined {
  if (!isRecord(body)) return undefined;
  const { id, title, description, completed, is_deleted, updated_at } = body;
  if (
    typeof id !== 'string' ||
    typeof title !== 'string' ||
    typeof completed !== 'boolean' ||
    typeof updated_at !== 'string' ||
    (description !== null && typeof description !== 'string')
  ) {
    return undefined;
  }
  return {
    id,
    title,
    description: typeof description === 'string' ? description : null,
    completed,
    is_deleted: is_deleted === true,
    updated_at,
    operation: isOperationType(body.operation) ? body.operation : operation,
  };
}

function serverIdFrom(body: unknown, fallback: string): string {
  if (isRecord(body)) {
    if (typeof body.server_id === 'string' && body.server_id !== '') return body.server_id;
    if (typeof body.id === 'string' && body.id !== '') return body.id;
  }
  return fallback;
}

/** Delivers operations to a REST endpoint shaped like this service's task routes. */
export class HttpRemoteAuthority implements RemoteAuthority {
  private client: AxiosInstance;

  constructor(options: HttpAuthorityOptions) {
    this.client =
      options.client ??
      axios.create({
        baseURL: options.baseUrl,
        timeout: options.timeoutMs ?? 5000,
      });
  }

  async deliver(operation: OperationType, snapshot: Task): Promise<DeliveryResult> {
    const payload = {
      id: snapshot.id,
      title: snapshot.title,
      description: snapshot.description,
      completed: snapshot.completed,
      is_deleted: snapshot.is_deleted,
      updated_at: snapshot.updated_at,
    };
    const target = encodeURIComponent(snapshot.server_id ?? snapshot.id);

    try {
      let body: unknown;
      switch (operation) {
        case 'create':
          body = (await this.client.post<unknown>('/tasks', payload)).data;
          break;
        case 'update':
          body = (await this.client.put<unknown>(`/tasks/${target}`, payload)).data;
          break;
        case 'delete':
          body = (await this.client.delete<unknown>(`/tasks/${target}`, { data: payload })).data;
          break;
      }

      return {
        ok: true,
        serverId: serverIdFrom(body, snapshot.server_id ?? snapshot.id),
        current: toRemoteState(body, operation),
      };
    } catch (error) {
      if (axios.isAxiosError<unknown>(error)) {
        const data = error.response?.data;
        const message = isRecord(data) && typeof data.message === 'string' ? data.message : error.message;
        throw new DeliveryError(`API Error: ${message}`, error);
      }
      throw error;
    }
  }

  async checkConnectivity(): Promise<boolean> {
    try {
      await this.client.get('/health', {
        timeout: 5000,
        validateStatus: (status) => status < 500, // 4xx still means the server answered
      });
      return true;
    } catch (error) {
      console.error('[remote] Connectivity check failed:', error instanceof Error ? error.message : error);
      return false;
    }
  }
}
