import { errorMessage } from '../errors';
import type { SyncService } from './syncService';

/** Triggers a sync pass on a fixed interval. An interval of 0 disables it. */
export class SyncScheduler {
  private timer: NodeJS.Timeout | null = null;

  constructor(
    private syncService: SyncService,
    private intervalMs: number,
  ) {}

  get running(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer || this.intervalMs <= 0) {
      return;
    }
    this.timer = setInterval(() => {
      void this.tick();
    }, this.intervalMs);
    this.timer.unref();
    console.log(`[sync] Scheduled sync every ${this.intervalMs}ms`);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  async tick(): Promise<void> {
    try {
      await this.syncService.processQueue();
    } catch (error) {
      console.error('[sync] Scheduled sync failed:', errorMessage(error));
    }
  }
}
