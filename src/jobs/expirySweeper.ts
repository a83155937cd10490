import cron from 'node-cron';
import type { ScheduledTask } from 'node-cron';
import { ConfigurationError } from '../errors';
import type { StorageProvider } from '../storage/interfaces';
import { DAY_MS } from '../types';

export interface ExpirySweeperOptions {
  provider: StorageProvider;
  dayspan: number;
  /** cron expression, every minute by default */
  schedule?: string;
  batchSize?: number;
  now?: () => Date;
}

export interface SweepStatistics {
  isRunning: boolean;
  scheduled: boolean;
  lastRun?: Date;
  lastDeleted: number;
  totalDeleted: number;
}

/**
 * Expiry Sweeper Job
 * Periodically deletes texts older than the retention horizon. All it needs is
 * the provider, so a restarted process simply picks up where the last one stopped.
 */
export class ExpirySweeper {
  private readonly provider: StorageProvider;
  private readonly dayspan: number;
  private readonly schedule: string;
  private readonly batchSize?: number;
  private readonly now: () => Date;

  private task: ScheduledTask | null = null;
  private isRunning: boolean = false;
  private lastRun?: Date;
  private lastDeleted = 0;
  private totalDeleted = 0;

  constructor(options: ExpirySweeperOptions) {
    this.provider = options.provider;
    this.dayspan = options.dayspan;
    this.schedule = options.schedule ?? '* * * * *';
    this.batchSize = options.batchSize;
    this.now = options.now ?? (() => new Date());

    if (!cron.validate(this.schedule)) {
      throw new ConfigurationError(`Invalid sweep schedule: "${this.schedule}"`);
    }
  }

  start(): void {
    if (this.task) {
      return;
    }

    this.task = cron.schedule(this.schedule, async () => {
      await this.runSweep();
    }, {
      scheduled: true,
      timezone: 'UTC'
    });

    console.log(`🕐 Expiry sweeper scheduled: ${this.schedule}`);
  }

  stop(): void {
    if (this.task) {
      this.task.stop();
      this.task = null;
      console.log('🛑 Expiry sweeper stopped');
    }
  }

  /**
   * Delete every text created before now - dayspan. Returns how many were deleted.
   */
  async runSweep(): Promise<number> {
    if (this.isRunning) {
      console.log('⏳ Expiry sweep already running, skipping...');
      return 0;
    }

    this.isRunning = true;
    this.lastRun = this.now();
    const cutoff = new Date(this.lastRun.getTime() - this.dayspan * DAY_MS);
    let deleted = 0;

    try {
      for await (const batch of this.provider.listExpired(cutoff, this.batchSize)) {
        for (const id of batch) {
          try {
            await this.provider.delete(id);
            deleted++;
          } catch (error) {
            console.error('Error deleting expired text:', error instanceof Error ? error.message : error);
          }
        }
      }
    } catch (error) {
      console.error('❌ Expiry sweep failed:', error instanceof Error ? error.message : error);
    } finally {
      this.isRunning = false;
      this.lastDeleted = deleted;
      this.totalDeleted += deleted;
    }

    if (deleted > 0) {
      console.log(`🧹 Expiry sweep completed: ${deleted} expired texts removed`);
    }
    return deleted;
  }

  getStatistics(): SweepStatistics {
    return {
      isRunning: this.isRunning,
      scheduled: this.task !== null,
      lastRun: this.lastRun,
      lastDeleted: this.lastDeleted,
      totalDeleted: this.totalDeleted
    };
  }
}
