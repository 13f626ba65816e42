/**
 * Fleet Scheduler
 *
 * Periodically runs a delivery cycle for every registered user.
 *
 * Lifecycle: idle -> running -> stopped. A stopped scheduler is not
 * restarted; stop() is safe to call any number of times and resolves once
 * the batch in flight (if any) has finished.
 */

import { randomUUID } from 'node:crypto';
import type { Logger } from '../types/logger.js';
import type { User } from '../types/user.js';
import type { UserDirectory } from '../ports/index.js';
import { createConcurrencyLimiter, type ConcurrencyLimiter } from './concurrency.js';
import { errorMessage } from './errors.js';
import { createTraceContext, withTraceContext } from './trace-context.js';

export type SchedulerState = 'idle' | 'running' | 'stopped';

/**
 * What the scheduler drives for each user.
 */
export interface UserProcessor {
  processUser(user: User, force: boolean): Promise<number>;
}

export interface FleetSchedulerConfig {
  /** Time between batch passes */
  tickIntervalMs: number;
  /** Upper bound on user cycles running at once */
  maxConcurrentUsers: number;
}

const DEFAULT_CONFIG: FleetSchedulerConfig = {
  tickIntervalMs: 60_000,
  maxConcurrentUsers: 8,
};

export interface BatchResult {
  batchId: string;
  usersProcessed: number;
  usersFailed: number;
  freshArticles: number;
}

export class FleetScheduler {
  private readonly users: UserDirectory;
  private readonly processor: UserProcessor;
  private readonly logger: Logger;
  private readonly config: FleetSchedulerConfig;
  private readonly limit: ConcurrencyLimiter;

  private state: SchedulerState = 'idle';
  private timer: ReturnType<typeof setInterval> | null = null;
  private currentBatch: Promise<BatchResult> | null = null;

  constructor(
    users: UserDirectory,
    processor: UserProcessor,
    logger: Logger,
    config: Partial<FleetSchedulerConfig> = {}
  ) {
    this.users = users;
    this.processor = processor;
    this.logger = logger.child({ component: 'fleet-scheduler' });
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.limit = createConcurrencyLimiter(this.config.maxConcurrentUsers);
  }

  getState(): SchedulerState {
    return this.state;
  }

  /**
   * Begin periodic batch passes. The first pass runs one interval from now.
   */
  start(): void {
    if (this.state === 'running') {
      this.logger.debug('Scheduler already running');
      return;
    }
    if (this.state === 'stopped') {
      this.logger.warn('Scheduler was stopped and cannot be restarted');
      return;
    }

    this.state = 'running';
    this.timer = setInterval(() => {
      this.tick();
    }, this.config.tickIntervalMs);

    this.logger.info(
      {
        tickIntervalMs: this.config.tickIntervalMs,
        maxConcurrentUsers: this.config.maxConcurrentUsers,
      },
      'Scheduler started'
    );
  }

  /**
   * Halt future passes. Resolves after any pass already underway completes.
   */
  async stop(): Promise<void> {
    if (this.state === 'idle') {
      this.logger.debug('Scheduler stop requested before start');
      return;
    }

    if (this.state === 'running') {
      this.state = 'stopped';
      if (this.timer) {
        clearInterval(this.timer);
        this.timer = null;
      }
      this.logger.info('Scheduler stopping');
    }

    if (this.currentBatch) {
      await this.currentBatch;
    }
  }

  /**
   * One pass over every registered user. Per-user failures are counted,
   * never propagated.
   */
  async runBatch(): Promise<BatchResult> {
    const batchId = randomUUID();
    return withTraceContext(createTraceContext(batchId, { spanId: 'batch' }), () =>
      this.processAll(batchId)
    );
  }

  private tick(): void {
    if (this.currentBatch) {
      this.logger.debug('Previous batch still running, skipping tick');
      return;
    }

    const batch = this.runBatch();
    this.currentBatch = batch;
    void batch
      .catch((error: unknown) => {
        this.logger.error({ error: errorMessage(error) }, 'Batch pass failed');
      })
      .finally(() => {
        if (this.currentBatch === batch) {
          this.currentBatch = null;
        }
      });
  }

  private async processAll(batchId: string): Promise<BatchResult> {
    const result: BatchResult = {
      batchId,
      usersProcessed: 0,
      usersFailed: 0,
      freshArticles: 0,
    };

    let users: User[];
    try {
      users = await this.users.listAll();
    } catch (error) {
      this.logger.error({ error: errorMessage(error) }, 'Failed to list users');
      return result;
    }

    const startTime = Date.now();
    const outcomes = await Promise.allSettled(
      users.map((user) => this.limit(() => this.processor.processUser(user, false)))
    );

    outcomes.forEach((outcome, index) => {
      if (outcome.status === 'fulfilled') {
        result.usersProcessed++;
        result.freshArticles += outcome.value;
        return;
      }
      result.usersFailed++;
      this.logger.error(
        { userId: users[index]?.id, error: errorMessage(outcome.reason) },
        'User cycle failed'
      );
    });

    this.logger.info(
      { ...result, users: users.length, durationMs: Date.now() - startTime },
      'Batch pass complete'
    );

    return result;
  }
}

export function createFleetScheduler(
  users: UserDirectory,
  processor: UserProcessor,
  logger: Logger,
  config?: Partial<FleetSchedulerConfig>
): FleetScheduler {
  return new FleetScheduler(users, processor, logger, config);
}
