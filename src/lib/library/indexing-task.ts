/**
 * Indexing Task
 *
 * Handle for a cancellable background indexing run. Cancellation aborts the
 * run's signal and waits for it to settle, so no lookup outlives `cancel()`.
 */

import { createLogger, type Logger } from '@/lib/logger';

export type IndexingState = 'idle' | 'running' | 'completed' | 'failed' | 'cancelled';

export type IndexingJob = (signal: AbortSignal) => Promise<void>;

export interface IndexingStatus {
  state: IndexingState;
  startedAt: string | null;
  finishedAt: string | null;
  error: string | null;
}

export class IndexingCancelledError extends Error {
  constructor() {
    super('Indexing cancelled');
    this.name = 'IndexingCancelledError';
  }
}

export class IndexingTask {
  private controller: AbortController | null = null;
  private current: Promise<void> | null = null;
  private state: IndexingState = 'idle';
  private startedAt: Date | null = null;
  private finishedAt: Date | null = null;
  private lastError: string | null = null;
  private readonly logger: Logger;

  constructor(
    private readonly job: IndexingJob,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger('IndexingTask');
  }

  get running(): boolean {
    return this.state === 'running';
  }

  /**
   * Start a run unless one is already in flight.
   * @returns false when a run was already in flight
   */
  start(): boolean {
    if (this.running) {
      return false;
    }

    const controller = new AbortController();
    this.controller = controller;
    this.state = 'running';
    this.startedAt = new Date();
    this.finishedAt = null;
    this.lastError = null;
    this.current = this.execute(controller.signal);
    return true;
  }

  /**
   * Wait for the in-flight run, if any. Never rejects.
   */
  async wait(): Promise<void> {
    if (this.current) {
      await this.current;
    }
  }

  /**
   * Abort the in-flight run and wait for it to settle.
   */
  async cancel(): Promise<void> {
    if (this.controller && !this.controller.signal.aborted) {
      this.logger.info('Cancelling indexing run');
      this.controller.abort(new IndexingCancelledError());
    }
    await this.wait();
  }

  status(): IndexingStatus {
    return {
      state: this.state,
      startedAt: this.startedAt?.toISOString() ?? null,
      finishedAt: this.finishedAt?.toISOString() ?? null,
      error: this.lastError,
    };
  }

  private async execute(signal: AbortSignal): Promise<void> {
    try {
      await this.job(signal);
      this.state = 'completed';
    } catch (error) {
      if (signal.aborted) {
        this.state = 'cancelled';
        this.logger.info('Indexing run cancelled');
      } else {
        this.state = 'failed';
        this.lastError = error instanceof Error ? error.message : String(error);
        this.logger.error('Indexing run failed', error);
      }
    } finally {
      this.finishedAt = new Date();
      this.controller = null;
    }
  }
}
