import cron, { type ScheduledTask } from 'node-cron';
import { logThought } from '../utils/logger.js';
import type { JobConfig } from '../types/scheduler.js';

interface ScheduledJob {
  config: JobConfig;
  task: ScheduledTask;
  running: boolean;
}

/**
 * Named cron jobs on top of `node-cron`, used for the controllers' periodic
 * resync. A tick that lands while the previous run is still active is dropped.
 */
export class JobScheduler {
  readonly #jobs: Map<string, ScheduledJob> = new Map();

  /** Schedules the job immediately. Throws on a duplicate ID or an expression node-cron rejects. */
  register(config: JobConfig): void {
    if (this.#jobs.has(config.id)) {
      throw new Error(`[JobScheduler] Job '${config.id}' is already registered.`);
    }
    if (!cron.validate(config.cronExpression)) {
      throw new Error(`[JobScheduler] Invalid cron expression for job '${config.id}': ${config.cronExpression}`);
    }

    const job: ScheduledJob = {
      config,
      task: cron.schedule(config.cronExpression, () => {
        void this.#tick(job);
      }),
      running: false,
    };
    this.#jobs.set(config.id, job);
  }

  unregister(jobId: string): boolean {
    const job = this.#jobs.get(jobId);
    if (!job) return false;

    job.task.stop();
    this.#jobs.delete(jobId);
    return true;
  }

  stopAll(): void {
    for (const job of this.#jobs.values()) {
      job.task.stop();
    }
    this.#jobs.clear();
  }

  async #tick(job: ScheduledJob): Promise<void> {
    if (job.running) return;

    job.running = true;
    try {
      await job.config.handler();
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      await logThought(`[JobScheduler] Job '${job.config.id}' failed: ${message}`);
    } finally {
      job.running = false;
    }
  }
}
