/**
 * Job Runner — run pipeline requests in the background and keep their
 * Job Store rows current.
 *
 * A job's row is written only by its own task: progress comes from the
 * run's step events on the Event Bus, the terminal state from the result.
 */

import { createEvent, createLogger, getEventBus } from '@inkline/shared';
import type { BusEvent, EventBus, JobStatus, Logger, RunStatus } from '@inkline/shared';
import { errorMessage } from '@inkline/pipeline';
import type { ContentRequest, PipelineExecutor } from '@inkline/pipeline';
import { isFinished } from './job-store.js';
import type { JobRecord, JobStore } from './job-store.js';

export const PROGRESS_STARTED = 10;
export const PROGRESS_CEILING = 90;
export const PROGRESS_DONE = 100;

export type CancelOutcome = 'accepted' | 'not-found' | 'finished';

export interface JobRunnerOptions {
  bus?: EventBus;
  logger?: Logger;
}

interface Task {
  controller: AbortController;
  done: Promise<void>;
}

/**
 * Progress while running: 10 at start, then proportional to recorded
 * invocations, never above 90 until the run finishes.
 */
export function progressFor(recorded: number, planned: number): number {
  if (planned <= 0) return PROGRESS_STARTED;
  const span = PROGRESS_CEILING - PROGRESS_STARTED;
  return Math.min(PROGRESS_CEILING, PROGRESS_STARTED + Math.floor((span * recorded) / planned));
}

export function jobStatusFor(status: RunStatus): JobStatus {
  switch (status) {
    case 'completed':
    case 'failed':
    case 'cancelled':
      return status;
    case 'planned':
    case 'running':
      return 'failed';
  }
}

export class JobRunner {
  private store: JobStore;
  private executor: PipelineExecutor;
  private bus: EventBus;
  private logger: Logger;
  private tasks: Map<string, Task> = new Map();
  private unsubscribe: () => void;

  constructor(store: JobStore, executor: PipelineExecutor, options?: JobRunnerOptions) {
    this.store = store;
    this.executor = executor;
    this.bus = options?.bus ?? getEventBus();
    this.logger = options?.logger ?? createLogger({ service: 'jobs' });
    this.unsubscribe = this.bus.on('run.step_recorded', event => this.onStepRecorded(event));
  }

  /**
   * Create a pending job and start running it. Returns the stored record.
   */
  async submit(request: ContentRequest): Promise<JobRecord> {
    const job = this.store.create(request);
    const log = this.logger.child({ jobId: job.jobId });
    log.info({ kinds: job.kinds, priority: request.priority }, 'job submitted');
    await this.emit('job.created', job.jobId, { jobId: job.jobId, topic: job.topic });

    const controller = new AbortController();
    const done = this.run(job.jobId, request, controller.signal, log)
      .finally(() => this.tasks.delete(job.jobId));
    this.tasks.set(job.jobId, { controller, done });

    return job;
  }

  get(jobId: string): JobRecord | null {
    return this.store.get(jobId);
  }

  /**
   * Resolve once the job's task has finished. Null for an unknown job.
   */
  async wait(jobId: string): Promise<JobRecord | null> {
    const task = this.tasks.get(jobId);
    if (task) await task.done;
    return this.store.get(jobId);
  }

  /**
   * Ask a job to stop. The run ends before its next step.
   */
  cancel(jobId: string): CancelOutcome {
    const task = this.tasks.get(jobId);
    if (task) {
      task.controller.abort();
      this.logger.info({ jobId }, 'job cancellation requested');
      return 'accepted';
    }

    const job = this.store.get(jobId);
    if (!job) return 'not-found';
    if (isFinished(job.status)) return 'finished';

    // No live task owns this row (e.g. left over from an earlier process).
    this.store.finish(jobId, 'cancelled', null, 'Job cancelled');
    return 'accepted';
  }

  /**
   * Remove expired jobs from the store.
   */
  async purgeExpired(): Promise<string[]> {
    const jobIds = this.store.purgeExpired();
    if (jobIds.length > 0) {
      this.logger.info({ count: jobIds.length }, 'expired jobs purged');
      await this.bus.emit(createEvent('job.expired', 'jobs', { jobIds }));
    }
    return jobIds;
  }

  /**
   * Wait for every running job.
   */
  async drain(): Promise<void> {
    await Promise.all([...this.tasks.values()].map(task => task.done));
  }

  close(): void {
    this.unsubscribe();
  }

  // ─── Task ────────────────────────────────────────────────────────

  private async run(jobId: string, request: ContentRequest, signal: AbortSignal, log: Logger): Promise<void> {
    try {
      this.store.markRunning(jobId, PROGRESS_STARTED);
      await this.emit('job.updated', jobId, { jobId, status: 'running', progress: PROGRESS_STARTED });

      const result = await this.executor.execute(request, { runId: jobId, signal });
      const status = jobStatusFor(result.status);
      const error = status === 'completed' ? null : result.errors[result.errors.length - 1] ?? null;
      this.store.finish(jobId, status, result.toJSON(), error);

      log.info({ status, recorded: result.stepLedger.length }, 'job finished');
      const progress = this.store.get(jobId)?.progress ?? PROGRESS_DONE;
      await this.emit('job.updated', jobId, { jobId, status, progress });
    } catch (err) {
      log.error({ error: err }, 'job task failed');
      try {
        this.store.finish(jobId, 'failed', null, errorMessage(err));
      } catch (storeErr) {
        log.error({ error: storeErr }, 'could not record job failure');
        return;
      }
      const progress = this.store.get(jobId)?.progress ?? 0;
      await this.emit('job.updated', jobId, { jobId, status: 'failed', progress });
    }
  }

  private async onStepRecorded(event: BusEvent<'run.step_recorded'>): Promise<void> {
    const jobId = event.runId;
    if (jobId === null || !this.tasks.has(jobId)) return;

    const { entry, recorded, plannedInvocations } = event.payload;
    const progress = progressFor(recorded, plannedInvocations);
    this.store.recordStep(jobId, entry, progress);
    await this.emit('job.updated', jobId, { jobId, status: 'running', progress });
  }

  private async emit<C extends 'job.created' | 'job.updated'>(
    channel: C,
    jobId: string,
    payload: BusEvent<C>['payload']
  ): Promise<void> {
    await this.bus.emit(createEvent(channel, 'jobs', payload, { runId: jobId }));
  }
}
