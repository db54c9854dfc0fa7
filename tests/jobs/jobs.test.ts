/**
 * Jobs Test Suite
 *
 * 1. Job Store: create, progress, finish, expiry (SQLite in a temp dir)
 * 2. Job Runner: background runs, progress from step events, cancel, purge
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import Database from 'better-sqlite3';

import { EventBus, createLogger } from '@inkline/shared';
import type { LedgerEntry } from '@inkline/shared';
import { PipelineExecutor } from '@inkline/pipeline';
import type { Producers } from '@inkline/pipeline';
import { JobRunner, JobStore, jobStatusFor, progressFor } from '@inkline/jobs';
import { deferred, makeRequest, makeResearch, stubProducers } from '../helpers/producers.js';

// ─── Test Helpers ─────────────────────────────────────────────────

let tempDir: string;
let clock: Date;
let store: JobStore;
let bus: EventBus;
const silent = createLogger({ level: 'silent' });

beforeEach(() => {
  tempDir = mkdtempSync(join(tmpdir(), 'inkline-jobs-'));
  clock = new Date('2026-03-01T09:00:00.000Z');
  store = new JobStore(join(tempDir, 'nested', 'jobs.db'), { ttlHours: 24, now: () => clock });
  bus = new EventBus({ logger: silent });
});

afterEach(() => {
  store.close();
  rmSync(tempDir, { recursive: true, force: true });
});

function entry(step: string, success = true): LedgerEntry {
  return {
    step,
    track: null,
    gate: null,
    success,
    error: success ? null : 'boom',
    timestamp: clock.toISOString(),
  };
}

function runnerWith(overrides: Partial<Producers> = {}): JobRunner {
  const { producers } = stubProducers(overrides);
  const executor = new PipelineExecutor(producers, { bus, logger: silent });
  return new JobRunner(store, executor, { bus, logger: silent });
}

// ═══════════════════════════════════════════════════════════════════
// Job Store
// ═══════════════════════════════════════════════════════════════════

describe('Job Store', () => {
  it('creates pending jobs with an expiry', () => {
    const job = store.create(makeRequest(['article']), 'job-1');

    expect(job).toMatchObject({
      jobId: 'job-1',
      topic: 'Remote work and team productivity',
      kinds: ['article'],
      status: 'pending',
      progress: 0,
      currentStep: null,
      steps: [],
      result: null,
      createdAt: '2026-03-01T09:00:00.000Z',
      expiresAt: '2026-03-02T09:00:00.000Z',
    });
    expect(store.get('job-1')).toEqual(job);
  });

  it('tracks running state, step entries and progress', () => {
    store.create(makeRequest(['email']), 'job-2');
    store.markRunning('job-2', 10);
    store.recordStep('job-2', entry('research'), 26);
    store.recordStep('job-2', entry('brief', false), 42);

    const job = store.get('job-2');
    expect(job?.status).toBe('running');
    expect(job?.progress).toBe(42);
    expect(job?.currentStep).toBe('brief');
    expect(job?.steps.map(s => [s.step, s.success, s.error])).toEqual([
      ['research', true, null],
      ['brief', false, 'boom'],
    ]);
  });

  it('progress never moves backwards', () => {
    store.create(makeRequest(['email']), 'job-3');
    store.recordStep('job-3', entry('research'), 50);
    store.recordStep('job-3', entry('brief'), 30);
    expect(store.get('job-3')?.progress).toBe(50);
  });

  it('finishing a completed job stores the result at 100%', () => {
    store.create(makeRequest(['article']), 'job-4');
    store.markRunning('job-4', 10);

    const result = {
      runId: 'job-4',
      workflowShape: 'single-track' as const,
      status: 'completed' as const,
      success: true,
      plan: [],
      stepLedger: [],
      outputs: { researchBrief: makeResearch().toJSON() },
      errors: [],
      warnings: [],
      startTime: clock.toISOString(),
      endTime: clock.toISOString(),
    };
    store.finish('job-4', 'completed', result, null);

    const job = store.get('job-4');
    expect(job?.status).toBe('completed');
    expect(job?.progress).toBe(100);
    expect(job?.result).toEqual(result);
  });

  it('a stored result without the result envelope reads as none', () => {
    store.create(makeRequest(['article']), 'job-7');
    const raw = new Database(join(tempDir, 'nested', 'jobs.db'));
    raw.prepare('UPDATE jobs SET result = ? WHERE job_id = ?').run('{"runId":"job-7","status":"done"}', 'job-7');
    raw.close();

    expect(store.get('job-7')?.result).toBeNull();
    expect(store.get('job-7')?.status).toBe('pending');
  });

  it('failed jobs keep their progress and error', () => {
    store.create(makeRequest(['article']), 'job-5');
    store.markRunning('job-5', 10);
    store.finish('job-5', 'failed', null, 'brief: upstream unavailable');

    expect(store.get('job-5')).toMatchObject({ status: 'failed', progress: 10, error: 'brief: upstream unavailable' });
  });

  it('refuses a non-terminal finish', () => {
    store.create(makeRequest(['article']), 'job-6');
    expect(() => store.finish('job-6', 'running', null, null)).toThrow(
      'Cannot finish job job-6 with non-terminal status "running"'
    );
  });

  it('expired jobs read as absent and are purged', () => {
    store.create(makeRequest(['article']), 'old');
    clock = new Date('2026-03-01T20:00:00.000Z');
    store.create(makeRequest(['email']), 'new');
    store.recordStep('old', entry('research'), 26);

    clock = new Date('2026-03-02T09:00:00.000Z');
    expect(store.get('old')).toBeNull();
    expect(store.get('new')?.jobId).toBe('new');
    expect(store.list().map(j => j.jobId)).toEqual(['new']);

    expect(store.purgeExpired()).toEqual(['old']);
    expect(store.purgeExpired()).toEqual([]);
    expect(store.getSteps('old')).toEqual([]);
  });

  it('lists newest first', () => {
    store.create(makeRequest(['article']), 'first');
    clock = new Date('2026-03-01T10:00:00.000Z');
    store.create(makeRequest(['article']), 'second');

    expect(store.list().map(j => j.jobId)).toEqual(['second', 'first']);
    expect(store.list(1).map(j => j.jobId)).toEqual(['second']);
  });
});

// ═══════════════════════════════════════════════════════════════════
// Job Runner
// ═══════════════════════════════════════════════════════════════════

describe('Job Runner', () => {
  it('maps progress onto 10..90', () => {
    expect(progressFor(0, 5)).toBe(10);
    expect(progressFor(1, 5)).toBe(26);
    expect(progressFor(3, 4)).toBe(70);
    expect(progressFor(5, 5)).toBe(90);
    expect(progressFor(9, 5)).toBe(90);
    expect(progressFor(1, 0)).toBe(10);
  });

  it('maps run statuses to job statuses', () => {
    expect(jobStatusFor('completed')).toBe('completed');
    expect(jobStatusFor('cancelled')).toBe('cancelled');
    expect(jobStatusFor('running')).toBe('failed');
  });

  it('runs a submitted job to completion', async () => {
    const runner = runnerWith();
    const submitted = await runner.submit(makeRequest(['article']));
    expect(submitted.status).toBe('pending');

    const job = await runner.wait(submitted.jobId);
    expect(job?.status).toBe('completed');
    expect(job?.progress).toBe(100);
    expect(job?.currentStep).toBe('format');
    expect(job?.steps.map(s => s.step)).toEqual(['research', 'brief', 'draft', 'voice-check', 'format']);
    expect(job?.result?.runId).toBe(submitted.jobId);
    expect(job?.result?.status).toBe('completed');
    expect(job?.error).toBeNull();
    runner.close();
  });

  it('publishes job progress as steps are recorded', async () => {
    const progress: number[] = [];
    const statuses: string[] = [];
    bus.on('job.updated', event => {
      progress.push(event.payload.progress);
      statuses.push(event.payload.status);
    });

    const runner = runnerWith();
    const { jobId } = await runner.submit(makeRequest(['article']));
    await runner.wait(jobId);

    expect(progress).toEqual([10, 26, 42, 58, 74, 90, 100]);
    expect(statuses[statuses.length - 1]).toBe('completed');
    expect(bus.getHistory('job.created')).toHaveLength(1);
    runner.close();
  });

  it('records a failed run with its last error', async () => {
    const runner = runnerWith({
      brief: {
        invoke: () => {
          throw new Error('upstream unavailable');
        },
      },
    });
    const { jobId } = await runner.submit(makeRequest(['article']));
    const job = await runner.wait(jobId);

    expect(job?.status).toBe('failed');
    expect(job?.error).toBe('brief: upstream unavailable');
    expect(job?.progress).toBe(42);
    expect(job?.result?.success).toBe(false);
    runner.close();
  });

  it('cancels a running job before its next step', async () => {
    const started = deferred();
    const hold = deferred();
    const runner = runnerWith({
      research: {
        invoke: async (input) => {
          started.release();
          await hold.promise;
          return makeResearch(input.topic);
        },
      },
    });

    const { jobId } = await runner.submit(makeRequest(['article']));
    await started.promise;
    expect(runner.get(jobId)?.status).toBe('running');
    expect(runner.cancel(jobId)).toBe('accepted');
    hold.release();

    const job = await runner.wait(jobId);
    expect(job?.status).toBe('cancelled');
    expect(job?.error).toBe('Run cancelled before step "brief"');
    expect(job?.steps.map(s => s.step)).toEqual(['research']);
    expect(job?.progress).toBe(26);

    expect(runner.cancel(jobId)).toBe('finished');
    expect(runner.cancel('missing')).toBe('not-found');
    runner.close();
  });

  it('cancels an orphaned pending row directly', () => {
    const runner = runnerWith();
    store.create(makeRequest(['article']), 'orphan');

    expect(runner.cancel('orphan')).toBe('accepted');
    expect(store.get('orphan')).toMatchObject({ status: 'cancelled', error: 'Job cancelled' });
    runner.close();
  });

  it('purges expired jobs and announces them', async () => {
    const runner = runnerWith();
    const { jobId } = await runner.submit(makeRequest(['article']));
    await runner.wait(jobId);

    clock = new Date('2026-03-03T09:00:00.000Z');
    expect(await runner.purgeExpired()).toEqual([jobId]);
    expect(runner.get(jobId)).toBeNull();
    expect(await runner.wait(jobId)).toBeNull();

    const expired = bus.getHistory('job.expired');
    expect(expired).toHaveLength(1);
    expect(expired[0].payload).toEqual({ jobIds: [jobId] });
    runner.close();
  });

  it('ignores step events from runs it does not own', async () => {
    const runner = runnerWith();
    const { producers } = stubProducers();
    await new PipelineExecutor(producers, { bus, logger: silent }).execute(makeRequest(['article']), { runId: 'foreign' });

    expect(store.get('foreign')).toBeNull();
    expect(store.getSteps('foreign')).toEqual([]);
    runner.close();
  });
});
