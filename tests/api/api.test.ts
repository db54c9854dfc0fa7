/**
 * API Test Suite — the Express surface on an ephemeral local port.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';

import { createLogger } from '@inkline/shared';
import { DEFAULT_CONFIG } from '@inkline/pipeline';
import type { EngineConfig } from '@inkline/pipeline';
import { startServer } from '@inkline/api';
import type { RunningServer } from '@inkline/api';
import { deferred, makeResearch, stubProducers } from '../helpers/producers.js';

// ─── Test Helpers ─────────────────────────────────────────────────

let tempDir: string;
let running: RunningServer;
let hold: ReturnType<typeof deferred>;
let started: ReturnType<typeof deferred>;
let blockResearch: boolean;

beforeEach(async () => {
  tempDir = mkdtempSync(join(tmpdir(), 'inkline-api-'));
  hold = deferred();
  started = deferred();
  blockResearch = false;

  const { producers } = stubProducers({
    research: {
      invoke: async (input) => {
        if (blockResearch) {
          started.release();
          await hold.promise;
        }
        return makeResearch(input.topic);
      },
    },
  });

  const config: EngineConfig = {
    ...DEFAULT_CONFIG,
    jobs: { ttlHours: 24, dbPath: join(tempDir, 'jobs.db') },
    server: { port: 0, corsOrigins: [] },
    logging: { level: 'silent' },
  };

  running = await startServer({ producers, config, logger: createLogger({ level: 'silent' }) });
});

afterEach(async () => {
  hold.release();
  await running.close();
  rmSync(tempDir, { recursive: true, force: true });
});

async function call(method: 'GET' | 'POST', path: string, body?: unknown): Promise<{ status: number; body: Record<string, unknown> }> {
  const res = await fetch(`http://127.0.0.1:${running.port}/api${path}`, {
    method,
    headers: body === undefined ? undefined : { 'content-type': 'application/json' },
    body: body === undefined ? undefined : typeof body === 'string' ? body : JSON.stringify(body),
  });
  const json: unknown = await res.json();
  return {
    status: res.status,
    body: typeof json === 'object' && json !== null && !Array.isArray(json) ? Object.fromEntries(Object.entries(json)) : {},
  };
}

const VALID = { topic: 'Quarterly product launch recap', kinds: ['article'] };

// ═══════════════════════════════════════════════════════════════════
// Read-only endpoints
// ═══════════════════════════════════════════════════════════════════

describe('Read-only endpoints', () => {
  it('GET /health', async () => {
    expect(await call('GET', '/health')).toEqual({ status: 200, body: { status: 'ok', version: '0.1.0' } });
  });

  it('GET /workflows/shapes lists every shape', async () => {
    const { status, body } = await call('GET', '/workflows/shapes');
    expect(status).toBe(200);
    expect(body.shapes).toHaveLength(5);
    expect(body.shapes).toContainEqual({
      shape: 'social-only',
      description: 'Social media content only',
      steps: ['research', 'brief', 'draft', 'voice-check'],
    });
  });

  it('POST /workflows/plan returns the plan without running it', async () => {
    const { status, body } = await call('POST', '/workflows/plan', { ...VALID, kinds: ['presentation', 'email'] });

    expect(status).toBe(200);
    expect(body.workflowShape).toBe('multi-target');
    expect(body.steps).toContainEqual({
      stepName: 'draft',
      producerRole: 'draft',
      inputKind: 'content-brief',
      outputKind: 'draft-content',
      gateName: 'draft-completeness',
      parallel: true,
      tracks: ['presentation', 'email'],
    });
    expect(running.store.list()).toHaveLength(0);
  });

  it('POST /workflows/plan rejects invalid requests', async () => {
    const { status, body } = await call('POST', '/workflows/plan', { topic: 'Quarterly product launch recap', kinds: ['podcast'] });
    expect(status).toBe(400);
    expect(body.errors).toHaveLength(1);
  });
});

// ═══════════════════════════════════════════════════════════════════
// Jobs
// ═══════════════════════════════════════════════════════════════════

describe('Workflow jobs', () => {
  it('rejects an invalid body with every error', async () => {
    const { status, body } = await call('POST', '/workflows', { topic: 'hi', kinds: [] });
    expect(status).toBe(400);
    expect(body.errors).toEqual([
      '"topic" must be between 10 and 2000 characters',
      '"kinds" is required and must be a non-empty array',
    ]);
  });

  it('rejects malformed JSON', async () => {
    const { status, body } = await call('POST', '/workflows', '{"topic": ');
    expect(status).toBe(400);
    expect(body).toEqual({ errors: ['Request body must be valid JSON'] });
  });

  it('accepts a request and serves its status and result', async () => {
    const submitted = await call('POST', '/workflows', VALID);
    expect(submitted.status).toBe(202);
    expect(submitted.body.status).toBe('pending');
    const jobId = String(submitted.body.jobId);

    await running.runner.wait(jobId);

    const status = await call('GET', `/workflows/${jobId}`);
    expect(status.status).toBe(200);
    expect(status.body).toMatchObject({ jobId, status: 'completed', progress: 100, currentStep: 'format', error: null });
    expect(status.body.steps).toHaveLength(5);

    const result = await call('GET', `/workflows/${jobId}/result`);
    expect(result.status).toBe(200);
    expect(result.body.status).toBe('completed');
    expect(result.body.result).toMatchObject({ runId: jobId, workflowShape: 'single-track', status: 'completed', success: true });
  });

  it('answers 409 for the result of an unfinished job, then cancels it', async () => {
    blockResearch = true;
    const submitted = await call('POST', '/workflows', VALID);
    const jobId = String(submitted.body.jobId);
    await started.promise;

    const early = await call('GET', `/workflows/${jobId}/result`);
    expect(early.status).toBe(409);
    expect(early.body).toMatchObject({ error: 'Job is not finished', status: 'running' });

    const cancel = await call('POST', `/workflows/${jobId}/cancel`);
    expect(cancel).toEqual({ status: 202, body: { jobId, status: 'cancelling' } });

    hold.release();
    await running.runner.wait(jobId);

    const final = await call('GET', `/workflows/${jobId}`);
    expect(final.body).toMatchObject({ status: 'cancelled', error: 'Run cancelled before step "brief"' });

    const again = await call('POST', `/workflows/${jobId}/cancel`);
    expect(again).toEqual({ status: 409, body: { error: 'Job has already finished' } });
  });

  it('answers 404 for unknown jobs', async () => {
    expect(await call('GET', '/workflows/no-such-job')).toEqual({ status: 404, body: { error: 'Job not found' } });
    expect((await call('GET', '/workflows/no-such-job/result')).status).toBe(404);
    expect((await call('POST', '/workflows/no-such-job/cancel')).status).toBe(404);
  });
});
