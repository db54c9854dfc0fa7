/**
 * Job Store — durable record of submitted runs.
 *
 * SQLite via better-sqlite3 (synchronous). One row per job plus one row per
 * ledger entry. Jobs expire after a TTL: expired rows read as absent and
 * purgeExpired() deletes them.
 */

import { mkdirSync } from 'fs';
import { dirname } from 'path';
import { randomUUID } from 'crypto';
import Database from 'better-sqlite3';
import { isContentKind, isRunStatus, isWorkflowShape } from '@inkline/shared';
import type { ContentKind, JobStatus, LedgerEntry } from '@inkline/shared';
import type { ContentRequest, ExecutionResultJson } from '@inkline/pipeline';

export const DEFAULT_TTL_HOURS = 24;

export interface JobRecord {
  jobId: string;
  topic: string;
  kinds: ContentKind[];
  status: JobStatus;
  progress: number;
  currentStep: string | null;
  steps: LedgerEntry[];
  result: ExecutionResultJson | null;
  error: string | null;
  createdAt: string;
  updatedAt: string;
  expiresAt: string;
}

export interface JobStoreOptions {
  ttlHours?: number;
  now?: () => Date;
}

interface JobRow {
  job_id: string;
  topic: string;
  kinds: string;
  status: JobStatus;
  progress: number;
  current_step: string | null;
  result: string | null;
  error: string | null;
  created_at: string;
  updated_at: string;
  expires_at: string;
}

interface StepRow {
  step: string;
  track: string | null;
  gate: string | null;
  success: number;
  error: string | null;
  timestamp: string;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS jobs (
    job_id       TEXT PRIMARY KEY,
    topic        TEXT NOT NULL,
    kinds        TEXT NOT NULL,
    request      TEXT NOT NULL,
    status       TEXT NOT NULL DEFAULT 'pending',
    progress     INTEGER NOT NULL DEFAULT 0,
    current_step TEXT,
    result       TEXT,
    error        TEXT,
    created_at   TEXT NOT NULL,
    updated_at   TEXT NOT NULL,
    expires_at   TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS job_steps (
    job_id    TEXT NOT NULL REFERENCES jobs(job_id) ON DELETE CASCADE,
    seq       INTEGER NOT NULL,
    step      TEXT NOT NULL,
    track     TEXT,
    gate      TEXT,
    success   INTEGER NOT NULL,
    error     TEXT,
    timestamp TEXT NOT NULL,
    PRIMARY KEY (job_id, seq)
  );

  CREATE INDEX IF NOT EXISTS idx_jobs_expires ON jobs(expires_at);
`;

const FINISHED: readonly JobStatus[] = ['completed', 'failed', 'cancelled'];

export function isFinished(status: JobStatus): boolean {
  return FINISHED.includes(status);
}

export class JobStore {
  private db: Database.Database;
  private ttlMs: number;
  private now: () => Date;

  constructor(dbPath = ':memory:', options?: JobStoreOptions) {
    if (dbPath !== ':memory:') {
      mkdirSync(dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');
    this.db.exec(SCHEMA);

    this.ttlMs = (options?.ttlHours ?? DEFAULT_TTL_HOURS) * 60 * 60 * 1000;
    this.now = options?.now ?? (() => new Date());
  }

  /**
   * Record a newly submitted request as a pending job.
   */
  create(request: ContentRequest, jobId: string = randomUUID()): JobRecord {
    const now = this.now();
    const timestamp = now.toISOString();
    const expiresAt = new Date(now.getTime() + this.ttlMs).toISOString();

    this.db.prepare(`
      INSERT INTO jobs (job_id, topic, kinds, request, status, progress, created_at, updated_at, expires_at)
      VALUES (?, ?, ?, ?, 'pending', 0, ?, ?, ?)
    `).run(jobId, request.topic, JSON.stringify(request.kinds), JSON.stringify(request), timestamp, timestamp, expiresAt);

    return {
      jobId,
      topic: request.topic,
      kinds: [...request.kinds],
      status: 'pending',
      progress: 0,
      currentStep: null,
      steps: [],
      result: null,
      error: null,
      createdAt: timestamp,
      updatedAt: timestamp,
      expiresAt,
    };
  }

  /**
   * Load a job with its step entries. Expired jobs read as absent.
   */
  get(jobId: string): JobRecord | null {
    const row = this.db.prepare<[string, string], JobRow>(
      'SELECT * FROM jobs WHERE job_id = ? AND expires_at > ?'
    ).get(jobId, this.now().toISOString());
    if (!row) return null;
    return mapJobRow(row, this.getSteps(jobId));
  }

  /**
   * Ledger entries recorded so far, in order.
   */
  getSteps(jobId: string): LedgerEntry[] {
    const rows = this.db.prepare<[string], StepRow>(
      'SELECT step, track, gate, success, error, timestamp FROM job_steps WHERE job_id = ? ORDER BY seq'
    ).all(jobId);
    return rows.map(mapStepRow);
  }

  /**
   * Live jobs, newest first.
   */
  list(limit = 50): JobRecord[] {
    const rows = this.db.prepare<[string, number], JobRow>(
      'SELECT * FROM jobs WHERE expires_at > ? ORDER BY created_at DESC, rowid DESC LIMIT ?'
    ).all(this.now().toISOString(), limit);
    return rows.map(row => mapJobRow(row, this.getSteps(row.job_id)));
  }

  markRunning(jobId: string, progress: number): void {
    this.db.prepare(`
      UPDATE jobs SET status = 'running', progress = ?, updated_at = ?
      WHERE job_id = ? AND status = 'pending'
    `).run(progress, this.now().toISOString(), jobId);
  }

  /**
   * Append one ledger entry and move the progress marker.
   */
  recordStep(jobId: string, entry: LedgerEntry, progress: number): void {
    const append = this.db.transaction(() => {
      const seq = this.db.prepare<[string], { next: number }>(
        'SELECT COALESCE(MAX(seq), 0) + 1 AS next FROM job_steps WHERE job_id = ?'
      ).get(jobId)?.next ?? 1;

      this.db.prepare(`
        INSERT INTO job_steps (job_id, seq, step, track, gate, success, error, timestamp)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?)
      `).run(jobId, seq, entry.step, entry.track, entry.gate, entry.success ? 1 : 0, entry.error, entry.timestamp);

      this.db.prepare(`
        UPDATE jobs SET progress = MAX(progress, ?), current_step = ?, updated_at = ?
        WHERE job_id = ?
      `).run(progress, entry.step, this.now().toISOString(), jobId);
    });
    append();
  }

  /**
   * Store the terminal status and serialized result. Completed jobs read 100%.
   */
  finish(jobId: string, status: JobStatus, result: ExecutionResultJson | null, error: string | null): void {
    if (!isFinished(status)) {
      throw new Error(`Cannot finish job ${jobId} with non-terminal status "${status}"`);
    }
    this.db.prepare(`
      UPDATE jobs
      SET status = ?, result = ?, error = ?, updated_at = ?,
          progress = CASE WHEN ? = 'completed' THEN 100 ELSE progress END
      WHERE job_id = ?
    `).run(status, result ? JSON.stringify(result) : null, error, this.now().toISOString(), status, jobId);
  }

  /**
   * Delete jobs past their expiry. Returns the purged job IDs.
   */
  purgeExpired(): string[] {
    const now = this.now().toISOString();
    const purge = this.db.transaction(() => {
      const ids = this.db.prepare<[string], { job_id: string }>(
        'SELECT job_id FROM jobs WHERE expires_at <= ? ORDER BY created_at'
      ).all(now).map(row => row.job_id);

      const remove = this.db.prepare('DELETE FROM jobs WHERE job_id = ?');
      for (const id of ids) remove.run(id);
      return ids;
    });
    return purge();
  }

  close(): void {
    this.db.close();
  }
}

// ─── Row Mappers ─────────────────────────────────────────────────

function mapJobRow(row: JobRow, steps: LedgerEntry[]): JobRecord {
  return {
    jobId: row.job_id,
    topic: row.topic,
    kinds: parseKinds(row.kinds),
    status: row.status,
    progress: row.progress,
    currentStep: row.current_step,
    steps,
    result: row.result ? parseResult(row.result) : null,
    error: row.error,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    expiresAt: row.expires_at,
  };
}

function mapStepRow(row: StepRow): LedgerEntry {
  return {
    step: row.step,
    track: isContentKind(row.track) ? row.track : null,
    gate: row.gate,
    success: row.success === 1,
    error: row.error,
    timestamp: row.timestamp,
  };
}

function parseKinds(json: string): ContentKind[] {
  const value: unknown = JSON.parse(json);
  return Array.isArray(value) ? value.filter(isContentKind) : [];
}

/**
 * Read a stored Execution Result back. Only the envelope is checked; a row
 * that does not look like a result reads as no result.
 */
function parseResult(json: string): ExecutionResultJson | null {
  const value: unknown = JSON.parse(json);
  return isResultJson(value) ? value : null;
}

function isResultJson(value: unknown): value is ExecutionResultJson {
  return (
    typeof value === 'object' && value !== null &&
    'runId' in value && typeof value.runId === 'string' &&
    'workflowShape' in value && isWorkflowShape(value.workflowShape) &&
    'status' in value && isRunStatus(value.status) &&
    'success' in value && typeof value.success === 'boolean' &&
    'plan' in value && Array.isArray(value.plan) &&
    'stepLedger' in value && Array.isArray(value.stepLedger) &&
    'outputs' in value && typeof value.outputs === 'object' && value.outputs !== null &&
    'errors' in value && isStringList(value.errors) &&
    'warnings' in value && isStringList(value.warnings) &&
    'startTime' in value && typeof value.startTime === 'string' &&
    'endTime' in value && (value.endTime === null || typeof value.endTime === 'string')
  );
}

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}
