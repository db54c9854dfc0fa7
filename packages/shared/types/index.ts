/**
 * Inkline Shared Types
 *
 * Vocabulary every package speaks: content kinds, workflow shapes,
 * ledger entries, run/job statuses and the Event Bus envelope.
 */

// ─── Content Vocabulary ───────────────────────────────────────────

export const CONTENT_KINDS = [
  'article',
  'blog-post',
  'social-post',
  'presentation',
  'email',
  'newsletter',
  'video-script',
  'whitepaper',
  'case-study',
] as const;

export type ContentKind = (typeof CONTENT_KINDS)[number];

export const PRIORITIES = ['normal', 'high', 'urgent'] as const;

export type Priority = (typeof PRIORITIES)[number];

export const TONES = [
  'professional',
  'conversational',
  'technical',
  'persuasive',
  'educational',
  'inspirational',
] as const;

export type Tone = (typeof TONES)[number];

export const OUTPUT_FORMATS = ['markdown', 'html', 'docx', 'pdf', 'pptx'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export function isContentKind(value: unknown): value is ContentKind {
  return typeof value === 'string' && (CONTENT_KINDS as readonly string[]).includes(value);
}

export function isPriority(value: unknown): value is Priority {
  return typeof value === 'string' && (PRIORITIES as readonly string[]).includes(value);
}

export function isTone(value: unknown): value is Tone {
  return typeof value === 'string' && (TONES as readonly string[]).includes(value);
}

export function isOutputFormat(value: unknown): value is OutputFormat {
  return typeof value === 'string' && (OUTPUT_FORMATS as readonly string[]).includes(value);
}

// ─── Workflow Shapes ──────────────────────────────────────────────

export const WORKFLOW_SHAPES = [
  'single-track',
  'multi-target',
  'presentation',
  'social-only',
  'email-sequence',
] as const;

export type WorkflowShape = (typeof WORKFLOW_SHAPES)[number];

export function isWorkflowShape(value: unknown): value is WorkflowShape {
  return typeof value === 'string' && (WORKFLOW_SHAPES as readonly string[]).includes(value);
}

// ─── Runs ─────────────────────────────────────────────────────────

export const RUN_STATUSES = ['planned', 'running', 'completed', 'failed', 'cancelled'] as const;

export type RunStatus = (typeof RUN_STATUSES)[number];

export function isRunStatus(value: unknown): value is RunStatus {
  return typeof value === 'string' && (RUN_STATUSES as readonly string[]).includes(value);
}

export interface LedgerEntry {
  step: string;
  track: ContentKind | null;  // fan-out tracks only
  gate: string | null;
  success: boolean;
  error: string | null;
  timestamp: string;          // ISO 8601
}

// ─── Jobs ─────────────────────────────────────────────────────────

export type JobStatus = 'pending' | 'running' | 'completed' | 'failed' | 'cancelled';

// ─── Event Bus ────────────────────────────────────────────────────

export interface EventPayloads {
  'run.started': { workflowShape: WorkflowShape; kinds: ContentKind[]; plannedInvocations: number };
  'run.step_recorded': { entry: LedgerEntry; recorded: number; plannedInvocations: number };
  'run.gate_failed': { step: string; track: ContentKind | null; gate: string; problems: string[]; strict: boolean };
  'run.completed': { workflowShape: WorkflowShape; recorded: number; warnings: number };
  'run.failed': { workflowShape: WorkflowShape; error: string };
  'run.cancelled': { workflowShape: WorkflowShape; step: string };
  'job.created': { jobId: string; topic: string };
  'job.updated': { jobId: string; status: JobStatus; progress: number };
  'job.expired': { jobIds: string[] };
}

export type EventChannel = keyof EventPayloads;

export type EventSource = 'pipeline' | 'jobs' | 'api';

export interface BusEvent<C extends EventChannel = EventChannel> {
  channel: C;
  timestamp: string;
  source: EventSource;
  runId: string | null;
  payload: EventPayloads[C];
}

export type EventHandler<E extends BusEvent = BusEvent> = (event: E) => void | Promise<void>;
