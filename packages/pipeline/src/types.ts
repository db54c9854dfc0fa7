/**
 * Pipeline Types — requests, plans, step descriptors, producers, results.
 *
 * Step descriptors are pure data: one variant per step kind, built once by
 * the Plan Builder and never mutated by the Executor.
 */

import type {
  ContentKind,
  Priority,
  Tone,
  OutputFormat,
  WorkflowShape,
  LedgerEntry,
  RunStatus,
} from '@inkline/shared';
import type {
  ArtifactJson,
  ResearchBrief,
  ContentBrief,
  DraftContent,
  VoiceCheckResult,
  ProductionOutput,
} from './artifacts.js';

// ─── Request ─────────────────────────────────────────────────────

export interface ContentRequest {
  readonly topic: string;
  readonly kinds: readonly ContentKind[];
  readonly priority: Priority;
  readonly deadline: string | null;
  readonly context: Readonly<Record<string, unknown>>;
}

export interface ContentRequestInit {
  topic: string;
  kinds: ContentKind[];
  priority?: Priority;
  deadline?: string | null;
  context?: Record<string, unknown>;
}

export type RequestParseResult =
  | { ok: true; request: ContentRequest }
  | { ok: false; errors: string[] };

export interface Requirements {
  readonly topic: string;
  readonly kinds: readonly ContentKind[];
  readonly priority: Priority;
  readonly deadline: string | null;
  readonly context: Readonly<Record<string, unknown>>;
}

// ─── Steps ───────────────────────────────────────────────────────

export const STEP_NAMES = ['research', 'brief', 'draft', 'voice-check', 'format'] as const;

export type StepName = (typeof STEP_NAMES)[number];

export type InputKind = 'request' | 'research-brief' | 'content-brief' | 'draft-content';

interface StepBase {
  readonly gateName: string | null;
  readonly parallel: boolean;
  readonly tracks: readonly ContentKind[] | null;
}

export interface ResearchStep extends StepBase {
  readonly stepName: 'research';
  readonly producerRole: 'research';
  readonly inputKind: 'request';
  readonly outputKind: 'research-brief';
}

export interface BriefStep extends StepBase {
  readonly stepName: 'brief';
  readonly producerRole: 'brief';
  readonly inputKind: 'research-brief';
  readonly outputKind: 'content-brief';
}

export interface DraftStep extends StepBase {
  readonly stepName: 'draft';
  readonly producerRole: 'draft';
  readonly inputKind: 'content-brief';
  readonly outputKind: 'draft-content';
}

export interface VoiceCheckStep extends StepBase {
  readonly stepName: 'voice-check';
  readonly producerRole: 'voice-check';
  readonly inputKind: 'draft-content';
  readonly outputKind: 'voice-check-result';
}

export interface FormatStep extends StepBase {
  readonly stepName: 'format';
  readonly producerRole: 'format';
  readonly inputKind: 'draft-content';
  readonly outputKind: 'production-output';
}

export type Step = ResearchStep | BriefStep | DraftStep | VoiceCheckStep | FormatStep;

export type WorkflowTable = Readonly<Record<WorkflowShape, readonly StepName[]>>;

export interface Plan {
  readonly shape: WorkflowShape;
  readonly description: string;
  readonly requirements: Requirements;
  readonly steps: readonly Step[];
}

// ─── Producers ───────────────────────────────────────────────────

export interface ProducerContext {
  runId: string;
  request: ContentRequest;
  track: ContentKind;
  signal: AbortSignal;
}

export interface Producer<I, O> {
  invoke(input: I, context: ProducerContext): O | Promise<O>;
}

export interface ResearchInput {
  topic: string;
  kinds: readonly ContentKind[];
}

export interface BriefInput {
  research: ResearchBrief;
  kind: ContentKind;
  context: Readonly<Record<string, unknown>>;
}

export interface DraftInput {
  brief: ContentBrief;
  kind: ContentKind;
}

export interface VoiceCheckInput {
  draft: DraftContent;
  targetTone: Tone;
}

export interface FormatInput {
  draft: DraftContent;
  kind: ContentKind;
  format: OutputFormat;
}

export interface FormatProducer extends Producer<FormatInput, ProductionOutput> {
  supportedFormats(): readonly OutputFormat[];
}

export interface Producers {
  research: Producer<ResearchInput, ResearchBrief>;
  brief: Producer<BriefInput, ContentBrief>;
  draft: Producer<DraftInput, DraftContent>;
  'voice-check': Producer<VoiceCheckInput, VoiceCheckResult>;
  format: FormatProducer;
}

// ─── Outputs ─────────────────────────────────────────────────────

export interface PipelineOutputs {
  researchBrief?: ResearchBrief;
  contentBrief?: ContentBrief;
  contentBriefs?: readonly ContentBrief[];
  draft?: DraftContent;
  drafts?: readonly DraftContent[];
  voiceCheck?: VoiceCheckResult;
  voiceChecks?: readonly VoiceCheckResult[];
  productionOutputs?: readonly ProductionOutput[];
}

export type OutputKey = keyof PipelineOutputs;

// ─── Results ─────────────────────────────────────────────────────

export interface StepDescriptorJson {
  stepName: StepName;
  producerRole: StepName;
  inputKind: InputKind;
  outputKind: string;
  gateName: string | null;
  parallel: boolean;
  tracks: ContentKind[] | null;
}

export interface ExecutionResultJson {
  runId: string;
  workflowShape: WorkflowShape;
  status: RunStatus;
  success: boolean;
  plan: StepDescriptorJson[];
  stepLedger: LedgerEntry[];
  outputs: Record<string, ArtifactJson | ArtifactJson[]>;
  errors: string[];
  warnings: string[];
  startTime: string;
  endTime: string | null;
}

// ─── Execution Options ───────────────────────────────────────────

export interface ExecuteOptions {
  runId?: string;
  signal?: AbortSignal;
}
