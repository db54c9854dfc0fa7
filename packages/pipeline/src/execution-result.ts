/**
 * Execution Result — the record one run hands back to its caller.
 *
 * Built incrementally by the Executor: ledger entries are appended, output
 * keys are written once, and the status only moves forward
 * (planned → running → completed | failed | cancelled).
 */

import type { ContentKind, LedgerEntry, RunStatus, WorkflowShape } from '@inkline/shared';
import type { Artifact, ArtifactJson } from './artifacts.js';
import type {
  ExecutionResultJson,
  OutputKey,
  PipelineOutputs,
  Plan,
  StepDescriptorJson,
} from './types.js';

const OUTPUT_KEYS: readonly OutputKey[] = [
  'researchBrief',
  'contentBrief',
  'contentBriefs',
  'draft',
  'drafts',
  'voiceCheck',
  'voiceChecks',
  'productionOutputs',
];

const TRANSITIONS: Record<RunStatus, readonly RunStatus[]> = {
  planned: ['running', 'failed', 'cancelled'],
  running: ['completed', 'failed', 'cancelled'],
  completed: [],
  failed: [],
  cancelled: [],
};

export class RunOutputs {
  private values: PipelineOutputs = {};

  get<K extends OutputKey>(key: K): PipelineOutputs[K] {
    return this.values[key];
  }

  has(key: OutputKey): boolean {
    return this.values[key] !== undefined;
  }

  /**
   * Each key has exactly one writer; a second write is a bug in the caller.
   */
  set<K extends OutputKey>(key: K, value: NonNullable<PipelineOutputs[K]>): void {
    if (this.values[key] !== undefined) {
      throw new Error(`Output "${key}" has already been written`);
    }
    this.values[key] = value;
  }

  snapshot(): Readonly<PipelineOutputs> {
    return Object.freeze({ ...this.values });
  }

  toJSON(): Record<string, ArtifactJson | ArtifactJson[]> {
    const json: Record<string, ArtifactJson | ArtifactJson[]> = {};
    for (const key of OUTPUT_KEYS) {
      const value: Artifact | readonly Artifact[] | undefined = this.values[key];
      if (value === undefined) continue;
      json[key] = isArtifactList(value)
        ? value.map(artifact => artifact.toJSON())
        : value.toJSON();
    }
    return json;
  }
}

function isArtifactList(value: Artifact | readonly Artifact[]): value is readonly Artifact[] {
  return Array.isArray(value);
}

export class ExecutionResult {
  readonly runId: string;
  readonly workflowShape: WorkflowShape;
  readonly plan: Plan;
  readonly outputs = new RunOutputs();
  readonly startTime: string;

  private ledger: LedgerEntry[] = [];
  private errorList: string[] = [];
  private warningList: string[] = [];
  private _status: RunStatus = 'planned';
  private _endTime: string | null = null;

  constructor(runId: string, plan: Plan) {
    this.runId = runId;
    this.workflowShape = plan.shape;
    this.plan = plan;
    this.startTime = new Date().toISOString();
  }

  get status(): RunStatus {
    return this._status;
  }

  /** True when the pipeline ran to the end; failed gates do not change it. */
  get success(): boolean {
    return this._status === 'completed';
  }

  get endTime(): string | null {
    return this._endTime;
  }

  // Snapshots: callers never hold the live lists.
  get stepLedger(): readonly LedgerEntry[] {
    return Object.freeze([...this.ledger]);
  }

  get errors(): readonly string[] {
    return Object.freeze([...this.errorList]);
  }

  get warnings(): readonly string[] {
    return Object.freeze([...this.warningList]);
  }

  get recordedCount(): number {
    return this.ledger.length;
  }

  markRunning(): void {
    if (this._status === 'planned') {
      this.transition('running');
    }
  }

  /**
   * Append a ledger entry. Failed entries also land in the error list.
   */
  record(
    step: string,
    track: ContentKind | null,
    gate: string | null,
    error: string | null
  ): LedgerEntry {
    const entry: LedgerEntry = Object.freeze({
      step,
      track,
      gate,
      success: error === null,
      error,
      timestamp: new Date().toISOString(),
    });
    this.ledger.push(entry);
    if (error !== null) {
      this.errorList.push(`${track ? `${step}[${track}]` : step}: ${error}`);
    }
    return entry;
  }

  warn(message: string): void {
    this.warningList.push(message);
  }

  complete(): void {
    this.transition('completed');
    this._endTime = new Date().toISOString();
  }

  /**
   * End the run as failed. Pass a message only when it is not already in the
   * error list through a ledger entry.
   */
  fail(message?: string): void {
    this.transition('failed');
    if (message !== undefined) this.errorList.push(message);
    this._endTime = new Date().toISOString();
  }

  cancel(message: string): void {
    this.transition('cancelled');
    this.errorList.push(message);
    this._endTime = new Date().toISOString();
  }

  toJSON(): ExecutionResultJson {
    return {
      runId: this.runId,
      workflowShape: this.workflowShape,
      status: this._status,
      success: this.success,
      plan: this.plan.steps.map(describeForDisplay),
      stepLedger: this.ledger.map(entry => ({ ...entry })),
      outputs: this.outputs.toJSON(),
      errors: [...this.errorList],
      warnings: [...this.warningList],
      startTime: this.startTime,
      endTime: this._endTime,
    };
  }

  private transition(next: RunStatus): void {
    if (!TRANSITIONS[this._status].includes(next)) {
      throw new Error(`Run ${this.runId} cannot move from ${this._status} to ${next}`);
    }
    this._status = next;
  }
}

export function describeForDisplay(step: Plan['steps'][number]): StepDescriptorJson {
  return {
    stepName: step.stepName,
    producerRole: step.producerRole,
    inputKind: step.inputKind,
    outputKind: step.outputKind,
    gateName: step.gateName,
    parallel: step.parallel,
    tracks: step.tracks ? [...step.tracks] : null,
  };
}
