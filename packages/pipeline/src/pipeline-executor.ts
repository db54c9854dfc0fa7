/**
 * Pipeline Executor — drive a plan step by step through the producers.
 *
 * Steps run strictly in plan order. A fan-out step runs once per track, in
 * the order the kinds were declared; tracks of a parallel step are
 * dispatched together and joined before anything downstream sees them.
 *
 * Two kinds of failure, kept apart on purpose:
 * - a failed quality gate is recorded and the run continues (strict mode
 *   turns it into a run-ending error);
 * - a producer that raises ends the run, always.
 *
 * execute() never throws for a well-formed request.
 */

import { randomUUID } from 'crypto';
import type {
  ContentKind,
  EventChannel,
  EventPayloads,
  OutputFormat,
  EventBus,
  Logger,
} from '@inkline/shared';
import { createEvent, createLogger, getEventBus, isOutputFormat } from '@inkline/shared';
import {
  ContentBrief,
  DraftContent,
  ProductionOutput,
  ResearchBrief,
  VoiceCheckResult,
} from './artifacts.js';
import type { Artifact } from './artifacts.js';
import type { EngineConfig } from './config.js';
import { ExecutionResult } from './execution-result.js';
import {
  ProducerError,
  QualityGateError,
  RunCancelledError,
  errorMessage,
} from './errors.js';
import { PlanBuilder } from './plan-builder.js';
import type {
  BriefStep,
  ContentRequest,
  DraftStep,
  ExecuteOptions,
  FormatStep,
  Plan,
  Producers,
  ProducerContext,
  ResearchStep,
  Step,
  VoiceCheckStep,
} from './types.js';

export interface PipelineExecutorOptions {
  bus?: EventBus;
  logger?: Logger;
  planBuilder?: PlanBuilder;
  /** Promote gate failures to run-ending errors. Off by default. */
  strictGates?: boolean;
  /** Dispatch the tracks of a parallel step together. On by default. */
  concurrentTracks?: boolean;
  defaultFormat?: OutputFormat;
  fallbackFormat?: OutputFormat;
}

interface RunContext {
  runId: string;
  request: ContentRequest;
  plan: Plan;
  result: ExecutionResult;
  signal: AbortSignal;
  log: Logger;
  plannedInvocations: number;
}

interface Unit<A extends Artifact> {
  track: ContentKind | null;
  kind: ContentKind;
  invoke: (context: ProducerContext) => A | Promise<A>;
}

type ArtifactClass<A extends Artifact> = new (...args: never[]) => A;

const DEFAULT_FORMAT: OutputFormat = 'html';

export class PipelineExecutor {
  private producers: Producers;
  private bus: EventBus;
  private logger: Logger;
  private planBuilder: PlanBuilder;
  private strictGates: boolean;
  private concurrentTracks: boolean;
  private defaultFormat: OutputFormat;
  private fallbackFormat: OutputFormat;

  constructor(producers: Producers, options?: PipelineExecutorOptions) {
    this.producers = producers;
    this.bus = options?.bus ?? getEventBus();
    this.logger = options?.logger ?? createLogger({ service: 'pipeline' });
    this.planBuilder = options?.planBuilder ?? new PlanBuilder();
    this.strictGates = options?.strictGates ?? false;
    this.concurrentTracks = options?.concurrentTracks ?? true;
    this.defaultFormat = options?.defaultFormat ?? DEFAULT_FORMAT;
    this.fallbackFormat = options?.fallbackFormat ?? DEFAULT_FORMAT;
  }

  /**
   * Build an executor whose gates, fan-out, formats and workflow table come
   * from configuration. Throws PlanConfigurationError for a bad workflow table.
   */
  static fromConfig(
    producers: Producers,
    config: EngineConfig,
    deps?: { bus?: EventBus; logger?: Logger }
  ): PipelineExecutor {
    return new PipelineExecutor(producers, {
      bus: deps?.bus,
      logger: deps?.logger,
      planBuilder: new PlanBuilder(config.workflows ?? undefined),
      strictGates: config.gates.strict,
      concurrentTracks: config.fanOut.concurrent,
      defaultFormat: config.production.defaultFormat,
      fallbackFormat: config.production.fallbackFormat,
    });
  }

  get strict(): boolean {
    return this.strictGates;
  }

  plan(request: ContentRequest): Plan {
    return this.planBuilder.plan(request);
  }

  /**
   * Run a request to the end (or to the first fatal error) and return its result.
   */
  async execute(request: ContentRequest, options?: ExecuteOptions): Promise<ExecutionResult> {
    const runId = options?.runId ?? randomUUID();
    const plan = this.planBuilder.plan(request);
    const result = new ExecutionResult(runId, plan);
    const run: RunContext = {
      runId,
      request,
      plan,
      result,
      signal: options?.signal ?? new AbortController().signal,
      log: this.logger.child({ runId, workflowShape: plan.shape }),
      plannedInvocations: this.countInvocations(plan, request),
    };

    run.log.info(
      { kinds: [...request.kinds], steps: plan.steps.map(s => s.stepName), strict: this.strictGates },
      'run planned'
    );

    try {
      for (const step of plan.steps) {
        throwIfCancelled(run, step.stepName);

        if (result.status === 'planned') {
          result.markRunning();
          await this.emit(run, 'run.started', {
            workflowShape: plan.shape,
            kinds: [...request.kinds],
            plannedInvocations: run.plannedInvocations,
          });
        }

        await this.runStep(run, step);
      }

      result.complete();
      run.log.info(
        { recorded: result.stepLedger.length, gateFailures: result.errors.length, warnings: result.warnings.length },
        'run completed'
      );
      await this.emit(run, 'run.completed', {
        workflowShape: plan.shape,
        recorded: result.stepLedger.length,
        warnings: result.warnings.length,
      });
    } catch (err) {
      await this.finalizeFailure(run, err);
    }

    return result;
  }

  // ─── Steps ───────────────────────────────────────────────────────

  private async runStep(run: RunContext, step: Step): Promise<void> {
    switch (step.stepName) {
      case 'research':
        return this.runResearch(run, step);
      case 'brief':
        return this.runBrief(run, step);
      case 'draft':
        return this.runDraft(run, step);
      case 'voice-check':
        return this.runVoiceCheck(run, step);
      case 'format':
        return this.runFormat(run, step);
      default: {
        const unhandled: never = step;
        throw new Error(`Unhandled step ${JSON.stringify(unhandled)}`);
      }
    }
  }

  private async runResearch(run: RunContext, step: ResearchStep): Promise<void> {
    const { request } = run;
    const [brief] = await this.runUnits(run, step, ResearchBrief, [{
      track: null,
      kind: primaryKind(request),
      invoke: (ctx) => this.producers.research.invoke({ topic: request.topic, kinds: request.kinds }, ctx),
    }]);
    run.result.outputs.set('researchBrief', brief);
  }

  private async runBrief(run: RunContext, step: BriefStep): Promise<void> {
    const research = requireInput(run.result.outputs.get('researchBrief'), step.stepName, 'research-brief');
    const units = tracksOf(step, run.request).map((track): Unit<ContentBrief> => ({
      ...track,
      invoke: (ctx) => this.producers.brief.invoke(
        { research, kind: track.kind, context: run.request.context },
        ctx
      ),
    }));

    const briefs = await this.runUnits(run, step, ContentBrief, units);
    if (step.tracks) {
      run.result.outputs.set('contentBriefs', briefs);
    } else {
      run.result.outputs.set('contentBrief', briefs[0]);
    }
  }

  private async runDraft(run: RunContext, step: DraftStep): Promise<void> {
    const units = tracksOf(step, run.request).map((track, index): Unit<DraftContent> => {
      const brief = briefFor(run, index, step.stepName);
      return {
        ...track,
        invoke: (ctx) => this.producers.draft.invoke({ brief, kind: track.kind }, ctx),
      };
    });

    const drafts = await this.runUnits(run, step, DraftContent, units);
    if (step.tracks) {
      run.result.outputs.set('drafts', drafts);
    } else {
      run.result.outputs.set('draft', drafts[0]);
    }
  }

  private async runVoiceCheck(run: RunContext, step: VoiceCheckStep): Promise<void> {
    // Every track is checked against the first track's tone.
    const targetTone = briefFor(run, 0, step.stepName).tone;
    const units = tracksOf(step, run.request).map((track, index): Unit<VoiceCheckResult> => {
      const draft = draftFor(run, index, step.stepName);
      return {
        ...track,
        invoke: (ctx) => this.producers['voice-check'].invoke({ draft, targetTone }, ctx),
      };
    });

    const checks = await this.runUnits(run, step, VoiceCheckResult, units);
    if (step.tracks) {
      run.result.outputs.set('voiceChecks', checks);
    } else {
      run.result.outputs.set('voiceCheck', checks[0]);
    }
  }

  private async runFormat(run: RunContext, step: FormatStep): Promise<void> {
    const negotiated = negotiateFormats(
      run.request.context,
      this.producers.format.supportedFormats(),
      this.defaultFormat,
      this.fallbackFormat
    );

    if (!negotiated.ok) {
      await this.recordEntry(run, step.stepName, null, null, negotiated.error);
      run.log.error({ step: step.stepName, error: negotiated.error }, 'format negotiation failed');
      throw new ProducerError(step.stepName, null, negotiated.error);
    }

    for (const warning of negotiated.warnings) {
      run.result.warn(warning);
      run.log.warn({ step: step.stepName }, warning);
    }

    const units: Unit<ProductionOutput>[] = [];
    tracksOf(step, run.request).forEach((track, index) => {
      const draft = draftFor(run, index, step.stepName);
      for (const format of negotiated.formats) {
        units.push({
          ...track,
          invoke: (ctx) => this.producers.format.invoke({ draft, kind: track.kind, format }, ctx),
        });
      }
    });

    const outputs = await this.runUnits(run, step, ProductionOutput, units);
    run.result.outputs.set('productionOutputs', outputs);
  }

  // ─── Invocation & Gates ──────────────────────────────────────────

  /**
   * Invoke every unit of a step and gate each artifact. Returns artifacts in
   * unit order. Throws on the first producer error (or strict gate failure).
   */
  private async runUnits<A extends Artifact>(
    run: RunContext,
    step: Step,
    expected: ArtifactClass<A>,
    units: Unit<A>[]
  ): Promise<A[]> {
    if (step.parallel && this.concurrentTracks && units.length > 1) {
      return this.runUnitsConcurrently(run, step, expected, units);
    }

    const artifacts: A[] = [];
    for (const [index, unit] of units.entries()) {
      if (index > 0) throwIfCancelled(run, step.stepName);

      let artifact: A;
      try {
        artifact = await this.invoke(run, step, expected, unit);
      } catch (err) {
        throw await this.recordProducerFailure(run, step, unit.track, err);
      }

      const gateError = await this.passGate(run, step, unit.track, artifact);
      if (gateError) throw gateError;
      artifacts.push(artifact);
    }
    return artifacts;
  }

  private async runUnitsConcurrently<A extends Artifact>(
    run: RunContext,
    step: Step,
    expected: ArtifactClass<A>,
    units: Unit<A>[]
  ): Promise<A[]> {
    run.log.debug({ step: step.stepName, tracks: units.length }, 'dispatching tracks concurrently');

    const settled = await Promise.allSettled(units.map(unit => this.invoke(run, step, expected, unit)));

    // Joined: record in declared track order.
    const artifacts: A[] = [];
    let fatal: Error | null = null;
    for (const [index, outcome] of settled.entries()) {
      const unit = units[index];
      if (outcome.status === 'rejected') {
        const failure = await this.recordProducerFailure(run, step, unit.track, outcome.reason);
        fatal ??= failure;
        continue;
      }
      const gateError = await this.passGate(run, step, unit.track, outcome.value);
      fatal ??= gateError;
      artifacts.push(outcome.value);
    }

    if (fatal) throw fatal;
    return artifacts;
  }

  private async invoke<A extends Artifact>(
    run: RunContext,
    step: Step,
    expected: ArtifactClass<A>,
    unit: Unit<A>
  ): Promise<A> {
    run.log.debug({ step: step.stepName, track: unit.track ?? undefined }, 'invoking producer');

    const artifact: unknown = await unit.invoke({
      runId: run.runId,
      request: run.request,
      track: unit.kind,
      signal: run.signal,
    });

    if (!(artifact instanceof expected)) {
      throw new Error(`Producer "${step.producerRole}" returned ${describeValue(artifact)} instead of ${step.outputKind}`);
    }
    return artifact;
  }

  /**
   * Run the step's gate against one artifact and record the outcome.
   * Returns the error to throw when strict mode promotes the failure.
   */
  private async passGate(
    run: RunContext,
    step: Step,
    track: ContentKind | null,
    artifact: Artifact
  ): Promise<QualityGateError | null> {
    if (step.gateName === null) {
      await this.recordEntry(run, step.stepName, track, null, null);
      return null;
    }

    const { ok, problems } = artifact.checkInvariants();
    if (ok) {
      await this.recordEntry(run, step.stepName, track, step.gateName, null);
      return null;
    }

    const gateError = new QualityGateError(step.stepName, track, step.gateName, problems);
    await this.recordEntry(run, step.stepName, track, step.gateName, gateError.message);
    run.log.warn(
      { step: step.stepName, track: track ?? undefined, gate: step.gateName, problems, strict: this.strictGates },
      'quality gate failed'
    );
    await this.emit(run, 'run.gate_failed', {
      step: step.stepName,
      track,
      gate: step.gateName,
      problems,
      strict: this.strictGates,
    });

    return this.strictGates ? gateError : null;
  }

  private async recordProducerFailure(
    run: RunContext,
    step: Step,
    track: ContentKind | null,
    err: unknown
  ): Promise<ProducerError> {
    const message = errorMessage(err);
    await this.recordEntry(run, step.stepName, track, null, message);
    run.log.error({ step: step.stepName, track: track ?? undefined, error: err }, 'producer failed');
    return new ProducerError(step.stepName, track, message, { cause: err });
  }

  private async recordEntry(
    run: RunContext,
    stepName: string,
    track: ContentKind | null,
    gate: string | null,
    error: string | null
  ): Promise<void> {
    const entry = run.result.record(stepName, track, gate, error);
    await this.emit(run, 'run.step_recorded', {
      entry,
      recorded: run.result.recordedCount,
      plannedInvocations: run.plannedInvocations,
    });
  }

  // ─── Finalization ────────────────────────────────────────────────

  private async finalizeFailure(run: RunContext, err: unknown): Promise<void> {
    const { result, plan } = run;

    if (err instanceof RunCancelledError) {
      result.cancel(err.message);
      run.log.warn({ step: err.step }, 'run cancelled');
      await this.emit(run, 'run.cancelled', { workflowShape: plan.shape, step: err.step });
      return;
    }

    // Producer and strict-gate errors are already in the ledger and the error list.
    const alreadyRecorded = err instanceof ProducerError || err instanceof QualityGateError;
    result.fail(alreadyRecorded ? undefined : errorMessage(err));
    run.log.error({ error: err }, 'run failed');
    await this.emit(run, 'run.failed', { workflowShape: plan.shape, error: errorMessage(err) });
  }

  private async emit<C extends EventChannel>(run: RunContext, channel: C, payload: EventPayloads[C]): Promise<void> {
    await this.bus.emit(createEvent(channel, 'pipeline', payload, { runId: run.runId }));
  }

  private countInvocations(plan: Plan, request: ContentRequest): number {
    const formats = requestedFormats(request.context, this.defaultFormat).length;
    return plan.steps.reduce((total, step) => {
      const tracks = step.tracks?.length ?? 1;
      return total + tracks * (step.stepName === 'format' ? formats : 1);
    }, 0);
  }
}

// ─── Helpers ─────────────────────────────────────────────────────

function throwIfCancelled(run: RunContext, stepName: string): void {
  if (run.signal.aborted) {
    throw new RunCancelledError(stepName);
  }
}

function primaryKind(request: ContentRequest): ContentKind {
  return request.kinds[0] ?? 'article';
}

function tracksOf(step: Step, request: ContentRequest): Array<{ track: ContentKind | null; kind: ContentKind }> {
  if (step.tracks) {
    return step.tracks.map(kind => ({ track: kind, kind }));
  }
  return [{ track: null, kind: primaryKind(request) }];
}

function requireInput<T>(value: T | undefined, stepName: string, inputKind: string): T {
  if (value === undefined) {
    throw new Error(`Step "${stepName}" needs ${inputKind}, but no earlier step produced it`);
  }
  return value;
}

function briefFor(run: RunContext, index: number, stepName: string): ContentBrief {
  const outputs = run.result.outputs;
  return requireInput(outputs.get('contentBriefs')?.[index] ?? outputs.get('contentBrief'), stepName, 'content-brief');
}

function draftFor(run: RunContext, index: number, stepName: string): DraftContent {
  const outputs = run.result.outputs;
  return requireInput(outputs.get('drafts')?.[index] ?? outputs.get('draft'), stepName, 'draft-content');
}

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value !== 'object') return typeof value;
  const proto: unknown = Object.getPrototypeOf(value);
  if (proto === null || proto === Object.prototype) return 'a plain object';
  return `an instance of ${value.constructor.name}`;
}

/**
 * Formats asked for by the request, in order, without duplicates.
 */
export function requestedFormats(context: Readonly<Record<string, unknown>>, defaultFormat: OutputFormat): unknown[] {
  let requested: unknown[];
  if (Array.isArray(context.outputFormats) && context.outputFormats.length > 0) {
    requested = context.outputFormats;
  } else if (context.outputFormat !== undefined) {
    requested = [context.outputFormat];
  } else {
    requested = [defaultFormat];
  }
  return [...new Set(requested)];
}

export type FormatNegotiation =
  | { ok: true; formats: OutputFormat[]; warnings: string[] }
  | { ok: false; error: string };

/**
 * Match requested formats against what the format producer can render.
 * Anything it cannot render is replaced by the fallback, with a warning.
 */
export function negotiateFormats(
  context: Readonly<Record<string, unknown>>,
  supported: readonly OutputFormat[],
  defaultFormat: OutputFormat,
  fallbackFormat: OutputFormat
): FormatNegotiation {
  const formats: OutputFormat[] = [];
  const warnings: string[] = [];

  for (const format of requestedFormats(context, defaultFormat)) {
    let chosen: OutputFormat;
    if (isOutputFormat(format) && supported.includes(format)) {
      chosen = format;
    } else if (supported.includes(fallbackFormat)) {
      chosen = fallbackFormat;
      warnings.push(`Format "${String(format)}" is not available; producing ${fallbackFormat} instead`);
    } else {
      return {
        ok: false,
        error: `Format producer supports neither "${String(format)}" nor fallback "${fallbackFormat}"`,
      };
    }
    if (!formats.includes(chosen)) formats.push(chosen);
  }

  return { ok: true, formats, warnings };
}
