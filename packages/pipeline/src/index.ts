/**
 * @inkline/pipeline — plan and run content production workflows.
 *
 * Requests are classified into a workflow shape, expanded into steps and
 * driven through pluggable producers, with a quality gate after each step
 * and a ledger of every invocation.
 */

export const VERSION = '0.1.0';

// ─── Artifacts ───────────────────────────────────────────────────
export {
  ResearchBrief,
  ContentBrief,
  DraftContent,
  VoiceCheckResult,
  ProductionOutput,
  MIN_SOURCES,
  CREDIBILITY_THRESHOLD,
  MIN_DRAFT_CHARS,
  VOICE_SCORE_THRESHOLD,
} from './artifacts.js';
export type {
  Artifact,
  ArtifactJson,
  ArtifactKind,
  GateResult,
  Validatable,
  WordCountRange,
  Source,
  ResearchBriefInit,
  ContentBriefInit,
  DraftContentInit,
  VoiceCheckResultInit,
  ProductionOutputInit,
} from './artifacts.js';

// ─── Requests ────────────────────────────────────────────────────
export { parseRequest, createRequest, TOPIC_MIN_LENGTH, TOPIC_MAX_LENGTH } from './request.js';

// ─── Plan Builder ────────────────────────────────────────────────
export {
  PlanBuilder,
  classify,
  buildPlan,
  parseRequirements,
  validateWorkflowTable,
  DEFAULT_WORKFLOWS,
  SHAPE_DESCRIPTIONS,
} from './plan-builder.js';

// ─── Executor ────────────────────────────────────────────────────
export { PipelineExecutor, negotiateFormats, requestedFormats } from './pipeline-executor.js';
export type { PipelineExecutorOptions, FormatNegotiation } from './pipeline-executor.js';
export { ExecutionResult, RunOutputs, describeForDisplay } from './execution-result.js';

// ─── Configuration ───────────────────────────────────────────────
export { parseConfig, validateConfig, applyEnv, loadConfig, DEFAULT_CONFIG, CONFIG_FILE } from './config.js';
export type { EngineConfig, ConfigParseResult } from './config.js';

// ─── Errors ──────────────────────────────────────────────────────
export {
  PlanConfigurationError,
  QualityGateError,
  ProducerError,
  RunCancelledError,
  RequestValidationError,
  errorMessage,
} from './errors.js';

// ─── Types ───────────────────────────────────────────────────────
export { STEP_NAMES } from './types.js';
export type {
  ContentRequest,
  ContentRequestInit,
  RequestParseResult,
  Requirements,
  StepName,
  InputKind,
  Step,
  ResearchStep,
  BriefStep,
  DraftStep,
  VoiceCheckStep,
  FormatStep,
  WorkflowTable,
  Plan,
  Producer,
  ProducerContext,
  Producers,
  ResearchInput,
  BriefInput,
  DraftInput,
  VoiceCheckInput,
  FormatInput,
  FormatProducer,
  PipelineOutputs,
  OutputKey,
  StepDescriptorJson,
  ExecutionResultJson,
  ExecuteOptions,
} from './types.js';
