/**
 * Plan Builder — classify a request and expand its workflow shape into steps.
 *
 * Both halves are decision tables. No I/O, no randomness: the same
 * (shape, requirements) always yields an equal plan.
 */

import type { ContentKind, WorkflowShape } from '@inkline/shared';
import { WORKFLOW_SHAPES } from '@inkline/shared';
import { PlanConfigurationError } from './errors.js';
import { STEP_NAMES } from './types.js';
import type {
  ContentRequest,
  InputKind,
  Plan,
  Requirements,
  Step,
  StepName,
  WorkflowTable,
} from './types.js';

// ─── Tables ──────────────────────────────────────────────────────

const KIND_TO_SHAPE: Partial<Record<ContentKind, WorkflowShape>> = {
  'article': 'single-track',
  'blog-post': 'single-track',
  'whitepaper': 'single-track',
  'case-study': 'single-track',
  'presentation': 'presentation',
  'social-post': 'social-only',
  'email': 'email-sequence',
  'newsletter': 'email-sequence',
};

export const DEFAULT_WORKFLOWS: WorkflowTable = {
  'single-track': ['research', 'brief', 'draft', 'voice-check', 'format'],
  'multi-target': ['research', 'brief', 'draft', 'voice-check', 'format'],
  'presentation': ['research', 'brief', 'draft', 'format'],
  'social-only': ['research', 'brief', 'draft', 'voice-check'],
  'email-sequence': ['research', 'brief', 'draft', 'voice-check', 'format'],
};

export const SHAPE_DESCRIPTIONS: Readonly<Record<WorkflowShape, string>> = {
  'single-track': 'Single article or long-form production',
  'multi-target': 'Content for multiple targets from one research pass',
  'presentation': 'Presentation from research',
  'social-only': 'Social media content only',
  'email-sequence': 'Email campaign or sequence',
};

// ─── Classification ──────────────────────────────────────────────

/**
 * More than one kind is always a campaign; a single kind goes through the
 * kind table, and kinds without an entry fall back to single-track.
 */
export function classify(request: Pick<ContentRequest, 'kinds'>): WorkflowShape {
  if (request.kinds.length > 1) {
    return 'multi-target';
  }
  const [kind] = request.kinds;
  if (kind === undefined) {
    return 'single-track';
  }
  return KIND_TO_SHAPE[kind] ?? 'single-track';
}

export function parseRequirements(request: ContentRequest): Requirements {
  return Object.freeze({
    topic: request.topic,
    kinds: Object.freeze([...request.kinds]),
    priority: request.priority,
    deadline: request.deadline,
    context: request.context,
  });
}

// ─── Step Descriptors ────────────────────────────────────────────

export function isStepName(value: unknown): value is StepName {
  return typeof value === 'string' && (STEP_NAMES as readonly string[]).includes(value);
}

function describeStep(
  name: StepName,
  tracks: readonly ContentKind[] | null,
  parallel: boolean
): Step {
  switch (name) {
    case 'research':
      return {
        stepName: 'research',
        producerRole: 'research',
        inputKind: 'request',
        outputKind: 'research-brief',
        gateName: 'research-completeness',
        parallel: false,
        tracks: null,
      };
    case 'brief':
      return {
        stepName: 'brief',
        producerRole: 'brief',
        inputKind: 'research-brief',
        outputKind: 'content-brief',
        gateName: 'brief-alignment',
        parallel,
        tracks,
      };
    case 'draft':
      return {
        stepName: 'draft',
        producerRole: 'draft',
        inputKind: 'content-brief',
        outputKind: 'draft-content',
        gateName: 'draft-completeness',
        parallel,
        tracks,
      };
    case 'voice-check':
      return {
        stepName: 'voice-check',
        producerRole: 'voice-check',
        inputKind: 'draft-content',
        outputKind: 'voice-check-result',
        gateName: 'brand-consistency',
        parallel,
        tracks,
      };
    case 'format':
      return {
        stepName: 'format',
        producerRole: 'format',
        inputKind: 'draft-content',
        outputKind: 'production-output',
        gateName: 'format-compliance',
        parallel,
        tracks,
      };
    default: {
      const unhandled: never = name;
      throw new PlanConfigurationError(`Unknown step: ${String(unhandled)}`);
    }
  }
}

// ─── Plan Expansion ──────────────────────────────────────────────

/**
 * Expand a shape into its ordered steps using the built-in tables.
 */
export function buildPlan(shape: WorkflowShape, requirements: Requirements): Plan {
  return expand(shape, requirements, DEFAULT_WORKFLOWS);
}

function expand(shape: WorkflowShape, requirements: Requirements, table: WorkflowTable): Plan {
  const sequence = table[shape];
  const fanOut = shape === 'multi-target';
  const tracks = fanOut ? Object.freeze([...requirements.kinds]) : null;

  const steps = sequence.map(name => {
    const consumesTrack = name !== 'research';
    return Object.freeze(describeStep(
      name,
      fanOut && consumesTrack ? tracks : null,
      fanOut && name === 'draft'
    ));
  });

  return Object.freeze({
    shape,
    description: SHAPE_DESCRIPTIONS[shape],
    requirements,
    steps: Object.freeze(steps),
  });
}

/**
 * Check a workflow table: every shape present, sequences non-empty, step
 * names known and unique, each step's input produced by an earlier step.
 */
export function validateWorkflowTable(raw: unknown): WorkflowTable {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new PlanConfigurationError('Workflow table must be an object keyed by workflow shape');
  }

  const errors: string[] = [];
  const entries = new Map(Object.entries(raw));
  const table: Partial<Record<WorkflowShape, readonly StepName[]>> = {};

  for (const key of entries.keys()) {
    if (!(WORKFLOW_SHAPES as readonly string[]).includes(key)) {
      errors.push(`Unknown workflow shape "${key}"`);
    }
  }

  for (const shape of WORKFLOW_SHAPES) {
    const sequence: unknown = entries.get(shape);
    if (!Array.isArray(sequence) || sequence.length === 0) {
      errors.push(`Workflow "${shape}": sequence must be a non-empty array of step names`);
      continue;
    }

    const names: StepName[] = [];
    const available = new Set<InputKind>(['request']);
    sequence.forEach((value: unknown, i: number) => {
      if (!isStepName(value)) {
        errors.push(`Workflow "${shape}" step ${i}: unknown step "${String(value)}"`);
        return;
      }
      if (names.includes(value)) {
        errors.push(`Workflow "${shape}" step ${i}: duplicate step "${value}"`);
        return;
      }
      const step = describeStep(value, null, false);
      if (!available.has(step.inputKind)) {
        errors.push(`Workflow "${shape}" step ${i}: "${value}" needs ${step.inputKind}, which no earlier step produces`);
      }
      if (step.outputKind !== 'voice-check-result' && step.outputKind !== 'production-output') {
        available.add(step.outputKind);
      }
      names.push(value);
    });

    table[shape] = Object.freeze(names);
  }

  if (errors.length > 0) {
    throw new PlanConfigurationError(errors.join('; '));
  }

  return Object.freeze(completeTable(table));
}

function completeTable(partial: Partial<Record<WorkflowShape, readonly StepName[]>>): WorkflowTable {
  const table: Record<WorkflowShape, readonly StepName[]> = { ...DEFAULT_WORKFLOWS };
  for (const shape of WORKFLOW_SHAPES) {
    const sequence = partial[shape];
    if (sequence) table[shape] = sequence;
  }
  return table;
}

/**
 * Plan Builder bound to one workflow table (built-in or from configuration).
 * The table is validated once, at construction.
 */
export class PlanBuilder {
  private readonly table: WorkflowTable;

  constructor(overrides?: Partial<Record<WorkflowShape, readonly string[]>>) {
    this.table = overrides ? validateWorkflowTable({ ...DEFAULT_WORKFLOWS, ...overrides }) : DEFAULT_WORKFLOWS;
  }

  classify(request: Pick<ContentRequest, 'kinds'>): WorkflowShape {
    return classify(request);
  }

  buildPlan(shape: WorkflowShape, requirements: Requirements): Plan {
    return expand(shape, requirements, this.table);
  }

  plan(request: ContentRequest): Plan {
    return this.buildPlan(this.classify(request), parseRequirements(request));
  }

  getWorkflows(): WorkflowTable {
    return this.table;
  }

  describeShapes(): Array<{ shape: WorkflowShape; description: string; steps: StepName[] }> {
    return WORKFLOW_SHAPES.map(shape => ({
      shape,
      description: SHAPE_DESCRIPTIONS[shape],
      steps: [...this.table[shape]],
    }));
  }
}
