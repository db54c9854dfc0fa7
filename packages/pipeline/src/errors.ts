/**
 * Error taxonomy.
 *
 * PlanConfigurationError  plan tables are wrong; thrown while building plans
 * QualityGateError        a gate failed under strict enforcement
 * ProducerError           a producer raised; always ends the run
 * RunCancelledError       the run's signal fired between steps
 * RequestValidationError  a request failed boundary validation
 */

import type { ContentKind } from '@inkline/shared';

export class PlanConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PlanConfigurationError';
  }
}

export class QualityGateError extends Error {
  readonly step: string;
  readonly track: ContentKind | null;
  readonly gate: string;
  readonly problems: string[];

  constructor(step: string, track: ContentKind | null, gate: string, problems: string[]) {
    super(`Quality gate "${gate}" failed: ${problems.join('; ')}`);
    this.name = 'QualityGateError';
    this.step = step;
    this.track = track;
    this.gate = gate;
    this.problems = problems;
  }
}

export class ProducerError extends Error {
  readonly step: string;
  readonly track: ContentKind | null;

  constructor(step: string, track: ContentKind | null, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ProducerError';
    this.step = step;
    this.track = track;
  }
}

export class RunCancelledError extends Error {
  readonly step: string;

  constructor(step: string) {
    super(`Run cancelled before step "${step}"`);
    this.name = 'RunCancelledError';
    this.step = step;
  }
}

export class RequestValidationError extends Error {
  readonly errors: string[];

  constructor(errors: string[]) {
    super(`Invalid content request: ${errors.join('; ')}`);
    this.name = 'RequestValidationError';
    this.errors = errors;
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
