/**
 * Content Requests — validate raw input into an immutable ContentRequest.
 *
 * Collects every problem instead of stopping at the first one.
 */

import {
  CONTENT_KINDS,
  OUTPUT_FORMATS,
  PRIORITIES,
  TONES,
  isContentKind,
  isOutputFormat,
  isPriority,
  isTone,
} from '@inkline/shared';
import type { ContentKind } from '@inkline/shared';
import { RequestValidationError } from './errors.js';
import type { ContentRequest, ContentRequestInit, RequestParseResult } from './types.js';

export const TOPIC_MIN_LENGTH = 10;
export const TOPIC_MAX_LENGTH = 2000;

/**
 * Validate a raw object (parsed from JSON) into a ContentRequest.
 */
export function parseRequest(raw: unknown): RequestParseResult {
  if (!isRecord(raw)) {
    return { ok: false, errors: ['Request must be an object'] };
  }

  const errors: string[] = [];

  const topic = typeof raw.topic === 'string' ? raw.topic.trim() : '';
  if (typeof raw.topic !== 'string') {
    errors.push('"topic" is required and must be a string');
  } else if (topic.length < TOPIC_MIN_LENGTH || topic.length > TOPIC_MAX_LENGTH) {
    errors.push(`"topic" must be between ${TOPIC_MIN_LENGTH} and ${TOPIC_MAX_LENGTH} characters`);
  }

  const kinds: ContentKind[] = [];
  if (!Array.isArray(raw.kinds) || raw.kinds.length === 0) {
    errors.push('"kinds" is required and must be a non-empty array');
  } else {
    raw.kinds.forEach((kind: unknown, i: number) => {
      if (!isContentKind(kind)) {
        errors.push(`kinds[${i}]: must be one of: ${CONTENT_KINDS.join(', ')}`);
      } else if (kinds.includes(kind)) {
        errors.push(`kinds[${i}]: duplicate kind "${kind}"`);
      } else {
        kinds.push(kind);
      }
    });
  }

  let priority: ContentRequest['priority'] = 'normal';
  if (raw.priority !== undefined) {
    if (isPriority(raw.priority)) {
      priority = raw.priority;
    } else {
      errors.push(`"priority" must be one of: ${PRIORITIES.join(', ')}`);
    }
  }

  let deadline: string | null = null;
  if (raw.deadline !== undefined && raw.deadline !== null) {
    if (typeof raw.deadline !== 'string' || Number.isNaN(Date.parse(raw.deadline))) {
      errors.push('"deadline" must be an ISO 8601 date string');
    } else {
      deadline = raw.deadline;
    }
  }

  let context: Record<string, unknown> = {};
  if (raw.context !== undefined) {
    if (!isRecord(raw.context)) {
      errors.push('"context" must be an object');
    } else {
      context = raw.context;
      errors.push(...validateContext(context));
    }
  }

  if (errors.length > 0) {
    return { ok: false, errors };
  }

  return {
    ok: true,
    request: Object.freeze({
      topic,
      kinds: Object.freeze(kinds),
      priority,
      deadline,
      context: Object.freeze({ ...context }),
    }),
  };
}

/**
 * Build a request in code. Throws RequestValidationError on bad input.
 */
export function createRequest(init: ContentRequestInit): ContentRequest {
  const result = parseRequest(init);
  if (!result.ok) {
    throw new RequestValidationError(result.errors);
  }
  return result.request;
}

// Context is free-form; only the keys the pipeline and producers agree on are checked.
function validateContext(context: Record<string, unknown>): string[] {
  const errors: string[] = [];

  if (context.outputFormat !== undefined && !isOutputFormat(context.outputFormat)) {
    errors.push(`context.outputFormat must be one of: ${OUTPUT_FORMATS.join(', ')}`);
  }

  if (context.outputFormats !== undefined) {
    if (!Array.isArray(context.outputFormats) || context.outputFormats.length === 0) {
      errors.push('context.outputFormats must be a non-empty array');
    } else if (!context.outputFormats.every(isOutputFormat)) {
      errors.push(`context.outputFormats entries must be one of: ${OUTPUT_FORMATS.join(', ')}`);
    }
  }

  if (context.tone !== undefined && !isTone(context.tone)) {
    errors.push(`context.tone must be one of: ${TONES.join(', ')}`);
  }

  if (context.targetAudience !== undefined && typeof context.targetAudience !== 'string') {
    errors.push('context.targetAudience must be a string');
  }

  if (context.wordCountRange !== undefined) {
    const range = context.wordCountRange;
    if (
      !Array.isArray(range) ||
      range.length !== 2 ||
      typeof range[0] !== 'number' ||
      typeof range[1] !== 'number' ||
      range[0] <= 0 ||
      range[1] < range[0]
    ) {
      errors.push('context.wordCountRange must be [min, max] with 0 < min <= max');
    }
  }

  return errors;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
