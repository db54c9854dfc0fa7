/**
 * Shared Test Suite — Event Bus and structured logger.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { EventBus, createEvent, createLogger, isChannel, isContentKind, isLogLevel } from '@inkline/shared';
import type { BusEvent, LedgerEntry } from '@inkline/shared';

// ─── Test Helpers ─────────────────────────────────────────────────

function captureLogger(level: 'debug' | 'info' | 'warn' | 'error' | 'silent' = 'debug') {
  const lines: string[] = [];
  const logger = createLogger({ level, service: 'test', sink: line => lines.push(line) });
  const records = () => lines.map(line => JSON.parse(line));
  return { logger, lines, records };
}

const entry: LedgerEntry = {
  step: 'research',
  track: null,
  gate: 'research-completeness',
  success: true,
  error: null,
  timestamp: '2026-01-01T00:00:00.000Z',
};

// ═══════════════════════════════════════════════════════════════════
// Event Bus
// ═══════════════════════════════════════════════════════════════════

describe('Event Bus', () => {
  let bus: EventBus;

  beforeEach(() => {
    bus = new EventBus({ logger: createLogger({ level: 'silent' }) });
  });

  it('delivers events to exact channel subscribers with a typed payload', async () => {
    const topics: string[] = [];
    bus.on('job.created', event => {
      topics.push(event.payload.topic);
    });

    await bus.emit(createEvent('job.created', 'jobs', { jobId: 'job-1', topic: 'Quarterly review' }));
    await bus.emit(createEvent('job.updated', 'jobs', { jobId: 'job-1', status: 'running', progress: 10 }));

    expect(topics).toEqual(['Quarterly review']);
  });

  it('matches family and wildcard patterns', async () => {
    const family: string[] = [];
    const all: string[] = [];
    bus.onPattern('run.*', event => {
      family.push(event.channel);
    });
    bus.onPattern('*', event => {
      all.push(event.channel);
    });

    await bus.emit(createEvent('run.step_recorded', 'pipeline', { entry, recorded: 1, plannedInvocations: 5 }, { runId: 'r1' }));
    await bus.emit(createEvent('job.expired', 'jobs', { jobIds: [] }));

    expect(family).toEqual(['run.step_recorded']);
    expect(all).toEqual(['run.step_recorded', 'job.expired']);
  });

  it('calls handlers in subscription order across patterns', async () => {
    const order: string[] = [];
    bus.onPattern('*', () => { order.push('wildcard'); });
    bus.on('run.completed', () => { order.push('exact'); });
    bus.onPattern('run.*', () => { order.push('family'); });

    await bus.emit(createEvent('run.completed', 'pipeline', { workflowShape: 'single-track', recorded: 5, warnings: 0 }));

    expect(order).toEqual(['wildcard', 'exact', 'family']);
  });

  it('once() handlers fire a single time', async () => {
    let count = 0;
    bus.once('job.expired', () => { count++; });

    await bus.emit(createEvent('job.expired', 'jobs', { jobIds: ['a'] }));
    await bus.emit(createEvent('job.expired', 'jobs', { jobIds: ['b'] }));

    expect(count).toBe(1);
    expect(bus.getStats()).toEqual({});
  });

  it('unsubscribe stops delivery', async () => {
    let count = 0;
    const off = bus.on('job.expired', () => { count++; });
    off();

    await bus.emit(createEvent('job.expired', 'jobs', { jobIds: [] }));
    expect(count).toBe(0);
  });

  it('isolates a throwing handler and logs it', async () => {
    const { logger, records } = captureLogger();
    const isolated = new EventBus({ logger });
    const seen: string[] = [];

    isolated.on('job.expired', () => {
      throw new Error('handler exploded');
    });
    isolated.on('job.expired', event => {
      seen.push(event.payload.jobIds.join(','));
    });

    await isolated.emit(createEvent('job.expired', 'jobs', { jobIds: ['x', 'y'] }));

    expect(seen).toEqual(['x,y']);
    const [record] = records();
    expect(record.level).toBe('error');
    expect(record.message).toBe('event handler failed');
    expect(record.channel).toBe('job.expired');
    expect(record.error.message).toBe('handler exploded');
  });

  it('keeps a bounded history filtered by channel', async () => {
    const small = new EventBus({ maxHistory: 2, logger: createLogger({ level: 'silent' }) });
    await small.emit(createEvent('job.expired', 'jobs', { jobIds: ['1'] }));
    await small.emit(createEvent('job.created', 'jobs', { jobId: 'j', topic: 't' }));
    await small.emit(createEvent('job.expired', 'jobs', { jobIds: ['3'] }));

    expect(small.getHistory().map(e => e.channel)).toEqual(['job.created', 'job.expired']);
    expect(small.getHistory('job.expired')).toHaveLength(1);
  });

  it('createEvent fills the envelope and isChannel narrows it', () => {
    const event: BusEvent = createEvent('run.cancelled', 'pipeline', { workflowShape: 'presentation', step: 'draft' }, { runId: 'run-7' });

    expect(event.runId).toBe('run-7');
    expect(event.source).toBe('pipeline');
    expect(isChannel(event, 'run.cancelled')).toBe(true);
    expect(isChannel(event, 'run.failed')).toBe(false);
    if (isChannel(event, 'run.cancelled')) {
      expect(event.payload.step).toBe('draft');
    }
  });
});

// ═══════════════════════════════════════════════════════════════════
// Logger
// ═══════════════════════════════════════════════════════════════════

describe('Logger', () => {
  it('writes one JSON line per entry with service and context', () => {
    const { logger, records } = captureLogger();
    logger.info({ runId: 'run-1', steps: 5 }, 'run planned');

    const [record] = records();
    expect(record).toMatchObject({ level: 'info', message: 'run planned', service: 'test', runId: 'run-1', steps: 5 });
    expect(typeof record.timestamp).toBe('string');
  });

  it('filters below the configured level', () => {
    const { logger, lines } = captureLogger('warn');
    logger.debug({}, 'noise');
    logger.info({}, 'more noise');
    logger.warn({}, 'kept');
    logger.error({}, 'kept too');

    expect(lines).toHaveLength(2);
  });

  it('silent drops everything', () => {
    const { logger, lines } = captureLogger('silent');
    logger.error({}, 'nothing');
    expect(lines).toHaveLength(0);
  });

  it('child loggers merge context and drop undefined fields', () => {
    const { logger, records } = captureLogger();
    const child = logger.child({ runId: 'run-2', workflowShape: 'multi-target' });
    child.warn({ track: undefined, gate: 'brand-consistency' }, 'quality gate failed');

    const [record] = records();
    expect(record.runId).toBe('run-2');
    expect(record.workflowShape).toBe('multi-target');
    expect(record.gate).toBe('brand-consistency');
    expect('track' in record).toBe(false);
  });

  it('serializes errors into name and message', () => {
    const { logger, records } = captureLogger();
    logger.error({ error: new TypeError('bad input') }, 'producer failed');

    const [record] = records();
    expect(record.error.name).toBe('TypeError');
    expect(record.error.message).toBe('bad input');
  });

  it('writes cyclic and bigint context without throwing', () => {
    const { logger, records } = captureLogger();
    const request: Record<string, unknown> = { url: 'https://example.com/feed' };
    request.self = request;

    logger.error({ error: { code: 'ECONNRESET', request }, request, bytes: 12n }, 'fetch failed');

    const [record] = records();
    expect(record.error).toBe('[object Object]');
    expect(record.request).toEqual({ url: 'https://example.com/feed', self: '[Circular]' });
    expect(record.bytes).toBe('12');
  });

  it('recognizes log levels and content kinds', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isContentKind('case-study')).toBe(true);
    expect(isContentKind('podcast')).toBe(false);
  });
});
