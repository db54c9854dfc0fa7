/**
 * Engine Configuration — parse inkline.config.yaml into a typed EngineConfig.
 *
 * Every key is optional; missing keys take the defaults below. Problems are
 * collected, not thrown one at a time.
 */

import { existsSync, readFileSync } from 'fs';
import { resolve } from 'path';
import yaml from 'js-yaml';
import { WORKFLOW_SHAPES, isLogLevel, isOutputFormat } from '@inkline/shared';
import type { LogLevel, OutputFormat, WorkflowShape } from '@inkline/shared';
import { errorMessage } from './errors.js';
import { isRecord } from './request.js';

export const CONFIG_FILE = 'inkline.config.yaml';

export interface EngineConfig {
  gates: { strict: boolean };
  fanOut: { concurrent: boolean };
  production: { defaultFormat: OutputFormat; fallbackFormat: OutputFormat };
  jobs: { ttlHours: number; dbPath: string };
  server: { port: number; corsOrigins: string[] };
  logging: { level: LogLevel };
  workflows: Partial<Record<WorkflowShape, string[]>> | null;
}

export type ConfigParseResult =
  | { ok: true; config: EngineConfig }
  | { ok: false; errors: string[] };

export const DEFAULT_CONFIG: EngineConfig = {
  gates: { strict: false },
  fanOut: { concurrent: true },
  production: { defaultFormat: 'html', fallbackFormat: 'html' },
  jobs: { ttlHours: 24, dbPath: '.inkline/jobs.db' },
  server: { port: 3001, corsOrigins: [] },
  logging: { level: 'info' },
  workflows: null,
};

/**
 * Parse a YAML string. An empty document yields the defaults.
 */
export function parseConfig(yamlString: string): ConfigParseResult {
  let raw: unknown;
  try {
    raw = yaml.load(yamlString);
  } catch (err) {
    return { ok: false, errors: [`YAML parse error: ${errorMessage(err)}`] };
  }
  return validateConfig(raw ?? {});
}

export function validateConfig(raw: unknown): ConfigParseResult {
  if (!isRecord(raw)) {
    return { ok: false, errors: ['Configuration must be a mapping'] };
  }

  const errors: string[] = [];
  const config = structuredClone(DEFAULT_CONFIG);

  const gates = section(raw, 'gates', errors);
  if (gates?.strict !== undefined) {
    if (typeof gates.strict === 'boolean') config.gates.strict = gates.strict;
    else errors.push('gates.strict must be a boolean');
  }

  const fanOut = section(raw, 'fanOut', errors);
  if (fanOut?.concurrent !== undefined) {
    if (typeof fanOut.concurrent === 'boolean') config.fanOut.concurrent = fanOut.concurrent;
    else errors.push('fanOut.concurrent must be a boolean');
  }

  const production = section(raw, 'production', errors);
  for (const key of ['defaultFormat', 'fallbackFormat'] as const) {
    const value = production?.[key];
    if (value === undefined) continue;
    if (isOutputFormat(value)) config.production[key] = value;
    else errors.push(`production.${key} must be a known output format`);
  }

  const jobs = section(raw, 'jobs', errors);
  if (jobs?.ttlHours !== undefined) {
    if (typeof jobs.ttlHours === 'number' && jobs.ttlHours > 0) config.jobs.ttlHours = jobs.ttlHours;
    else errors.push('jobs.ttlHours must be a positive number');
  }
  if (jobs?.dbPath !== undefined) {
    if (typeof jobs.dbPath === 'string' && jobs.dbPath.length > 0) config.jobs.dbPath = jobs.dbPath;
    else errors.push('jobs.dbPath must be a non-empty string');
  }

  const server = section(raw, 'server', errors);
  if (server?.port !== undefined) {
    if (isPort(server.port)) config.server.port = server.port;
    else errors.push('server.port must be an integer between 0 and 65535');
  }
  if (server?.corsOrigins !== undefined) {
    const origins: unknown = server.corsOrigins;
    if (Array.isArray(origins) && origins.every((o: unknown) => typeof o === 'string')) {
      config.server.corsOrigins = origins.map(String);
    } else {
      errors.push('server.corsOrigins must be a list of strings');
    }
  }

  const logging = section(raw, 'logging', errors);
  if (logging?.level !== undefined) {
    if (isLogLevel(logging.level)) config.logging.level = logging.level;
    else errors.push('logging.level must be one of: debug, info, warn, error, silent');
  }

  const workflows = section(raw, 'workflows', errors);
  if (workflows) {
    const overrides: Partial<Record<WorkflowShape, string[]>> = {};
    for (const [shape, sequence] of Object.entries(workflows)) {
      const known = WORKFLOW_SHAPES.find(s => s === shape);
      if (!known) {
        errors.push(`workflows: unknown workflow shape "${shape}"`);
      } else if (!Array.isArray(sequence) || !sequence.every((s: unknown) => typeof s === 'string')) {
        errors.push(`workflows.${shape} must be a list of step names`);
      } else {
        overrides[known] = sequence.map(String);
      }
    }
    config.workflows = overrides;
  }

  if (errors.length > 0) {
    return { ok: false, errors };
  }
  return { ok: true, config };
}

/**
 * Apply environment overrides on top of a parsed configuration.
 */
export function applyEnv(config: EngineConfig, env: NodeJS.ProcessEnv): EngineConfig {
  const next = structuredClone(config);

  if (env.INKLINE_STRICT_GATES !== undefined) {
    next.gates.strict = ['1', 'true', 'yes'].includes(env.INKLINE_STRICT_GATES.toLowerCase());
  }
  if (env.INKLINE_LOG_LEVEL !== undefined && isLogLevel(env.INKLINE_LOG_LEVEL)) {
    next.logging.level = env.INKLINE_LOG_LEVEL;
  }
  if (env.INKLINE_DB_PATH) {
    next.jobs.dbPath = env.INKLINE_DB_PATH;
  }
  if (env.PORT !== undefined) {
    const port = parseInt(env.PORT, 10);
    if (isPort(port)) next.server.port = port;
  }

  return next;
}

/**
 * Read the config file (if present) and apply the environment. A missing
 * file means defaults; an invalid one throws with every problem listed.
 */
export function loadConfig(path?: string, env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const file = resolve(path ?? CONFIG_FILE);
  let config = DEFAULT_CONFIG;

  if (existsSync(file)) {
    const parsed = parseConfig(readFileSync(file, 'utf-8'));
    if (!parsed.ok) {
      throw new Error(`Invalid configuration in ${file}: ${parsed.errors.join('; ')}`);
    }
    config = parsed.config;
  } else if (path !== undefined) {
    throw new Error(`Configuration file not found: ${file}`);
  }

  return applyEnv(config, env);
}

function section(raw: Record<string, unknown>, key: string, errors: string[]): Record<string, unknown> | null {
  const value = raw[key];
  if (value === undefined || value === null) return null;
  if (!isRecord(value)) {
    errors.push(`"${key}" must be a mapping`);
    return null;
  }
  return value;
}

function isPort(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= 65535;
}
