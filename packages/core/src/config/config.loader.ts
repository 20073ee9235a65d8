import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import yaml from 'js-yaml';
import type { Budget, CommandConfig, TesseraConfig } from '@tessera/shared';
import { DEFAULT_CONFIG } from './config.defaults.js';
import { ConfigValidationError } from '../errors.js';

const TESSERA_DIR = path.join(os.homedir(), '.tessera');
const CONFIG_PATH = path.join(TESSERA_DIR, 'config.yaml');

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function deepMerge(base: PlainObject, override: PlainObject): PlainObject {
  const result: PlainObject = { ...base };
  for (const key of Object.keys(override)) {
    const overrideVal = override[key];
    const baseVal = base[key];
    if (isPlainObject(overrideVal) && isPlainObject(baseVal)) {
      result[key] = deepMerge(baseVal, overrideVal);
    } else if (overrideVal !== undefined) {
      result[key] = overrideVal;
    }
  }
  return result;
}

function requireInteger(value: unknown, name: string, min: number): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < min) {
    throw new ConfigValidationError(`${name} must be an integer >= ${min}`);
  }
  return value;
}

function requireString(value: unknown, name: string): string {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ConfigValidationError(`${name} must be a non-empty string`);
  }
  return value;
}

function requireSection(value: unknown, name: string): PlainObject {
  if (!isPlainObject(value)) {
    throw new ConfigValidationError(`${name} must be a mapping`);
  }
  return value;
}

function parseCommand(value: unknown, name: string): CommandConfig {
  const section = requireSection(value, name);
  return {
    command: requireString(section['command'], `${name}.command`),
    timeout_ms: requireInteger(section['timeout_ms'], `${name}.timeout_ms`, 1),
  };
}

/**
 * Validate a merged config object and narrow it to TesseraConfig.
 * Throws ConfigValidationError naming the first offending field.
 */
export function validateConfig(raw: unknown): TesseraConfig {
  const root = requireSection(raw, 'config');
  const budget = requireSection(root['budget'], 'budget');
  const retry = requireSection(root['retry'], 'retry');
  const ledger = requireSection(root['ledger'], 'ledger');
  const logs = requireSection(root['logs'], 'logs');
  const server = requireSection(root['server'], 'server');

  const config: TesseraConfig = {
    budget: {
      max_resources_per_subtask: requireInteger(
        budget['max_resources_per_subtask'],
        'budget.max_resources_per_subtask',
        1,
      ),
      soft_threshold: requireInteger(budget['soft_threshold'], 'budget.soft_threshold', 1),
      hard_threshold: requireInteger(budget['hard_threshold'], 'budget.hard_threshold', 1),
      post_compaction_baseline: requireInteger(
        budget['post_compaction_baseline'],
        'budget.post_compaction_baseline',
        0,
      ),
      concurrency_limit: requireInteger(budget['concurrency_limit'], 'budget.concurrency_limit', 1),
      session_timeout_ms: requireInteger(
        budget['session_timeout_ms'],
        'budget.session_timeout_ms',
        1,
      ),
    },
    retry: { max_retries: requireInteger(retry['max_retries'], 'retry.max_retries', 0) },
    ledger: { dir: requireString(ledger['dir'], 'ledger.dir') },
    logs: { retention: requireInteger(logs['retention'], 'logs.retention', 1) },
    server: { port: requireInteger(server['port'], 'server.port', 1) },
    worker: root['worker'] == null ? null : parseCommand(root['worker'], 'worker'),
    verification: [],
  };

  if (config.budget.soft_threshold >= config.budget.hard_threshold) {
    throw new ConfigValidationError('budget.soft_threshold must be below budget.hard_threshold');
  }
  if (config.budget.post_compaction_baseline >= config.budget.soft_threshold) {
    throw new ConfigValidationError(
      'budget.post_compaction_baseline must be below budget.soft_threshold',
    );
  }
  if (config.server.port > 65535) {
    throw new ConfigValidationError('server.port must be a valid port number (1-65535)');
  }

  const hooks = root['verification'] ?? [];
  if (!Array.isArray(hooks)) {
    throw new ConfigValidationError('verification must be a list');
  }
  config.verification = hooks.map((hook: unknown, i: number) => {
    const name = `verification[${i}]`;
    const section = requireSection(hook, name);
    return {
      name: requireString(section['name'], `${name}.name`),
      ...parseCommand(section, name),
    };
  });

  return config;
}

/** Convert the snake_case config sections into the immutable runtime Budget. */
export function budgetFromConfig(config: TesseraConfig): Budget {
  return Object.freeze({
    maxResourcesPerSubtask: config.budget.max_resources_per_subtask,
    softThreshold: config.budget.soft_threshold,
    hardThreshold: config.budget.hard_threshold,
    postCompactionBaseline: config.budget.post_compaction_baseline,
    concurrencyLimit: config.budget.concurrency_limit,
    sessionTimeoutMs: config.budget.session_timeout_ms,
    maxRetries: config.retry.max_retries,
  });
}

export function writeConfig(config: TesseraConfig): void {
  validateConfig(config);
  if (!fs.existsSync(TESSERA_DIR)) {
    fs.mkdirSync(TESSERA_DIR, { recursive: true });
  }
  fs.writeFileSync(CONFIG_PATH, yaml.dump(config), 'utf8');
}

export async function loadConfig(): Promise<TesseraConfig> {
  // Ensure ~/.tessera/ exists
  if (!fs.existsSync(TESSERA_DIR)) {
    fs.mkdirSync(TESSERA_DIR, { recursive: true });
  }

  let userConfig: PlainObject = {};

  if (fs.existsSync(CONFIG_PATH)) {
    const raw = fs.readFileSync(CONFIG_PATH, 'utf8');
    const parsed = yaml.load(raw);
    if (isPlainObject(parsed)) {
      userConfig = parsed;
    }
  } else {
    fs.writeFileSync(CONFIG_PATH, yaml.dump(DEFAULT_CONFIG), 'utf8');
    process.stderr.write(`[tessera] Created default config at ${CONFIG_PATH}\n`);
  }

  const defaults: PlainObject = { ...DEFAULT_CONFIG };
  return validateConfig(deepMerge(defaults, userConfig));
}

export { TESSERA_DIR, CONFIG_PATH };
