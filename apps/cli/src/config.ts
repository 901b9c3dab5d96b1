/**
 * Configuration loading and validation.
 *
 * Loads user config from ~/.codedrop/config.json, merges it over the bundled
 * defaults, resolves ${VAR_NAME} environment variable references, and
 * validates the result into a typed CodeDropConfig.
 */

import { readFileSync, existsSync } from 'node:fs';
import { resolve, join } from 'node:path';
import { homedir } from 'node:os';
import type { CodeDropConfig, LogLevel } from '@codedrop/core';
import { ConfigError } from '@codedrop/core';
import { OBSERVER_NAMES } from '@codedrop/observability';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const APP_DIR_NAME = '.codedrop';
const CONFIG_FILE_NAME = 'config.json';
const LOGS_DIR_NAME = 'logs';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

// ---------------------------------------------------------------------------
// Paths
// ---------------------------------------------------------------------------

/** Resolve the app home directory (~/.codedrop). */
export function getAppDir(): string {
  return resolve(homedir(), APP_DIR_NAME);
}

/** Resolve the path to the user config file. */
export function getConfigPath(): string {
  return join(getAppDir(), CONFIG_FILE_NAME);
}

/** Resolve the path to the logs directory. */
export function getLogsDir(): string {
  return join(getAppDir(), LOGS_DIR_NAME);
}

// ---------------------------------------------------------------------------
// Default config
// ---------------------------------------------------------------------------

export function getDefaultConfig(): CodeDropConfig {
  return {
    server: {
      port: 5000,
      host: '0.0.0.0',
    },
    relay: {
      codeLength: 5,
      maxCodeAttempts: 32,
      maxUploadMB: 100,
      roomIdleTimeoutMs: 0,
    },
    observability: {
      observers: ['console'],
      logLevel: 'info',
    },
  };
}

// ---------------------------------------------------------------------------
// .env file loading
// ---------------------------------------------------------------------------

/**
 * Load variables from ~/.codedrop/.env into process.env.
 *
 * Supports KEY=value, quoted values, `export` prefixes, comments and blank
 * lines. Existing environment variables are not overwritten, so
 * `PORT=8080 codedrop serve` beats a PORT line in the file.
 *
 * Returns the number of variables set.
 */
export function loadEnvFile(): number {
  const envPath = join(getAppDir(), '.env');
  if (!existsSync(envPath)) return 0;

  const raw = readFileSync(envPath, 'utf8');
  let loaded = 0;

  for (const line of raw.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;

    const stripped = trimmed.startsWith('export ') ? trimmed.slice(7).trim() : trimmed;

    const eqIdx = stripped.indexOf('=');
    if (eqIdx === -1) continue;

    const key = stripped.slice(0, eqIdx).trim();
    let value = stripped.slice(eqIdx + 1).trim();

    if (
      (value.startsWith('"') && value.endsWith('"')) ||
      (value.startsWith("'") && value.endsWith("'"))
    ) {
      value = value.slice(1, -1);
    }

    if (key && process.env[key] === undefined) {
      process.env[key] = value;
      loaded++;
    }
  }

  return loaded;
}

// ---------------------------------------------------------------------------
// Environment variable resolution
// ---------------------------------------------------------------------------

/**
 * Recursively resolve ${VAR_NAME} references in string values. Missing
 * variables resolve to the empty string and are collected in `missing`.
 */
function resolveEnvVars(value: unknown, missing: Set<string>): unknown {
  if (typeof value === 'string') {
    return value.replace(/\$\{([^}]+)\}/g, (_match, varName: string) => {
      const resolved = process.env[varName];
      if (resolved === undefined) missing.add(varName);
      return resolved ?? '';
    });
  }

  if (Array.isArray(value)) {
    return value.map((item) => resolveEnvVars(item, missing));
  }

  if (isRecord(value)) {
    const result: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = resolveEnvVars(item, missing);
    }
    return result;
  }

  return value;
}

// ---------------------------------------------------------------------------
// Deep merge
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Deep merge `source` into `target`. Arrays are replaced, not merged.
 * Returns a new object; neither input is mutated.
 */
function deepMerge(target: object, source: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = Object.fromEntries(Object.entries(target));

  for (const [key, sourceVal] of Object.entries(source)) {
    const targetVal = result[key];
    result[key] = isRecord(sourceVal) && isRecord(targetVal) ? deepMerge(targetVal, sourceVal) : sourceVal;
  }

  return result;
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

interface ValidationError {
  field: string;
  message: string;
}

/** Numbers may arrive as strings after ${VAR} substitution. */
function toNumber(value: unknown): number | undefined {
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && /^\d+(\.\d+)?$/.test(value.trim())) return Number(value);
  return undefined;
}

function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function validateConfig(raw: Record<string, unknown>): { config: CodeDropConfig; errors: ValidationError[] } {
  const errors: ValidationError[] = [];
  const defaults = getDefaultConfig();
  const server = isRecord(raw['server']) ? raw['server'] : {};
  const relay = isRecord(raw['relay']) ? raw['relay'] : {};
  const observability = isRecord(raw['observability']) ? raw['observability'] : {};

  const numberField = (
    section: Record<string, unknown>,
    field: string,
    fallback: number,
    check: (n: number) => boolean,
    message: string,
  ): number => {
    const key = field.slice(field.indexOf('.') + 1);
    const n = toNumber(section[key]);
    if (n === undefined || !check(n)) {
      errors.push({ field, message });
      return fallback;
    }
    return n;
  };

  // --- server ---
  const port = numberField(
    server,
    'server.port',
    defaults.server.port,
    (n) => Number.isInteger(n) && n >= 1 && n <= 65535,
    'Port must be a number between 1 and 65535',
  );

  const hostValue = server['host'];
  let host = defaults.server.host;
  if (typeof hostValue === 'string' && hostValue.trim()) {
    host = hostValue.trim();
  } else {
    errors.push({ field: 'server.host', message: 'Host must be a non-empty string' });
  }

  // --- relay ---
  const codeLength = numberField(
    relay,
    'relay.codeLength',
    defaults.relay.codeLength,
    (n) => Number.isInteger(n) && n >= 4 && n <= 12,
    'Must be an integer between 4 and 12',
  );
  const maxCodeAttempts = numberField(
    relay,
    'relay.maxCodeAttempts',
    defaults.relay.maxCodeAttempts,
    (n) => Number.isInteger(n) && n >= 1,
    'Must be a positive integer',
  );
  const maxUploadMB = numberField(
    relay,
    'relay.maxUploadMB',
    defaults.relay.maxUploadMB,
    (n) => n >= 0,
    'Must be a non-negative number',
  );
  const roomIdleTimeoutMs = numberField(
    relay,
    'relay.roomIdleTimeoutMs',
    defaults.relay.roomIdleTimeoutMs,
    (n) => n >= 0,
    'Must be a non-negative number',
  );

  // --- observability ---
  const observersValue = observability['observers'];
  let observers = defaults.observability.observers;
  if (
    Array.isArray(observersValue) &&
    observersValue.every((name): name is string => OBSERVER_NAMES.some((known) => known === name))
  ) {
    observers = observersValue;
  } else {
    errors.push({
      field: 'observability.observers',
      message: `Must be a list drawn from: ${OBSERVER_NAMES.join(', ')}`,
    });
  }

  const logLevelValue = observability['logLevel'];
  let logLevel = defaults.observability.logLevel;
  if (isLogLevel(logLevelValue)) {
    logLevel = logLevelValue;
  } else {
    errors.push({ field: 'observability.logLevel', message: `Must be one of: ${LOG_LEVELS.join(', ')}` });
  }

  const logPathValue = observability['logPath'];
  let logPath: string | undefined;
  if (typeof logPathValue === 'string' && logPathValue) {
    logPath = logPathValue;
  } else if (logPathValue !== undefined) {
    errors.push({ field: 'observability.logPath', message: 'Must be a non-empty string' });
  }

  return {
    config: {
      server: { port, host },
      relay: { codeLength, maxCodeAttempts, maxUploadMB, roomIdleTimeoutMs },
      observability: { observers, logLevel, ...(logPath ? { logPath } : {}) },
    },
    errors,
  };
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Load and return a fully resolved, validated CodeDropConfig.
 *
 * 1. Loads ~/.codedrop/.env into process.env.
 * 2. Deep-merges ~/.codedrop/config.json (if present) over the defaults.
 * 3. Resolves ${VAR_NAME} references.
 * 4. Validates every field.
 *
 * Throws ConfigLoadError if the file cannot be parsed or validation fails.
 */
export function loadConfig(): CodeDropConfig {
  loadEnvFile();

  let merged: Record<string, unknown> = deepMerge(getDefaultConfig(), {});

  const configPath = getConfigPath();
  if (existsSync(configPath)) {
    let userConfig: unknown;
    try {
      userConfig = JSON.parse(readFileSync(configPath, 'utf8'));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new ConfigLoadError(`Failed to parse ${configPath}: ${message}`);
    }
    if (!isRecord(userConfig)) {
      throw new ConfigLoadError(`Failed to parse ${configPath}: expected a JSON object`);
    }
    merged = deepMerge(merged, userConfig);
  }

  const missingVars = new Set<string>();
  const resolved = resolveEnvVars(merged, missingVars);

  for (const varName of missingVars) {
    console.warn(`  ⚠  Config references \${${varName}} but it is not set in environment.`);
  }

  const { config, errors } = validateConfig(isRecord(resolved) ? resolved : {});
  if (errors.length > 0) {
    const details = errors.map((e) => `  - ${e.field}: ${e.message}`).join('\n');
    throw new ConfigLoadError(`Configuration validation failed:\n${details}`);
  }

  return config;
}

// ---------------------------------------------------------------------------
// Error type
// ---------------------------------------------------------------------------

export class ConfigLoadError extends ConfigError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigLoadError';
  }
}
