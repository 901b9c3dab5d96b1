/**
 * Tests for the CLI configuration module.
 *
 * Covers: paths, defaults, .env loading, deep merge, ${VAR} resolution,
 * validation, and ConfigLoadError.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdirSync, writeFileSync, rmSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { tmpdir } from 'node:os';
import { ConfigError } from '@codedrop/core';

// ---------------------------------------------------------------------------
// Mock homedir to use a temp directory
// ---------------------------------------------------------------------------

const TEST_HOME = join(tmpdir(), `codedrop-config-test-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`);

vi.mock('node:os', async () => {
  const actual = await vi.importActual<typeof import('node:os')>('node:os');
  return {
    ...actual,
    homedir: () => TEST_HOME,
  };
});

import {
  getAppDir,
  getConfigPath,
  getLogsDir,
  getDefaultConfig,
  loadConfig,
  loadEnvFile,
  ConfigLoadError,
} from './config.js';

// ---------------------------------------------------------------------------
// Setup / Teardown
// ---------------------------------------------------------------------------

beforeEach(() => {
  mkdirSync(TEST_HOME, { recursive: true });
});

afterEach(() => {
  rmSync(TEST_HOME, { recursive: true, force: true });
  vi.restoreAllMocks();
});

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function appDir(): string {
  const dir = join(TEST_HOME, '.codedrop');
  mkdirSync(dir, { recursive: true });
  return dir;
}

function writeTestConfig(config: Record<string, unknown>): void {
  writeFileSync(join(appDir(), 'config.json'), JSON.stringify(config));
}

function writeEnvFile(content: string): void {
  writeFileSync(join(appDir(), '.env'), content);
}

function cleanupEnvVars(...keys: string[]): void {
  for (const key of keys) {
    delete process.env[key];
  }
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('Config paths', () => {
  it('getAppDir returns ~/.codedrop', () => {
    expect(getAppDir()).toBe(resolve(TEST_HOME, '.codedrop'));
  });

  it('getConfigPath returns ~/.codedrop/config.json', () => {
    expect(getConfigPath()).toBe(join(resolve(TEST_HOME, '.codedrop'), 'config.json'));
  });

  it('getLogsDir returns ~/.codedrop/logs', () => {
    expect(getLogsDir()).toBe(join(resolve(TEST_HOME, '.codedrop'), 'logs'));
  });
});

describe('getDefaultConfig', () => {
  it('listens on 0.0.0.0:5000', () => {
    expect(getDefaultConfig().server).toEqual({ port: 5000, host: '0.0.0.0' });
  });

  it('uses five-character codes and a 100 MB upload limit', () => {
    expect(getDefaultConfig().relay).toEqual({
      codeLength: 5,
      maxCodeAttempts: 32,
      maxUploadMB: 100,
      roomIdleTimeoutMs: 0,
    });
  });

  it('logs to the console at info', () => {
    expect(getDefaultConfig().observability).toEqual({ observers: ['console'], logLevel: 'info' });
  });
});

describe('loadConfig', () => {
  it('returns defaults when no config file exists', () => {
    expect(loadConfig()).toEqual(getDefaultConfig());
  });

  it('deep-merges user config over defaults', () => {
    writeTestConfig({ server: { port: 8080 }, relay: { roomIdleTimeoutMs: 600000 } });

    const config = loadConfig();

    expect(config.server).toEqual({ port: 8080, host: '0.0.0.0' });
    expect(config.relay.roomIdleTimeoutMs).toBe(600000);
    expect(config.relay.codeLength).toBe(5);
  });

  it('replaces arrays during merge', () => {
    writeTestConfig({ observability: { observers: ['file'] } });
    expect(loadConfig().observability.observers).toEqual(['file']);
  });

  it('resolves environment variables and coerces numeric strings', () => {
    process.env['CODEDROP_TEST_PORT'] = '9090';
    writeTestConfig({ server: { port: '${CODEDROP_TEST_PORT}' } });

    try {
      expect(loadConfig().server.port).toBe(9090);
    } finally {
      cleanupEnvVars('CODEDROP_TEST_PORT');
    }
  });

  it('warns about missing env vars and validates the empty result', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    writeTestConfig({ server: { host: '${CODEDROP_TEST_UNSET_HOST}' } });

    expect(() => loadConfig()).toThrow(/server\.host: Host must be a non-empty string/);
    expect(warn).toHaveBeenCalledWith(
      '  ⚠  Config references ${CODEDROP_TEST_UNSET_HOST} but it is not set in environment.',
    );
  });

  it('keeps an optional log path', () => {
    writeTestConfig({ observability: { logPath: '/tmp/codedrop-test.jsonl' } });
    expect(loadConfig().observability.logPath).toBe('/tmp/codedrop-test.jsonl');
  });

  it('throws ConfigLoadError for invalid JSON', () => {
    writeFileSync(join(appDir(), 'config.json'), '{not json');
    expect(() => loadConfig()).toThrow(ConfigLoadError);
  });

  it('throws ConfigLoadError when the file is not an object', () => {
    writeFileSync(join(appDir(), 'config.json'), '[1, 2]');
    expect(() => loadConfig()).toThrow(/expected a JSON object/);
  });

  it('throws ConfigLoadError for an invalid port', () => {
    writeTestConfig({ server: { port: 70000 } });
    expect(() => loadConfig()).toThrow(/server\.port/);
  });

  it('rejects code lengths outside 4-12', () => {
    writeTestConfig({ relay: { codeLength: 3 } });
    expect(() => loadConfig()).toThrow(/relay\.codeLength: Must be an integer between 4 and 12/);
  });

  it('rejects negative limits and zero attempts', () => {
    writeTestConfig({ relay: { maxUploadMB: -1, roomIdleTimeoutMs: -5, maxCodeAttempts: 0 } });

    let message = '';
    try {
      loadConfig();
    } catch (err) {
      message = err instanceof Error ? err.message : '';
    }

    expect(message).toBe(
      [
        'Configuration validation failed:',
        '  - relay.maxCodeAttempts: Must be a positive integer',
        '  - relay.maxUploadMB: Must be a non-negative number',
        '  - relay.roomIdleTimeoutMs: Must be a non-negative number',
      ].join('\n'),
    );
  });

  it('rejects unknown observers and log levels', () => {
    writeTestConfig({ observability: { observers: ['console', 'syslog'], logLevel: 'verbose' } });
    expect(() => loadConfig()).toThrow(/observability\.observers: Must be a list drawn from: console, file/);
    expect(() => loadConfig()).toThrow(/observability\.logLevel: Must be one of: debug, info, warn, error/);
  });

  it('accepts every log level', () => {
    for (const logLevel of ['debug', 'info', 'warn', 'error']) {
      writeTestConfig({ observability: { logLevel } });
      expect(loadConfig().observability.logLevel).toBe(logLevel);
    }
  });
});

describe('ConfigLoadError', () => {
  it('is a ConfigError with CONFIG_ERROR code', () => {
    const err = new ConfigLoadError('bad');
    expect(err.name).toBe('ConfigLoadError');
    expect(err).toBeInstanceOf(ConfigError);
    expect(err.code).toBe('CONFIG_ERROR');
  });
});

describe('loadEnvFile', () => {
  it('returns 0 when no .env file exists', () => {
    expect(loadEnvFile()).toBe(0);
  });

  it('loads KEY=value pairs into process.env', () => {
    writeEnvFile('CODEDROP_TEST_A=hello\nCODEDROP_TEST_B=world\n');

    try {
      expect(loadEnvFile()).toBe(2);
      expect(process.env['CODEDROP_TEST_A']).toBe('hello');
      expect(process.env['CODEDROP_TEST_B']).toBe('world');
    } finally {
      cleanupEnvVars('CODEDROP_TEST_A', 'CODEDROP_TEST_B');
    }
  });

  it('strips quotes and export prefixes, skips comments', () => {
    writeEnvFile('# comment\n\nexport CODEDROP_TEST_Q="quoted value"\nCODEDROP_TEST_S=\'single\'\nNO_EQUALS_HERE\n');

    try {
      expect(loadEnvFile()).toBe(2);
      expect(process.env['CODEDROP_TEST_Q']).toBe('quoted value');
      expect(process.env['CODEDROP_TEST_S']).toBe('single');
    } finally {
      cleanupEnvVars('CODEDROP_TEST_Q', 'CODEDROP_TEST_S');
    }
  });

  it('keeps values containing = signs', () => {
    writeEnvFile('CODEDROP_TEST_EQ=base64==value');

    try {
      loadEnvFile();
      expect(process.env['CODEDROP_TEST_EQ']).toBe('base64==value');
    } finally {
      cleanupEnvVars('CODEDROP_TEST_EQ');
    }
  });

  it('does not overwrite existing environment variables', () => {
    process.env['CODEDROP_TEST_EXISTING'] = 'original';
    writeEnvFile('CODEDROP_TEST_EXISTING=overwritten');

    try {
      expect(loadEnvFile()).toBe(0);
      expect(process.env['CODEDROP_TEST_EXISTING']).toBe('original');
    } finally {
      cleanupEnvVars('CODEDROP_TEST_EXISTING');
    }
  });

  it('is applied by loadConfig before resolving references', () => {
    writeEnvFile('CODEDROP_TEST_HOST=127.0.0.1');
    writeTestConfig({ server: { host: '${CODEDROP_TEST_HOST}' } });

    try {
      expect(loadConfig().server.host).toBe('127.0.0.1');
    } finally {
      cleanupEnvVars('CODEDROP_TEST_HOST');
    }
  });
});
