/**
 * Tests for the serve command: option resolution, banner rows, and the
 * failure paths that end the command before it blocks.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdirSync, writeFileSync, rmSync } from 'node:fs';
import { createServer, type Server } from 'node:http';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

const TEST_HOME = join(tmpdir(), `codedrop-serve-test-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`);

vi.mock('node:os', async () => {
  const actual = await vi.importActual<typeof import('node:os')>('node:os');
  return {
    ...actual,
    homedir: () => TEST_HOME,
  };
});

import { getDefaultConfig } from '../config.js';
import { ACCENT, RESET, YELLOW, kvRow } from '../ui.js';
import { resolveServeOptions, describeServer, serve } from './serve.js';

beforeEach(() => {
  mkdirSync(join(TEST_HOME, '.codedrop'), { recursive: true });
});

afterEach(() => {
  rmSync(TEST_HOME, { recursive: true, force: true });
  vi.restoreAllMocks();
  process.exitCode = undefined;
});

// ---------------------------------------------------------------------------
// resolveServeOptions
// ---------------------------------------------------------------------------

describe('resolveServeOptions', () => {
  it('uses config values when no flags or env are given', () => {
    const options = resolveServeOptions(getDefaultConfig(), [], {});
    expect(options).toEqual({
      port: 5000,
      host: '0.0.0.0',
      codeLength: 5,
      maxCodeAttempts: 32,
      maxUploadBytes: 100 * 1024 * 1024,
      roomIdleTimeoutMs: 0,
    });
  });

  it('takes PORT from the environment over the config file', () => {
    const options = resolveServeOptions(getDefaultConfig(), [], { PORT: '8080' });
    expect(options.port).toBe(8080);
  });

  it('takes --port over PORT', () => {
    const options = resolveServeOptions(getDefaultConfig(), ['--port', '9090'], { PORT: '8080' });
    expect(options.port).toBe(9090);
  });

  it('ignores an invalid PORT', () => {
    expect(resolveServeOptions(getDefaultConfig(), [], { PORT: 'abc' }).port).toBe(5000);
    expect(resolveServeOptions(getDefaultConfig(), [], { PORT: '70000' }).port).toBe(5000);
  });

  it('ignores an invalid --port', () => {
    const options = resolveServeOptions(getDefaultConfig(), ['--port', '0'], { PORT: '8080' });
    expect(options.port).toBe(8080);
  });

  it('applies --host', () => {
    const options = resolveServeOptions(getDefaultConfig(), ['--host', '127.0.0.1', '--port', '6000'], {});
    expect(options.host).toBe('127.0.0.1');
    expect(options.port).toBe(6000);
  });

  it('leaves the upload limit off when maxUploadMB is 0', () => {
    const config = getDefaultConfig();
    config.relay.maxUploadMB = 0;
    const options = resolveServeOptions(config, [], {});
    expect(options.maxUploadBytes).toBeUndefined();
  });

  it('converts fractional megabytes to whole bytes', () => {
    const config = getDefaultConfig();
    config.relay.maxUploadMB = 0.5;
    expect(resolveServeOptions(config, [], {}).maxUploadBytes).toBe(524288);
  });
});

// ---------------------------------------------------------------------------
// describeServer
// ---------------------------------------------------------------------------

describe('describeServer', () => {
  it('lists the listener, limits and timeout', () => {
    const options = resolveServeOptions(getDefaultConfig(), ['--host', '127.0.0.1'], {});
    const rows = describeServer(options, { host: '127.0.0.1', port: 5000 });
    expect(rows).toEqual([
      kvRow('Listening', `${ACCENT}http://127.0.0.1:5000${RESET}`),
      kvRow('WebSocket', 'ws://127.0.0.1:5000/ws'),
      kvRow('Code length', '5'),
      kvRow('Upload limit', '100 MB'),
      kvRow('Idle timeout', 'off'),
    ]);
  });

  it('warns when bound to every interface', () => {
    const config = getDefaultConfig();
    config.relay.maxUploadMB = 0;
    config.relay.roomIdleTimeoutMs = 30_000;
    const rows = describeServer(resolveServeOptions(config, [], {}), { host: '0.0.0.0', port: 5000 });
    expect(rows[3]).toBe(kvRow('Upload limit', 'unlimited'));
    expect(rows[4]).toBe(kvRow('Idle timeout', '30 s'));
    expect(rows.slice(5)).toEqual(['', `${YELLOW}Bound to all interfaces.${RESET}`]);
  });
});

// ---------------------------------------------------------------------------
// serve
// ---------------------------------------------------------------------------

describe('serve', () => {
  it('exits with code 1 when the config file is not valid JSON', async () => {
    writeFileSync(join(TEST_HOME, '.codedrop', 'config.json'), '{ not json');
    const errors = vi.spyOn(console, 'error').mockImplementation(() => {});

    await serve([]);

    expect(process.exitCode).toBe(1);
    expect(errors).toHaveBeenCalledTimes(1);
    expect(String(errors.mock.calls[0]?.[0])).toContain('Failed to load config:');
  });

  describe('when the port is taken', () => {
    let blocker: Server;
    let port: number;

    beforeEach(async () => {
      blocker = createServer();
      await new Promise<void>((resolve) => blocker.listen(0, '127.0.0.1', resolve));
      const address = blocker.address();
      if (address === null || typeof address === 'string') throw new Error('expected a TCP address');
      port = address.port;
    });

    afterEach(async () => {
      await new Promise<void>((resolve) => blocker.close(() => resolve()));
    });

    it('reports the listen failure and exits with code 1', async () => {
      writeFileSync(
        join(TEST_HOME, '.codedrop', 'config.json'),
        JSON.stringify({ observability: { observers: [] } }),
      );
      const errors = vi.spyOn(console, 'error').mockImplementation(() => {});

      await serve(['--host', '127.0.0.1', '--port', String(port)]);

      expect(process.exitCode).toBe(1);
      expect(String(errors.mock.calls[0]?.[0])).toContain(`Could not listen on 127.0.0.1:${port}:`);
    });
  });
});
