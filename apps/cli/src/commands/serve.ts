/**
 * Serve command: start the relay server.
 *
 * Loads ~/.codedrop/config.json, applies --port / --host and the PORT
 * environment variable, starts the HTTP + WebSocket listener and blocks
 * until SIGINT or SIGTERM.
 *
 * Usage:
 *   codedrop serve [--port 5000] [--host 0.0.0.0]
 */

import type { CodeDropConfig } from '@codedrop/core';
import { RelayServer } from '@codedrop/gateway';
import { createObserver } from '@codedrop/observability';
import { loadConfig, getLogsDir } from '../config.js';
import { ACCENT, RESET, BOLD, DIM, RED, YELLOW, CHECK, CROSS, box, kvRow } from '../ui.js';

const BYTES_PER_MB = 1024 * 1024;

export interface ServeOptions {
  port: number;
  host: string;
  codeLength: number;
  maxCodeAttempts: number;
  /** Undefined when uploads are unlimited. */
  maxUploadBytes?: number;
  roomIdleTimeoutMs: number;
}

function parsePort(value: string | undefined): number | undefined {
  if (value === undefined || !/^\d+$/.test(value.trim())) return undefined;
  const parsed = parseInt(value, 10);
  return parsed > 0 && parsed <= 65535 ? parsed : undefined;
}

/**
 * Work out the listener settings. Precedence for the port is
 * --port, then PORT, then the config file. Invalid values are skipped.
 */
export function resolveServeOptions(
  config: CodeDropConfig,
  args: string[],
  env: NodeJS.ProcessEnv = process.env,
): ServeOptions {
  let port = parsePort(env['PORT']) ?? config.server.port;
  let host = config.server.host;

  for (let i = 0; i < args.length; i++) {
    const next = args[i + 1];
    if (args[i] === '--port') {
      port = parsePort(next) ?? port;
      i++;
    } else if (args[i] === '--host' && next?.trim()) {
      host = next.trim();
      i++;
    }
  }

  const { codeLength, maxCodeAttempts, maxUploadMB, roomIdleTimeoutMs } = config.relay;
  return {
    port,
    host,
    codeLength,
    maxCodeAttempts,
    ...(maxUploadMB > 0 ? { maxUploadBytes: Math.floor(maxUploadMB * BYTES_PER_MB) } : {}),
    roomIdleTimeoutMs,
  };
}

/** Banner rows shown once the listener is up. */
export function describeServer(options: ServeOptions, address: { host: string; port: number }): string[] {
  const base = `${address.host}:${address.port}`;
  const rows = [
    kvRow('Listening', `${ACCENT}http://${base}${RESET}`),
    kvRow('WebSocket', `ws://${base}/ws`),
    kvRow('Code length', String(options.codeLength)),
    kvRow(
      'Upload limit',
      options.maxUploadBytes === undefined ? 'unlimited' : `${options.maxUploadBytes / BYTES_PER_MB} MB`,
    ),
    kvRow('Idle timeout', options.roomIdleTimeoutMs > 0 ? `${options.roomIdleTimeoutMs / 1000} s` : 'off'),
  ];
  if (address.host === '0.0.0.0' || address.host === '::') {
    rows.push('', `${YELLOW}Bound to all interfaces.${RESET}`);
  }
  return rows;
}

export async function serve(args: string[]): Promise<void> {
  let config: CodeDropConfig;
  try {
    config = loadConfig();
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`\n  ${RED}Failed to load config:${RESET} ${message}\n`);
    process.exitCode = 1;
    return;
  }

  const options = resolveServeOptions(config, args);
  const observer = createObserver({
    observers: config.observability.observers,
    logLevel: config.observability.logLevel,
    logPath: config.observability.logPath ?? `${getLogsDir()}/codedrop.jsonl`,
  });

  const server = new RelayServer({ ...options, observer });
  try {
    await server.start();
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`\n  ${CROSS} ${RED}Could not listen on ${options.host}:${options.port}:${RESET} ${message}\n`);
    observer.onError(err instanceof Error ? err : new Error(message), { source: 'serve' });
    await observer.flush();
    process.exitCode = 1;
    return;
  }

  const address = server.getAddress() ?? { host: options.host, port: options.port };
  console.log('\n' + box('codedrop', describeServer(options, address)));
  console.log(`\n  ${CHECK} ${BOLD}Ready.${RESET} ${DIM}Press Ctrl+C to stop.${RESET}\n`);

  await new Promise<void>((resolve) => {
    const shutdown = async () => {
      console.log(`\n  ${DIM}Shutting down...${RESET}`);
      try {
        await server.stop();
      } catch (err) {
        observer.onError(err instanceof Error ? err : new Error(String(err)), { source: 'serve' });
      }
      await observer.flush();
      console.log(`  ${DIM}Goodbye!${RESET}\n`);
      resolve();
    };

    const onSignal = () => void shutdown();
    process.once('SIGINT', onSignal);
    process.once('SIGTERM', onSignal);
  });
}
