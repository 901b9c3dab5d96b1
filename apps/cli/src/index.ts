#!/usr/bin/env node

/**
 * codedrop: pair two browsers with a short code and hand one file across.
 *
 * Entry point: parses process.argv manually and dispatches to the
 * appropriate command module.
 *
 * Commands:
 *   serve       Start the relay server (default)
 *   help        Show usage
 *   version     Show version
 */

import { readFileSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { ACCENT, RESET, BOLD, DIM, GREEN, RED } from './ui.js';

// ---------------------------------------------------------------------------
// Version
// ---------------------------------------------------------------------------

function readVersion(path: string): string | undefined {
  try {
    const pkg: unknown = JSON.parse(readFileSync(path, 'utf8'));
    if (pkg !== null && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch {
    // Try next path.
  }
  return undefined;
}

function getVersion(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  // Walk up from dist/ or src/ to find package.json.
  const paths = [resolve(here, '..', 'package.json'), resolve(here, '..', '..', 'package.json')];
  for (const p of paths) {
    const version = readVersion(p);
    if (version) return version;
  }
  return '0.1.0';
}

// ---------------------------------------------------------------------------
// Help text
// ---------------------------------------------------------------------------

function printHelp(): void {
  console.log(`
  ${ACCENT}${BOLD}codedrop${RESET} ${DIM}v${getVersion()}${RESET} -- code-paired file relay

  ${BOLD}Usage${RESET}
    codedrop [command] [options]

  ${BOLD}Commands${RESET}
    ${GREEN}serve${RESET}                    Start the relay server (default)
    ${GREEN}version${RESET}                  Show version
    ${GREEN}help${RESET}                     Show this help

  ${BOLD}Serve options${RESET}
    ${GREEN}--port <n>${RESET}               Listen port (overrides PORT and config)
    ${GREEN}--host <addr>${RESET}            Bind address

  ${BOLD}Global options${RESET}
    ${GREEN}--help, -h${RESET}               Show this help
    ${GREEN}--version, -V${RESET}            Show version

  ${DIM}Settings are read from ~/.codedrop/config.json and ~/.codedrop/.env.${RESET}
`);
}

// ---------------------------------------------------------------------------
// Argument parsing
// ---------------------------------------------------------------------------

function parseArgs(argv: string[]): { command: string; rest: string[] } {
  // argv[0] = node, argv[1] = script path, argv[2+] = user args.
  const args = argv.slice(2);

  if (args.includes('--help') || args.includes('-h')) {
    return { command: 'help', rest: [] };
  }
  if (args.includes('--version') || args.includes('-v') || args.includes('-V')) {
    return { command: 'version', rest: [] };
  }

  const first = args[0];
  // Bare flags (`codedrop --port 8080`) go to serve.
  if (first === undefined || first.startsWith('--')) {
    return { command: 'serve', rest: args };
  }

  return { command: first, rest: args.slice(1) };
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
  const { command, rest } = parseArgs(process.argv);

  switch (command) {
    case 'serve': {
      const { serve } = await import('./commands/serve.js');
      await serve(rest);
      break;
    }

    case 'version': {
      console.log(`codedrop v${getVersion()}`);
      break;
    }

    case 'help': {
      printHelp();
      break;
    }

    default: {
      console.error(`\n  ${RED}Unknown command:${RESET} ${command}`);
      console.error(`  ${DIM}Run ${ACCENT}codedrop --help${DIM} for available commands.${RESET}\n`);
      process.exitCode = 1;
      break;
    }
  }
}

main().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  console.error(`\n  ${RED}${BOLD}Fatal error:${RESET} ${message}`);
  if (err instanceof Error && err.stack) {
    const stackLines = err.stack.split('\n').slice(1).map((l) => `  ${l.trim()}`).join('\n');
    console.error(`${DIM}${stackLines}${RESET}`);
  }
  process.exitCode = 1;
});
