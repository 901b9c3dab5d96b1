/**
 * Terminal styling for the CLI: ANSI colours, bordered boxes and aligned
 * key/value rows. Pure string rendering; callers print with console.log().
 */

// ---------------------------------------------------------------------------
// Colors
// ---------------------------------------------------------------------------

/** Primary accent. True-color (24-bit). */
export const ACCENT = '\x1b[38;2;255;145;77m';

/** Dimmed accent for borders. */
export const ACCENT_DIM = '\x1b[38;2;170;96;51m';

export const RESET = '\x1b[0m';
export const BOLD = '\x1b[1m';
export const DIM = '\x1b[2m';
export const GREEN = '\x1b[32m';
export const YELLOW = '\x1b[33m';
export const RED = '\x1b[31m';

// ---------------------------------------------------------------------------
// Box drawing characters
// ---------------------------------------------------------------------------

export const BOX = {
  topLeft: '╭',
  topRight: '╮',
  bottomLeft: '╰',
  bottomRight: '╯',
  horizontal: '─',
  vertical: '│',
} as const;

export const CHECK = `${GREEN}✓${RESET}`;
export const CROSS = `${RED}✗${RESET}`;

// ---------------------------------------------------------------------------
// Terminal helpers
// ---------------------------------------------------------------------------

/** Get terminal width with 80-column fallback. */
export function termWidth(): number {
  return process.stdout.columns ?? 80;
}

/** Measure visible character length (strips ANSI escape sequences). */
export function visibleLength(str: string): number {
  return str.replace(/\x1b\[[0-9;]*m/g, '').length;
}

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

/**
 * Render a bordered box with an optional title.
 *
 * ```
 * ╭── codedrop ─────────────────────────╮
 * │                                      │
 * │  Listening    http://0.0.0.0:5000    │
 * │                                      │
 * ╰──────────────────────────────────────╯
 * ```
 */
export function box(title: string, lines: string[], width?: number): string {
  const w = Math.min(width ?? termWidth(), termWidth()) - 2;
  const innerW = w - 2;
  const edge = (s: string) => `${ACCENT_DIM}${s}${RESET}`;
  const blank = `  ${edge(BOX.vertical)}${' '.repeat(innerW)}${edge(BOX.vertical)}`;

  const out: string[] = [];

  if (title) {
    const titleStr = ` ${title} `;
    const dashesAfter = Math.max(0, w - 4 - visibleLength(titleStr));
    out.push(
      `  ${edge(BOX.topLeft + BOX.horizontal.repeat(2))}` +
        `${ACCENT}${BOLD}${titleStr}${RESET}` +
        edge(BOX.horizontal.repeat(dashesAfter) + BOX.topRight),
    );
  } else {
    out.push(`  ${edge(BOX.topLeft + BOX.horizontal.repeat(w - 2) + BOX.topRight)}`);
  }

  out.push(blank);
  for (const line of lines) {
    const padRight = Math.max(0, innerW - 2 - visibleLength(line));
    out.push(`  ${edge(BOX.vertical)}  ${line}${' '.repeat(padRight)}${edge(BOX.vertical)}`);
  }
  out.push(blank);

  out.push(`  ${edge(BOX.bottomLeft + BOX.horizontal.repeat(w - 2) + BOX.bottomRight)}`);
  return out.join('\n');
}

/** Render a key-value row with an aligned bold label. */
export function kvRow(label: string, value: string, labelWidth = 12): string {
  return `${BOLD}${label.padEnd(labelWidth, ' ')}${RESET} ${value}`;
}
