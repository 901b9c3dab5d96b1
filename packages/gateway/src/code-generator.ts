/**
 * CodeGenerator: short human-enterable room codes.
 *
 * Each character is drawn uniformly from uppercase letters and digits with
 * `crypto.randomInt`. The caller supplies an `isTaken` predicate
 * (normally the registry's live-code lookup); collisions are retried up to
 * `maxAttempts` times before the allocation fails.
 */

import { randomInt } from 'node:crypto';
import { CodeSpaceExhaustedError } from '@codedrop/core';

export const CODE_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';
export const DEFAULT_CODE_LENGTH = 5;
export const DEFAULT_MAX_ATTEMPTS = 32;

export interface CodeGeneratorOpts {
  /** Characters per code. Default: 5. */
  length?: number;
  /** Collisions tolerated before giving up. Default: 32. */
  maxAttempts?: number;
  /** Returns an integer in [0, max). Replaceable for deterministic tests. */
  randomInt?: (max: number) => number;
}

export class CodeGenerator {
  readonly length: number;
  readonly maxAttempts: number;
  private readonly randomIndex: (max: number) => number;

  constructor(opts: CodeGeneratorOpts = {}) {
    this.length = opts.length ?? DEFAULT_CODE_LENGTH;
    this.maxAttempts = opts.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    this.randomIndex = opts.randomInt ?? ((max) => randomInt(max));
  }

  /**
   * Return a code for which `isTaken` is false.
   * Throws CodeSpaceExhaustedError after `maxAttempts` collisions.
   */
  generate(isTaken: (code: string) => boolean): string {
    for (let attempt = 0; attempt < this.maxAttempts; attempt++) {
      const code = this.candidate();
      if (!isTaken(code)) return code;
    }
    throw new CodeSpaceExhaustedError(this.maxAttempts);
  }

  private candidate(): string {
    let code = '';
    for (let i = 0; i < this.length; i++) {
      code += CODE_ALPHABET.charAt(this.randomIndex(CODE_ALPHABET.length));
    }
    return code;
  }
}

/** Canonical form of a user-entered code: trimmed, uppercase. */
export function normalizeCode(input: string): string {
  return input.trim().toUpperCase();
}
