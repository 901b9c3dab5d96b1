/**
 * @codedrop/observability: observer implementations and the factory that
 * assembles them from config.
 */

import type { IObserver, LogLevel } from '@codedrop/core';
import { ConfigError } from '@codedrop/core';
import { ConsoleObserver } from './console-observer.js';
import { FileObserver } from './file-observer.js';
import { MultiObserver, NoopObserver } from './multi-observer.js';

export { ConsoleObserver } from './console-observer.js';
export type { ConsoleObserverOptions } from './console-observer.js';
export { FileObserver, serializeError } from './file-observer.js';
export type { FileObserverOptions } from './file-observer.js';
export { MultiObserver, NoopObserver } from './multi-observer.js';

export const OBSERVER_NAMES = ['console', 'file'] as const;

export interface ObservabilityConfig {
  observers: string[];
  logLevel: LogLevel;
  /** Path for the file observer. */
  logPath?: string;
}

/**
 * Build an observer from config. One name yields that observer directly,
 * several are wrapped in a MultiObserver, none yields a NoopObserver.
 * Throws ConfigError on an unknown observer name.
 */
export function createObserver(config: ObservabilityConfig): IObserver {
  const observers: IObserver[] = [];

  for (const name of new Set(config.observers)) {
    switch (name) {
      case 'console':
        observers.push(new ConsoleObserver({ logLevel: config.logLevel }));
        break;
      case 'file':
        observers.push(new FileObserver({ filePath: config.logPath }));
        break;
      default:
        throw new ConfigError(`Unknown observer "${name}"`, { observer: name });
    }
  }

  if (observers.length === 0) return new NoopObserver();
  if (observers.length === 1 && observers[0]) return observers[0];
  return new MultiObserver(observers);
}
