/**
 * Observer registry -- builds the operational log from the `observability`
 * section of RigkeeperConfig.
 *
 * Each name in `observers` maps to a factory. Zero usable names give a
 * NoopObserver, one gives that observer itself, several are wrapped in a
 * MultiObserver.
 */

import type { IObserver, ObservabilityConfig } from '@rigkeeper/core';

import { ConsoleObserver } from './console-observer.js';
import { FileObserver } from './file-observer.js';
import { MultiObserver } from './multi-observer.js';
import { NoopObserver } from './noop-observer.js';

export type { ObservabilityConfig };

type ObserverFactory = (config: ObservabilityConfig) => IObserver;

const FACTORIES: Readonly<Record<string, ObserverFactory>> = {
  console: ({ logLevel }) => new ConsoleObserver(logLevel ?? 'info'),
  file: ({ logPath, maxLogSize }) => new FileObserver({ filePath: logPath, maxBytes: maxLogSize }),
  noop: () => new NoopObserver(),
};

export function observerNames(): string[] {
  return Object.keys(FACTORIES);
}

export function createObserver(config: ObservabilityConfig): IObserver {
  const children: IObserver[] = [];

  for (const name of config.observers) {
    const factory = FACTORIES[name];
    if (!factory) {
      console.warn(`[observability] unknown observer "${name}", skipping`);
      continue;
    }
    children.push(factory(config));
  }

  const [only, ...others] = children;
  if (!only) return new NoopObserver();
  if (others.length === 0) return only;
  return new MultiObserver(children);
}
