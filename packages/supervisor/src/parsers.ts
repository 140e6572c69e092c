/**
 * Throughput parsers -- turn a worker's decoded status document into a
 * single throughput figure.
 *
 * Parsers are selected by name from the endpoint config so that the keeper
 * itself never hard-codes a worker's status schema.
 */

import { ConfigError } from '@rigkeeper/core';

/** Returned by parsers and the prober whenever no usable figure exists. */
export const PROBE_FAILURE = -1;

export type ThroughputParser = (status: unknown) => number;

/** `total-hash-rate` reports in thousandths of the policy's unit. */
export const TOTAL_HASH_RATE_DIVISOR = 1000;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads a top-level `total_hash_rate`. Positive values are scaled by
 * TOTAL_HASH_RATE_DIVISOR; zero and negatives pass through unscaled.
 *
 * @example parseTotalHashRate({ total_hash_rate: 2000000 }) // 2000
 */
export const parseTotalHashRate: ThroughputParser = (status) => {
  if (!isRecord(status)) return PROBE_FAILURE;
  const value = status['total_hash_rate'];
  if (typeof value !== 'number') return PROBE_FAILURE;
  return value > 0 ? value / TOTAL_HASH_RATE_DIVISOR : value;
};

/**
 * Reads the first element of `hashrate.total` (the short-window average).
 * Missing, null, empty or zero readings are failures.
 */
export const parseHashrateTotal: ThroughputParser = (status) => {
  if (!isRecord(status)) return PROBE_FAILURE;
  const info = status['hashrate'];
  if (!isRecord(info)) return PROBE_FAILURE;
  const total = info['total'];
  if (!Array.isArray(total)) return PROBE_FAILURE;
  const first: unknown = total[0];
  if (typeof first !== 'number' || first === 0) return PROBE_FAILURE;
  return first;
};

// ── Registry ─────────────────────────────────────────────────────────────

export class ParserRegistry {
  private readonly parsers = new Map<string, ThroughputParser>();

  /**
   * Register a parser under a name.
   * If a parser with the same name already exists, it is replaced.
   */
  register(name: string, parser: ThroughputParser): void {
    this.parsers.set(name, parser);
  }

  /**
   * Get a parser by name.
   * Throws ConfigError if not found.
   */
  get(name: string): ThroughputParser {
    const parser = this.parsers.get(name);
    if (!parser) {
      throw new ConfigError(
        `Throughput parser "${name}" not found. Available: ${this.list().join(', ') || '(none)'}`,
        { parser: name },
      );
    }
    return parser;
  }

  has(name: string): boolean {
    return this.parsers.has(name);
  }

  list(): string[] {
    return [...this.parsers.keys()];
  }
}

export const BUILTIN_PARSERS: Readonly<Record<string, ThroughputParser>> = {
  'total-hash-rate': parseTotalHashRate,
  'hashrate-total': parseHashrateTotal,
};

/** A registry pre-loaded with the built-in parsers. */
export function createParserRegistry(): ParserRegistry {
  const registry = new ParserRegistry();
  for (const [name, parser] of Object.entries(BUILTIN_PARSERS)) {
    registry.register(name, parser);
  }
  return registry;
}
