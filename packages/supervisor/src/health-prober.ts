/**
 * HealthProber -- reads the worker's throughput from its HTTP status endpoint.
 *
 * A probe never throws for the failures a flaky worker produces (network
 * errors, timeouts, bad status codes, garbage bodies, missing fields,
 * parser exceptions). Each of those yields PROBE_FAILURE and is reported
 * through `onFailure`. Anything else is a bug and propagates.
 */

import { ProbeError } from '@rigkeeper/core';
import type { HealthEndpoint } from '@rigkeeper/core';
import { PROBE_FAILURE, createParserRegistry } from './parsers.js';
import type { ParserRegistry } from './parsers.js';

export const DEFAULT_PROBE_TIMEOUT_MS = 6_000;

export interface HealthProberOptions {
  parsers?: ParserRegistry;
  /** Used when the endpoint does not set its own timeout. */
  timeoutMs?: number;
  /** Replaceable for tests. Defaults to the global fetch. */
  fetch?: typeof fetch;
  /** Called with the reason every time a probe yields PROBE_FAILURE by error. */
  onFailure?: (error: ProbeError) => void;
}

// ── URL & body helpers ───────────────────────────────────────────────────

/**
 * Build the status URL, embedding `user:password@` only when both
 * credentials are non-empty.
 */
export function buildProbeUrl(endpoint: HealthEndpoint): string {
  const authority = `${endpoint.host}:${endpoint.port}`;
  if (endpoint.user && endpoint.password) {
    const credentials = `${encodeURIComponent(endpoint.user)}:${encodeURIComponent(endpoint.password)}`;
    return `http://${credentials}@${authority}/${endpoint.page}`;
  }
  return `http://${authority}/${endpoint.page}`;
}

/** Printable ASCII plus tab, LF, VT, FF and CR. */
function isPrintableByte(byte: number): boolean {
  return (byte >= 0x20 && byte <= 0x7e) || (byte >= 0x09 && byte <= 0x0d);
}

/**
 * Drop every byte that is not a printable ASCII character, then decode the
 * remainder one character per byte. Some workers emit stray control or
 * high bytes that would otherwise break JSON parsing.
 */
export function stripNonPrintable(bytes: Uint8Array): string {
  return Buffer.from(bytes.filter(isPrintableByte)).toString('latin1');
}

/** Mirrors a falsy check: null, 0, "", false, {} and [] carry no status. */
function isEmptyDocument(doc: unknown): boolean {
  if (!doc) return true;
  if (Array.isArray(doc)) return doc.length === 0;
  if (typeof doc === 'object') return Object.keys(doc).length === 0;
  return false;
}

function isAnticipatedFailure(err: unknown): err is Error {
  if (err instanceof ProbeError || err instanceof SyntaxError) return true;
  // fetch rejects with TypeError on network failure and on malformed URLs.
  if (err instanceof TypeError) return true;
  return err instanceof Error && (err.name === 'AbortError' || err.name === 'TimeoutError');
}

// ── HealthProber ─────────────────────────────────────────────────────────

export class HealthProber {
  private readonly parsers: ParserRegistry;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly onFailure?: (error: ProbeError) => void;

  constructor(options: HealthProberOptions = {}) {
    this.parsers = options.parsers ?? createParserRegistry();
    this.timeoutMs = options.timeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? fetch;
    this.onFailure = options.onFailure;
  }

  /**
   * Fetch and parse the worker's current throughput.
   * Resolves to PROBE_FAILURE (-1) when no figure could be read.
   */
  async probe(endpoint: HealthEndpoint): Promise<number> {
    const url = buildProbeUrl(endpoint);
    const redacted = buildProbeUrl({ ...endpoint, user: undefined, password: undefined });

    if (endpoint.format !== 'json') {
      return this.fail(new ProbeError(`Unsupported response format "${String(endpoint.format)}"`, redacted));
    }

    // Unknown parser names are configuration errors, not probe failures.
    const parse = this.parsers.get(endpoint.parser);

    let doc: unknown;
    try {
      const body = await this.fetchBody(url, redacted, endpoint.timeoutMs ?? this.timeoutMs);
      doc = JSON.parse(body);
    } catch (err) {
      if (!isAnticipatedFailure(err)) throw err;
      return this.fail(
        err instanceof ProbeError ? err : new ProbeError(err.message, redacted, { cause: err.name }),
      );
    }

    if (isEmptyDocument(doc)) {
      return this.fail(new ProbeError('Empty status document', redacted));
    }

    let value: unknown;
    try {
      value = parse(doc);
    } catch (err) {
      if (!(err instanceof Error)) throw err;
      return this.fail(
        new ProbeError(`Parser "${endpoint.parser}" threw: ${err.message}`, redacted, { cause: err.name }),
      );
    }

    if (typeof value !== 'number' || !Number.isFinite(value)) {
      return this.fail(new ProbeError(`Parser "${endpoint.parser}" returned a non-numeric value`, redacted));
    }
    return value;
  }

  // ── Internal ─────────────────────────────────────────────────────────

  private async fetchBody(url: string, redacted: string, timeoutMs: number): Promise<string> {
    const target = new URL(url);
    const headers: Record<string, string> = { Accept: 'application/json' };

    // fetch refuses URLs carrying credentials; send them as Basic auth.
    if (target.username || target.password) {
      const user = decodeURIComponent(target.username);
      const password = decodeURIComponent(target.password);
      headers['Authorization'] = `Basic ${Buffer.from(`${user}:${password}`).toString('base64')}`;
      target.username = '';
      target.password = '';
    }

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await this.fetchImpl(target, {
        signal: controller.signal,
        headers,
      });

      if (!response.ok) {
        await response.body?.cancel();
        throw new ProbeError(`HTTP ${response.status}`, redacted, { status: response.status });
      }

      return stripNonPrintable(new Uint8Array(await response.arrayBuffer()));
    } finally {
      clearTimeout(timer);
    }
  }

  private fail(error: ProbeError): number {
    this.onFailure?.(error);
    return PROBE_FAILURE;
  }
}
