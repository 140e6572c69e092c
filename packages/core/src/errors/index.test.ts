import {
  RigkeeperError,
  ConfigError,
  ProbeError,
  ProcessError,
} from './index.js';

// ─── RigkeeperError (base class) ─────────────────────────────────────────────

describe('RigkeeperError', () => {
  it('creates an error with message and code', () => {
    const err = new RigkeeperError('something failed', 'SOME_CODE');
    expect(err.message).toBe('something failed');
    expect(err.code).toBe('SOME_CODE');
    expect(err.context).toBeUndefined();
  });

  it('creates an error with optional context', () => {
    const ctx = { key: 'value', num: 42 };
    const err = new RigkeeperError('failed', 'CODE', ctx);
    expect(err.context).toEqual(ctx);
  });

  it('sets name to RigkeeperError', () => {
    const err = new RigkeeperError('msg', 'CODE');
    expect(err.name).toBe('RigkeeperError');
  });

  it('extends Error', () => {
    const err = new RigkeeperError('msg', 'CODE');
    expect(err).toBeInstanceOf(Error);
    expect(err).toBeInstanceOf(RigkeeperError);
  });

  it('has a stack trace', () => {
    const err = new RigkeeperError('msg', 'CODE');
    expect(err.stack).toBeDefined();
  });
});

// ─── ConfigError ─────────────────────────────────────────────────────────────

describe('ConfigError', () => {
  it('sets code to CONFIG_ERROR', () => {
    const err = new ConfigError('missing required field');
    expect(err.code).toBe('CONFIG_ERROR');
  });

  it('sets name to ConfigError', () => {
    expect(new ConfigError('invalid').name).toBe('ConfigError');
  });

  it('accepts optional context', () => {
    const ctx = { field: 'policy.targetThroughput', expected: 'number' };
    const err = new ConfigError('invalid type', ctx);
    expect(err.context).toEqual(ctx);
  });

  it('has undefined context when not provided', () => {
    expect(new ConfigError('bad config').context).toBeUndefined();
  });
});

// ─── ProbeError ──────────────────────────────────────────────────────────────

describe('ProbeError', () => {
  it('sets code to PROBE_ERROR', () => {
    const err = new ProbeError('timed out', 'http://127.0.0.1:4580/api.json');
    expect(err.code).toBe('PROBE_ERROR');
    expect(err.name).toBe('ProbeError');
  });

  it('stores the url', () => {
    const err = new ProbeError('timed out', 'http://127.0.0.1:7777/');
    expect(err.url).toBe('http://127.0.0.1:7777/');
  });

  it('merges url into context', () => {
    const err = new ProbeError('bad status', 'http://h:1/', { status: 503 });
    expect(err.context).toEqual({ status: 503, url: 'http://h:1/' });
  });
});

// ─── ProcessError ────────────────────────────────────────────────────────────

describe('ProcessError', () => {
  it('sets code to PROCESS_ERROR', () => {
    const err = new ProcessError('spawn failed');
    expect(err.code).toBe('PROCESS_ERROR');
    expect(err.name).toBe('ProcessError');
  });

  it('leaves context untouched without a pid', () => {
    expect(new ProcessError('spawn failed').context).toBeUndefined();
  });

  it('merges pid into context', () => {
    const err = new ProcessError('kill failed', 4242, { signal: 'SIGKILL' });
    expect(err.pid).toBe(4242);
    expect(err.context).toEqual({ signal: 'SIGKILL', pid: 4242 });
  });
});

// ─── Cross-cutting error behavior ───────────────────────────────────────────

describe('Error hierarchy', () => {
  it('all error subclasses are instances of RigkeeperError', () => {
    const errors = [
      new ConfigError('msg'),
      new ProbeError('msg', 'http://h:1/'),
      new ProcessError('msg'),
    ];
    for (const err of errors) {
      expect(err).toBeInstanceOf(RigkeeperError);
      expect(err).toBeInstanceOf(Error);
    }
  });

  it('all error subclasses have distinct codes', () => {
    const codes = new Set([
      new ConfigError('msg').code,
      new ProbeError('msg', 'u').code,
      new ProcessError('msg').code,
    ]);
    expect(codes.size).toBe(3);
  });
});
