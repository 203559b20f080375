import { describe, expect, it } from 'vitest';
import { SwarmError, isSwarmError } from './swarm-error.js';
import type { SwarmErrorCode } from './swarm-error.js';

describe('SwarmError', () => {
  it('extends Error', () => {
    const error = new SwarmError('POW_EXHAUSTED', 'budget spent');
    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(SwarmError);
  });

  it('has correct name, code, and message', () => {
    const error = new SwarmError('INVALID_ENVELOPE', 'not a request');
    expect(error.name).toBe('SwarmError');
    expect(error.code).toBe('INVALID_ENVELOPE');
    expect(error.message).toBe('not a request');
  });

  it('supports optional context', () => {
    const error = new SwarmError('ENVELOPE_CONSTRUCTION_FAILED', 'missing field', { context: { field: 'destination' } });
    expect(error.context).toEqual({ field: 'destination' });
  });

  it('context and cause are undefined when not provided', () => {
    const error = new SwarmError('BUILD_CANCELLED', 'aborted');
    expect(error.context).toBeUndefined();
    expect(error.cause).toBeUndefined();
  });

  it('keeps the underlying cause', () => {
    const inner = new SwarmError('POW_EXHAUSTED', 'budget spent');
    const outer = new SwarmError('POW_CALCULATION_FAILED', 'no nonce', { cause: inner });
    expect(outer.cause).toBe(inner);
  });

  it('supports all error codes', () => {
    const codes: SwarmErrorCode[] = [
      'ENVELOPE_CONSTRUCTION_FAILED',
      'INVALID_ENVELOPE',
      'POW_EXHAUSTED',
      'POW_CALCULATION_FAILED',
      'BUILD_CANCELLED',
      'INVALID_WIRE_MESSAGE',
      'WORKER_FAILED',
    ];
    for (const code of codes) {
      const error = new SwarmError(code, 'test');
      expect(error.code).toBe(code);
    }
  });
});

describe('isSwarmError', () => {
  it('matches any SwarmError when no code is given', () => {
    expect(isSwarmError(new SwarmError('WORKER_FAILED', 'crash'))).toBe(true);
  });

  it('matches only the requested code', () => {
    const error = new SwarmError('BUILD_CANCELLED', 'aborted');
    expect(isSwarmError(error, 'BUILD_CANCELLED')).toBe(true);
    expect(isSwarmError(error, 'POW_EXHAUSTED')).toBe(false);
  });

  it('rejects plain errors and non-errors', () => {
    expect(isSwarmError(new Error('plain'))).toBe(false);
    expect(isSwarmError('BUILD_CANCELLED')).toBe(false);
    expect(isSwarmError(null)).toBe(false);
  });
});
