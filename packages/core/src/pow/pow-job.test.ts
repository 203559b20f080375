import { describe, expect, it } from 'vitest';
import { resolvePowConfig } from './pow-config.js';
import { isPowJobRequest, isPowJobResponse, runPowJob } from './pow-job.js';
import type { PowJobRequest } from './pow-job.js';

function makeRequest(overrides?: Partial<PowJobRequest>): PowJobRequest {
  return {
    id: 7,
    input: {
      payload: 'am9i',
      destination: `05${'12'.repeat(32)}`,
      timestamp: 1_700_000_000_000,
      ttl: 60_000,
    },
    config: resolvePowConfig({ nonceTrials: 1 }),
    cancelFlag: new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT),
    ...overrides,
  };
}

describe('runPowJob', () => {
  it('answers with the nonce and the job id', () => {
    const response = runPowJob(makeRequest());
    expect(response.id).toBe(7);
    expect(response.status).toBe('solved');
  });

  it('answers cancelled when the flag is already raised', () => {
    const request = makeRequest();
    Atomics.store(new Int32Array(request.cancelFlag), 0, 1);
    expect(runPowJob(request)).toEqual({ id: 7, status: 'cancelled' });
  });

  it('answers exhausted with the trial count', () => {
    const response = runPowJob(makeRequest({ config: resolvePowConfig({ nonceTrials: 1_000_000_000_000, maxTrials: 5 }) }));
    expect(response).toMatchObject({ id: 7, status: 'exhausted', trials: 5 });
  });

  it('answers error for inputs the engine rejects', () => {
    const response = runPowJob(makeRequest({ config: { nonceTrials: 0, maxTrials: 5, maxDurationMs: 1000 } }));
    expect(response).toEqual({ id: 7, status: 'error', message: 'nonceTrials must be a positive integer, got 0' });
  });
});

describe('message guards', () => {
  it('recognises job requests', () => {
    expect(isPowJobRequest(makeRequest())).toBe(true);
    expect(isPowJobRequest({ ...makeRequest(), cancelFlag: new ArrayBuffer(4) })).toBe(false);
    expect(isPowJobRequest({ id: 1 })).toBe(false);
    expect(isPowJobRequest(null)).toBe(false);
  });

  it('recognises job responses', () => {
    expect(isPowJobResponse({ id: 1, status: 'solved', nonce: 'AAAAAAAAAAA=' })).toBe(true);
    expect(isPowJobResponse({ id: 1, status: 'exhausted', trials: 3, elapsedMs: 1 })).toBe(true);
    expect(isPowJobResponse({ id: 1, status: 'cancelled' })).toBe(true);
    expect(isPowJobResponse({ id: 1, status: 'error', message: 'boom' })).toBe(true);
    expect(isPowJobResponse({ id: 1, status: 'solved' })).toBe(false);
    expect(isPowJobResponse({ status: 'cancelled' })).toBe(false);
    expect(isPowJobResponse('solved')).toBe(false);
  });
});
