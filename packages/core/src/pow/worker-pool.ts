import { availableParallelism } from 'node:os';
import { Worker } from 'node:worker_threads';
import { SwarmError } from '../errors/swarm-error.js';
import { resolvePowConfig } from './pow-config.js';
import type { PowConfig, PowOptions } from './pow-config.js';
import type { PowExecutor } from './pow-executor.js';
import { isPowJobResponse } from './pow-job.js';
import type { PowJobRequest, PowJobResponse } from './pow-job.js';
import { cancelledError, exhaustedError } from './proof-of-work.js';
import type { ProofOfWorkInput } from './proof-of-work.js';

/** Minimal view of a worker thread, so tests can run jobs in process */
export interface PowWorkerHandle {
  postMessage(request: PowJobRequest): void;
  onMessage(listener: (response: PowJobResponse) => void): void;
  onError(listener: (error: Error) => void): void;
  terminate(): Promise<void>;
}

export type PowWorkerSpawner = () => PowWorkerHandle;

export interface PowWorkerPoolOptions extends PowOptions {
  /** Number of worker threads. Default: available CPU cores */
  size?: number;
  /** Worker factory. Default: a worker thread running pow-worker.js */
  spawn?: PowWorkerSpawner;
}

interface PendingJob {
  request: PowJobRequest;
  cancelled: boolean;
  resolve: (nonce: string) => void;
  reject: (error: unknown) => void;
  detach: () => void;
}

interface WorkerSlot {
  worker: PowWorkerHandle;
  job: PendingJob | null;
}

/**
 * Spawn a worker thread running the pow-worker module that sits next to this
 * one. Loaded from TypeScript sources, the worker gets the tsx loader.
 */
export function spawnThreadWorker(): PowWorkerHandle {
  const worker = import.meta.url.endsWith('.ts')
    ? new Worker(new URL('./pow-worker.ts', import.meta.url), { execArgv: ['--import', 'tsx'] })
    : new Worker(new URL('./pow-worker.js', import.meta.url));
  let terminating = false;
  return {
    postMessage: (request) => worker.postMessage(request),
    onMessage: (listener) => {
      worker.on('message', (value: unknown) => {
        if (isPowJobResponse(value)) listener(value);
      });
    },
    onError: (listener) => {
      worker.on('error', listener);
      worker.on('exit', (code: number) => {
        if (!terminating && code !== 0) listener(new Error(`Worker exited with code ${code}`));
      });
    },
    terminate: async () => {
      terminating = true;
      await worker.terminate();
    },
  };
}

/**
 * PowWorkerPool - Fixed-size pool of compute workers for proof-of-work.
 *
 * - Workers are spawned lazily, up to `size`
 * - Jobs queue while every worker is busy and start in submission order
 * - Cancellation raises a shared flag the running search polls
 * - A crashed worker fails its job with WORKER_FAILED and is replaced on demand
 *
 * IMPORTANT: Call destroy() when done so worker threads do not keep the process alive.
 */
export class PowWorkerPool implements PowExecutor {
  readonly config: PowConfig;
  readonly size: number;
  private readonly spawn: PowWorkerSpawner;
  private slots: WorkerSlot[] = [];
  private queue: PendingJob[] = [];
  private nextJobId = 1;
  private destroyed = false;

  constructor(options: PowWorkerPoolOptions = {}) {
    const { size = availableParallelism(), spawn = spawnThreadWorker, ...powOptions } = options;
    if (!Number.isSafeInteger(size) || size < 1) {
      throw new RangeError(`size must be a positive integer, got ${size}`);
    }
    this.config = resolvePowConfig(powOptions);
    this.size = size;
    this.spawn = spawn;
  }

  /** Jobs waiting for a free worker */
  get pendingCount(): number {
    return this.queue.length;
  }

  /** Jobs currently running on a worker */
  get activeCount(): number {
    return this.slots.filter((slot) => slot.job !== null).length;
  }

  solve(input: ProofOfWorkInput, signal?: AbortSignal): Promise<string> {
    if (this.destroyed) {
      return Promise.reject(new SwarmError('WORKER_FAILED', 'Worker pool has been destroyed'));
    }
    if (signal?.aborted) {
      return Promise.reject(cancelledError());
    }

    return new Promise<string>((resolve, reject) => {
      const job: PendingJob = {
        request: {
          id: this.nextJobId++,
          input,
          config: this.config,
          cancelFlag: new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT),
        },
        cancelled: false,
        resolve,
        reject,
        detach: () => {},
      };
      if (signal) {
        const onAbort = () => this.cancel(job);
        signal.addEventListener('abort', onAbort, { once: true });
        job.detach = () => signal.removeEventListener('abort', onAbort);
      }
      this.queue.push(job);
      this.dispatch();
    });
  }

  /** Terminate every worker and fail all outstanding jobs */
  async destroy(): Promise<void> {
    if (this.destroyed) return;
    this.destroyed = true;

    const outstanding = [...this.queue, ...this.slots.flatMap((slot) => (slot.job ? [slot.job] : []))];
    this.queue = [];
    for (const job of outstanding) {
      Atomics.store(new Int32Array(job.request.cancelFlag), 0, 1);
      job.detach();
      job.reject(new SwarmError('WORKER_FAILED', 'Worker pool has been destroyed'));
    }

    const workers = this.slots.map((slot) => slot.worker);
    this.slots = [];
    await Promise.all(workers.map((worker) => worker.terminate()));
  }

  private cancel(job: PendingJob): void {
    if (job.cancelled) return;
    job.cancelled = true;

    const queuedAt = this.queue.indexOf(job);
    if (queuedAt >= 0) {
      this.queue.splice(queuedAt, 1);
      job.detach();
      job.reject(cancelledError());
      return;
    }
    // Running: the worker notices the flag and answers with 'cancelled'
    Atomics.store(new Int32Array(job.request.cancelFlag), 0, 1);
  }

  private dispatch(): void {
    while (this.queue.length > 0) {
      const slot = this.slots.find((candidate) => candidate.job === null) ?? this.addSlot();
      if (!slot) return;
      const job = this.queue.shift();
      if (!job) return;
      slot.job = job;
      slot.worker.postMessage(job.request);
    }
  }

  private addSlot(): WorkerSlot | null {
    if (this.slots.length >= this.size) return null;
    const slot: WorkerSlot = { worker: this.spawn(), job: null };
    slot.worker.onMessage((response) => this.handleResponse(slot, response));
    slot.worker.onError((error) => this.handleWorkerError(slot, error));
    this.slots.push(slot);
    return slot;
  }

  private handleResponse(slot: WorkerSlot, response: PowJobResponse): void {
    const job = slot.job;
    if (!job || job.request.id !== response.id) return;
    slot.job = null;
    job.detach();
    this.settle(job, response);
    this.dispatch();
  }

  private settle(job: PendingJob, response: PowJobResponse): void {
    // A nonce that lands after cancellation is dropped
    if (job.cancelled) {
      job.reject(cancelledError());
      return;
    }
    switch (response.status) {
      case 'solved':
        job.resolve(response.nonce);
        return;
      case 'exhausted':
        job.reject(exhaustedError(response.trials, response.elapsedMs));
        return;
      case 'cancelled':
        job.reject(cancelledError());
        return;
      case 'error':
        job.reject(new SwarmError('WORKER_FAILED', response.message, { context: { jobId: response.id } }));
        return;
    }
  }

  private handleWorkerError(slot: WorkerSlot, error: Error): void {
    if (this.destroyed || !this.slots.includes(slot)) return;
    this.slots = this.slots.filter((candidate) => candidate !== slot);
    console.warn(`[PowWorkerPool] Worker failed, replacing it: ${error.message}`);

    const job = slot.job;
    if (job) {
      slot.job = null;
      job.detach();
      job.reject(
        job.cancelled
          ? cancelledError()
          : new SwarmError('WORKER_FAILED', `Worker failed: ${error.message}`, { cause: error }),
      );
    }
    this.dispatch();
  }
}
