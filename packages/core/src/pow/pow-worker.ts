// Worker thread entry for PowWorkerPool.
import { parentPort } from 'node:worker_threads';
import { isPowJobRequest, runPowJob } from './pow-job.js';

if (!parentPort) {
  throw new Error('pow-worker must be started as a worker thread');
}

const port = parentPort;

port.on('message', (value: unknown) => {
  if (!isPowJobRequest(value)) {
    const id = typeof value === 'object' && value !== null && 'id' in value && typeof value.id === 'number' ? value.id : -1;
    port.postMessage({ id, status: 'error', message: 'Malformed job request' });
    return;
  }
  port.postMessage(runPowJob(value));
});
