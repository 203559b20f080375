export { SwarmError, isSwarmError } from './swarm-error.js';
export type { SwarmErrorCode, SwarmErrorOptions } from './swarm-error.js';
