export { StateIdResolver } from './state-id-resolver.js';
export type { LinkResult } from './state-id-resolver.js';
