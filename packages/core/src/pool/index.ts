export { CharBufferPool, ListPool, usePooled, sharedCharBufferPool } from './buffer-pool.js';
export type { BufferPool } from './buffer-pool.js';
