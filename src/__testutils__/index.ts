/**
 * Test utilities - Re-export all test helpers
 *
 * Single import point for all test utilities:
 * ```ts
 * import { createPipeLink, createFakeSpawn, assertEventually } from '@/__testutils__/index.js';
 * ```
 */

export { assertEventually } from './assertions.js';
export {
  FakeChild,
  createFakeSpawn,
  type FakeSpawn,
  type FakeSpawnOptions,
  type SpawnCall,
} from './FakeChild.js';
export {
  OutputCollector,
  createFailingWritable,
  createPipeLink,
  createStalledWritable,
  encodeFrame,
  flushIO,
  type PipeLink,
  type StreamEnds,
} from './streams.js';
