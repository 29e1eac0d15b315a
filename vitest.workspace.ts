import { defineWorkspace } from 'vitest/config';

export default defineWorkspace([
  './packages/tally-core/vitest.config.ts',
  './packages/tally-memory-datastore/vitest.config.ts',
  './packages/tally-mongo-datastore/vitest.config.ts',
  './packages/tally-logger-plugin/vitest.config.ts',
]);
