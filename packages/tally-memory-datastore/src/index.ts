export { type MemoryDatastoreOptions, TallyMemoryDatastore } from './tally-memory-datastore';
