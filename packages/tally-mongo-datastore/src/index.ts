export {
  type MongoDatastoreOptions,
  type TaskDocument,
  TallyMongoDatastore,
  type TallyMongoDatastoreConfig,
} from './tally-mongo-datastore';
export { ensureIndexes, IndexNames } from './mongo-indexes';
