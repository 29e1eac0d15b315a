import {
  type CompareAndSwapResult,
  type CreateTaskInput,
  type Datastore,
  type DeleteOptions,
  type FindByStatusOlderThanInput,
  type TaskRecord,
  TaskStatus,
  type TaskUpdate,
} from '@tally/core';
import { type ClientSession, type Collection, type Db, type Filter, ObjectId, type WithId } from 'mongodb';
import { ensureIndexes, IndexNames } from './mongo-indexes';

const DEFAULT_COLLECTION_NAME = 'tally-tasks';

export type TallyMongoDatastoreConfig = {
  /**
   * The name of the collection to use for the datastore.
   *
   * @default 'tally-tasks'
   * @type {string}
   */
  collectionName: string;
};

export type MongoDatastoreOptions = {
  session?: ClientSession;
};

export type TaskDocument = Omit<TaskRecord, 'id'>;

export class TallyMongoDatastore implements Datastore<MongoDatastoreOptions> {
  private config: TallyMongoDatastoreConfig;
  private database: Db | undefined;
  private databaseResolvers: Array<(database: Db) => void> = [];

  constructor(config?: Partial<TallyMongoDatastoreConfig>) {
    this.config = {
      collectionName: config?.collectionName || DEFAULT_COLLECTION_NAME,
    };
  }

  /**
   * Sets the database connection for the datastore. Ensures that the indexes are created and resolves any pending promises waiting for the database.
   *
   * @param database - The database to set.
   */
  async initialize(database: Db) {
    if (this.database) {
      throw new Error('Database connection already set');
    }

    await ensureIndexes(database.collection(this.config.collectionName));

    this.database = database;

    const resolvers = this.databaseResolvers.splice(0);
    for (const resolve of resolvers) {
      resolve(database);
    }
  }

  /**
   * Asynchronously gets the database connection for the datastore. If the database is not set, it will return a promise that resolves when the database is set.
   *
   * @returns The database connection.
   */
  public async getDatabase(): Promise<Db> {
    if (this.database) {
      return this.database;
    }

    return new Promise<Db>((resolve) => {
      this.databaseResolvers.push(resolve);
    });
  }

  async create(input: CreateTaskInput<MongoDatastoreOptions>): Promise<TaskRecord> {
    const now = new Date();
    const createInput: TaskDocument = {
      x: input.x,
      y: input.y,
      current: input.x,
      status: TaskStatus.CREATED,
      createdAt: now,
      updatedAt: now,
      version: 0,
    };

    const collection = await this.collection();
    const results = await collection.insertOne(createInput, {
      ...(input.datastoreOptions?.session ? { session: input.datastoreOptions.session } : undefined),
      ignoreUndefined: true,
    });

    if (!results.acknowledged) {
      throw new Error(`Failed to insert task document for range [${input.x}, ${input.y}]`);
    }

    return this.toObject({ _id: results.insertedId, ...createInput });
  }

  async loadById(taskId: string): Promise<TaskRecord | undefined> {
    if (!ObjectId.isValid(taskId)) {
      return undefined;
    }

    const collection = await this.collection();
    const document = await collection.findOne({ _id: new ObjectId(taskId) });

    return document ? this.toObject(document) : undefined;
  }

  /**
   * Matches on `_id` and `version` together, so the update lands only on the version the caller read.
   */
  async compareAndSwap(update: TaskUpdate, expectedVersion: number): Promise<CompareAndSwapResult> {
    if (!ObjectId.isValid(update.id)) {
      return { swapped: false };
    }

    const collection = await this.collection();
    const document = await collection.findOneAndUpdate(
      { _id: new ObjectId(update.id), version: expectedVersion },
      {
        $set: {
          status: update.status,
          current: update.current,
          updatedAt: new Date(),
          ...(update.startedAt ? { startedAt: update.startedAt } : {}),
          ...(update.finishedAt ? { finishedAt: update.finishedAt } : {}),
          ...(update.error === undefined ? {} : { error: update.error }),
        },
        $inc: { version: 1 },
      },
      { returnDocument: 'after' },
    );

    return document ? { swapped: true, record: this.toObject(document) } : { swapped: false };
  }

  async findByStatusOlderThan(input: FindByStatusOlderThanInput): Promise<TaskRecord[]> {
    const filter: Filter<TaskDocument> =
      input.timestampField === 'createdAt'
        ? { status: input.status, createdAt: { $lt: input.olderThan } }
        : { status: input.status, updatedAt: { $lt: input.olderThan } };

    const collection = await this.collection();
    const documents = await collection
      .find(filter, {
        sort: input.timestampField === 'createdAt' ? { createdAt: 1 } : { updatedAt: 1 },
        hint: IndexNames.STATUS_TIMESTAMP_INDEXES[input.timestampField],
        ...(input.limit === undefined ? {} : { limit: input.limit }),
      })
      .toArray();

    return documents.map((document) => this.toObject(document));
  }

  async delete(taskId: string, options?: DeleteOptions): Promise<TaskRecord | undefined> {
    if (!ObjectId.isValid(taskId)) {
      return undefined;
    }

    const collection = await this.collection();
    const document = await collection.findOneAndDelete({
      _id: new ObjectId(taskId),
      ...(options?.expectedVersion === undefined ? {} : { version: options.expectedVersion }),
    });

    return document ? this.toObject(document) : undefined;
  }

  private async collection(): Promise<Collection<TaskDocument>> {
    const database = await this.getDatabase();
    return database.collection<TaskDocument>(this.config.collectionName);
  }

  private toObject(document: WithId<TaskDocument>): TaskRecord {
    return {
      id: document._id.toHexString(),
      x: document.x,
      y: document.y,
      current: document.current,
      status: document.status,
      createdAt: document.createdAt,
      updatedAt: document.updatedAt,
      version: document.version,
      startedAt: document.startedAt ?? undefined,
      finishedAt: document.finishedAt ?? undefined,
      error: document.error ?? undefined,
    };
  }
}
