import {
  BSON,
  Collection,
  Db,
  Document,
  FindOneAndReplaceOptions,
  MongoClient,
  MongoNetworkError,
  MongoServerSelectionError,
  ReturnDocument,
} from 'mongodb';
import {
  ModelType,
  modelTypeName,
  resolveCollectionName,
} from './collection-name';
import {
  ConnectionError,
  InvalidArgumentError,
  RepositoryError,
  RepositoryOperation,
} from './errors';
import { formatKeyPart, KEY_FIELD, KeyDescriptor } from './key-descriptor';
import { logger as defaultLogger, Logger } from './logger';
import { QueryPlan, QuerySource, QueryStream } from './query-stream';
import { CrudRepo, OperationOptions, QueryableRepo } from './repo';
import {
  MongoRepositoryOptions,
  parseRepositoryOptions,
} from './repository-options';
import { Prettify } from './types';

// repository type name reported in RepositoryError context
export const MONGO_CRUD_REPOSITORY = 'MongoCrudRepository';

// MongoDB read repository with direct access to the driver handles
export type MongoRepo<T> = Prettify<
  QueryableRepo<T> & {
    readonly database: Db;
    readonly collection: Collection<Document>;
    ping(options?: OperationOptions): Promise<void>;
  }
>;

export type MongoCrudRepo<T> = Prettify<MongoRepo<T> & CrudRepo<T>>;

export type MongoRepoParams = {
  // connected elsewhere and shared; the repository never closes it
  client: MongoClient;
  options: MongoRepositoryOptions;
  model: ModelType;
  logger?: Logger;
};

export type MongoCrudRepoParams<T> = MongoRepoParams & {
  keys: KeyDescriptor<T>;
};

type RepoHandles = {
  databaseId: string;
  database: Db;
  collection: Collection<Document>;
  collectionName: string;
  log: Logger;
};

/**
 * Creates a read-only repository over the collection backing `model`. The
 * collection name is the English plural of the model type name and is
 * resolved once, here.
 *
 * @example
 * ```typescript
 * class Person { Key = ''; name = ''; }
 * const people = createMongoRepo<Person>({ client, options, model: Person });
 * const named = await people.asQueryable().where({ name: 'Ada' }).toArray();
 * ```
 */
export function createMongoRepo<T>(params: MongoRepoParams): MongoRepo<T> {
  return readRepo<T>(openRepo(params));
}

/**
 * Creates a repository with write operations. `keys` decides how the `Key`
 * filter is built: `singleKey(kind)` generates missing keys on add,
 * `twoPartKey()` and `threePartKey()` match on the encoded composite key.
 *
 * @example
 * ```typescript
 * type OrderLine = { Key1: string; Key2: number; sku: string };
 * const lines = createMongoCrudRepo<OrderLine>({
 *   client,
 *   options,
 *   model: 'OrderLine',
 *   keys: twoPartKey(),
 * });
 * await lines.update({ Key1: 'order-7', Key2: 1, sku: 'tea' });
 * ```
 */
export function createMongoCrudRepo<T>(
  params: MongoCrudRepoParams<T>,
): MongoCrudRepo<T> {
  const { keys } = params;
  const handles = openRepo(params);
  const { collection, log } = handles;
  const modelName = modelTypeName(params.model);

  const filterFor = (model: T) => ({ [KEY_FIELD]: keys.keyOf(model) });

  // runs one driver call, reporting any failure as a RepositoryError
  async function guard<R>(
    operation: RepositoryOperation,
    model: T,
    run: () => Promise<R>,
  ): Promise<R> {
    try {
      return await run();
    } catch (error) {
      const failure = new RepositoryError(
        {
          operation,
          repository: MONGO_CRUD_REPOSITORY,
          model: modelName,
          payload: snapshot(model),
        },
        error,
      );
      log.error({ err: error, ...failure.context }, failure.message);
      throw failure;
    }
  }

  return {
    ...readRepo<T>(handles),

    add: async (model: T, options?: OperationOptions): Promise<T> => {
      requireModel(model);
      keys.ensureKey(model);
      return guard('add', model, async () => {
        // the driver assigns _id on the document it is given, so hand it a copy
        await collection.insertOne(
          keys.toDocument(model),
          withSignal({ bypassDocumentValidation: true }, options?.signal),
        );
        log.debug({ key: formatKeyPart(keys.keyOf(model)) }, 'model added');
        return model;
      });
    },

    update: async (
      model: T,
      options?: OperationOptions,
    ): Promise<T | undefined> => {
      requireModel(model);
      return guard('update', model, async () => {
        const replaceOptions: FindOneAndReplaceOptions = {
          returnDocument: ReturnDocument.BEFORE,
        };
        const previous = await collection.findOneAndReplace(
          filterFor(model),
          keys.toDocument(model),
          withSignal(replaceOptions, options?.signal),
        );
        log.debug(
          { key: formatKeyPart(keys.keyOf(model)), matched: previous !== null },
          'model replaced',
        );
        return previous ? fromMongoDoc<T>(previous) : undefined;
      });
    },

    delete: async (model: T, options?: OperationOptions): Promise<void> => {
      requireModel(model);
      await guard('delete', model, async () => {
        const { deletedCount } = await collection.deleteOne(
          filterFor(model),
          withSignal({}, options?.signal),
        );
        // nothing matched: not an error
        log.debug(
          { key: formatKeyPart(keys.keyOf(model)), deletedCount },
          'model deleted',
        );
      });
    },
  };
}

function openRepo({
  client,
  options,
  model,
  logger = defaultLogger,
}: MongoRepoParams): RepoHandles {
  if (!client) {
    throw new InvalidArgumentError('client');
  }
  const { databaseId } = parseRepositoryOptions(options);
  const collectionName = resolveCollectionName(model);
  const database = client.db(databaseId);
  return {
    databaseId,
    database,
    collection: database.collection<Document>(collectionName),
    collectionName,
    log: logger.child({ database: databaseId, collection: collectionName }),
  };
}

function readRepo<T>({
  databaseId,
  database,
  collection,
  collectionName,
}: RepoHandles): MongoRepo<T> {
  const source: QuerySource = {
    find: (plan) => readDocuments(collection, plan),
    count: (plan) =>
      collection.countDocuments(plan.filter, {
        skip: plan.skip,
        limit: plan.limit,
      }),
    toModel: fromMongoDoc,
  };

  return {
    collectionName,
    database,
    collection,

    asQueryable: () => new QueryStream<T>(source),

    ping: async (options?: OperationOptions): Promise<void> => {
      try {
        await database.command({ ping: 1 }, withSignal({}, options?.signal));
      } catch (error) {
        if (
          error instanceof MongoNetworkError ||
          error instanceof MongoServerSelectionError
        ) {
          throw new ConnectionError(databaseId, error);
        }
        throw error;
      }
    },
  };
}

async function* readDocuments(
  collection: Collection<Document>,
  plan: QueryPlan,
): AsyncGenerator<Document> {
  const cursor = collection.find(plan.filter, {
    sort: plan.sort,
    projection: plan.projection,
    skip: plan.skip,
    limit: plan.limit,
  });
  try {
    while (await cursor.hasNext()) {
      const doc = await cursor.next();
      if (doc) {
        yield doc;
      }
    }
  } finally {
    await cursor.close();
  }
}

// documents come back untyped; models never carry the driver's _id
function fromMongoDoc<R>(doc: Document): R {
  const { _id, ...model } = doc;
  return model as R;
}

// forwards the caller's signal to the driver call
function withSignal<O extends object>(options: O, signal?: AbortSignal): O {
  signal?.throwIfAborted();
  return signal ? { ...options, signal } : options;
}

function requireModel(model: unknown): void {
  if (model === null || model === undefined) {
    throw new InvalidArgumentError('model');
  }
}

function snapshot(model: unknown): string {
  try {
    return BSON.EJSON.stringify(model);
  } catch (error) {
    return `<unserializable model: ${error instanceof Error ? error.message : String(error)}>`;
  }
}
