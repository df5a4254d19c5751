import { AwilixContainer } from 'awilix';
import { MongoClient } from 'mongodb';
import { InvalidArgumentError } from './errors';
import { logger as defaultLogger, Logger } from './logger';
import { MONGO_CLIENT, REPOSITORY_OPTIONS } from './registration';
import { describeOptions, parseRepositoryOptions } from './repository-options';

/**
 * Seeds a database during startup. `wasDropped` and `wasCreated` report what
 * the startup hook did just before, so the callback can pick its seed data.
 */
export type SeedAction<TClient = MongoClient> = (
  client: TClient,
  wasDropped: boolean,
  wasCreated: boolean,
) => void | Promise<void>;

export type MongoStartupOptions = {
  clientName?: string;
  optionsName?: string;
  logger?: Logger;
};

/**
 * Runs the one-time database startup steps selected by the registered
 * repository options: drop the database, ensure it exists, then seed it.
 * Nothing happens when none of the three flags is set.
 *
 * The client is resolved from a container scope that is disposed once the
 * steps finish, whether or not they succeed. Failures are not caught: the
 * application must not start against a half-seeded database.
 */
export async function useMongoDb<TClient extends MongoClient = MongoClient>(
  container: AwilixContainer,
  seed: SeedAction<TClient>,
  {
    clientName = MONGO_CLIENT,
    optionsName = REPOSITORY_OPTIONS,
    logger = defaultLogger,
  }: MongoStartupOptions = {},
): Promise<AwilixContainer> {
  if (typeof seed !== 'function') {
    throw new InvalidArgumentError('seed', 'must be a function');
  }

  const options = parseRepositoryOptions(container.resolve(optionsName));
  const { databaseId, dropDatabase, ensureCreated, seedDatabase } = options;
  if (!dropDatabase && !ensureCreated && !seedDatabase) {
    return container;
  }

  const log = logger.child({ database: databaseId });
  const scope = container.createScope();
  try {
    const client = scope.resolve<TClient>(clientName);
    let wasDropped = false;
    let wasCreated = false;

    if (dropDatabase) {
      log.warn(describeOptions(options), 'dropping database');
      await client.db(databaseId).dropDatabase();
      wasDropped = true;
    }

    // MongoDB creates databases on first write; obtaining the handle is all
    // there is to do
    if (ensureCreated) {
      client.db(databaseId);
      wasCreated = true;
      log.info('database ensured');
    }

    if (seedDatabase) {
      await seed(client, wasDropped, wasCreated);
      log.info({ wasDropped, wasCreated }, 'database seeded');
    }
  } finally {
    await scope.dispose();
  }
  return container;
}
