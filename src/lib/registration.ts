import { asFunction, AwilixContainer, Lifetime, LifetimeType } from 'awilix';
import { MongoClient, MongoClientOptions } from 'mongodb';
import { logger } from './logger';
import {
  ConfigurationSection,
  describeOptions,
  MongoRepositoryOptions,
  OptionsSchema,
  parseRepositoryOptions,
} from './repository-options';

export const REPOSITORY_OPTIONS = 'repositoryOptions';
export const MONGO_CLIENT = 'mongoClient';

export type RepositoryRegistration = {
  // defaults to a scoped (per request) registration
  lifetime?: LifetimeType;
  // custom options type; must extend mongoRepositoryOptionsSchema
  schema?: OptionsSchema;
  name?: string;
};

/**
 * Registers repository options bound from `configuration` under
 * `repositoryOptions`. The section is validated here, so a bad configuration
 * fails at startup rather than on first resolve.
 *
 * @example
 * ```typescript
 * const container = createContainer();
 * addMongoRepositories(container, loadEnvConfiguration());
 * ```
 */
export function addMongoRepositories(
  container: AwilixContainer,
  configuration: ConfigurationSection,
  {
    lifetime = Lifetime.SCOPED,
    schema,
    name = REPOSITORY_OPTIONS,
  }: RepositoryRegistration = {},
): AwilixContainer {
  const options = schema
    ? parseRepositoryOptions(configuration, schema)
    : parseRepositoryOptions(configuration);

  container.register(
    name,
    asFunction(() => Object.freeze({ ...options }), { lifetime }),
  );
  logger.debug(
    { name, lifetime, ...describeOptions(options) },
    'repository options registered',
  );
  return container;
}

/**
 * Registers a singleton MongoClient for `options.uri`. The client connects
 * lazily on first use and is closed when the container is disposed.
 */
export function addMongoClient(
  container: AwilixContainer,
  options: MongoRepositoryOptions,
  {
    name = MONGO_CLIENT,
    clientOptions,
  }: { name?: string; clientOptions?: MongoClientOptions } = {},
): AwilixContainer {
  container.register(
    name,
    asFunction(() => new MongoClient(options.uri, clientOptions), {
      lifetime: Lifetime.SINGLETON,
      dispose: (client) => client.close(),
    }),
  );
  return container;
}
