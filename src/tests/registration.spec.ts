import { createContainer, Lifetime } from 'awilix';
import { MongoClient } from 'mongodb';
import { z } from 'zod';
import { ConfigurationError } from '../lib/errors';
import {
  addMongoClient,
  addMongoRepositories,
  MONGO_CLIENT,
  REPOSITORY_OPTIONS,
} from '../lib/registration';
import {
  MongoRepositoryOptions,
  mongoRepositoryOptionsSchema,
  parseRepositoryOptions,
} from '../lib/repository-options';

const section = {
  Uri: 'mongodb://localhost:27017',
  DatabaseId: 'shop',
  SeedDatabase: 'true',
};

describe('addMongoRepositories', () => {
  it('should register the bound options', () => {
    const container = addMongoRepositories(createContainer(), section);

    const options = container
      .createScope()
      .resolve<MongoRepositoryOptions>(REPOSITORY_OPTIONS);

    expect(options).toEqual({
      uri: 'mongodb://localhost:27017',
      databaseId: 'shop',
      ensureCreated: false,
      dropDatabase: false,
      seedDatabase: true,
    });
    expect(Object.isFrozen(options)).toBe(true);
  });

  it('should share options within a scope by default', () => {
    const container = addMongoRepositories(createContainer(), section);
    const first = container.createScope();
    const second = container.createScope();

    expect(first.resolve(REPOSITORY_OPTIONS)).toBe(
      first.resolve(REPOSITORY_OPTIONS),
    );
    expect(first.resolve(REPOSITORY_OPTIONS)).not.toBe(
      second.resolve(REPOSITORY_OPTIONS),
    );
  });

  it('should honour a singleton lifetime', () => {
    const container = addMongoRepositories(createContainer(), section, {
      lifetime: Lifetime.SINGLETON,
    });

    expect(container.createScope().resolve(REPOSITORY_OPTIONS)).toBe(
      container.createScope().resolve(REPOSITORY_OPTIONS),
    );
  });

  it('should honour a transient lifetime', () => {
    const container = addMongoRepositories(createContainer(), section, {
      lifetime: Lifetime.TRANSIENT,
    });

    expect(container.resolve(REPOSITORY_OPTIONS)).not.toBe(
      container.resolve(REPOSITORY_OPTIONS),
    );
  });

  it('should fail at registration for an invalid section', () => {
    const container = createContainer();

    expect(() =>
      addMongoRepositories(container, { Uri: 'mongodb://localhost:27017' }),
    ).toThrow(ConfigurationError);
    expect(container.hasRegistration(REPOSITORY_OPTIONS)).toBe(false);
  });

  it('should register custom options types under their own name', () => {
    const schema = mongoRepositoryOptionsSchema.extend({
      tenant: z.string(),
    });
    const container = addMongoRepositories(
      createContainer(),
      { ...section, Tenant: 'acme' },
      { schema, name: 'billingOptions' },
    );

    expect(container.resolve('billingOptions')).toMatchObject({
      databaseId: 'shop',
      tenant: 'acme',
    });
    expect(container.hasRegistration(REPOSITORY_OPTIONS)).toBe(false);
  });
});

describe('addMongoClient', () => {
  it('should register one client for the container', async () => {
    const options = parseRepositoryOptions(section);
    const container = addMongoClient(createContainer(), options);

    const client = container.createScope().resolve<MongoClient>(MONGO_CLIENT);

    expect(client).toBeInstanceOf(MongoClient);
    expect(container.createScope().resolve(MONGO_CLIENT)).toBe(client);
    await container.dispose();
  });
});
