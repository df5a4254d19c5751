import * as dotenv from 'dotenv';
import { camelCase, mapKeys } from 'lodash';
import { z } from 'zod';
import { ConfigurationError } from './errors';

export const DEFAULT_ENV_PREFIX = 'MONGO_';

const FLAG_VALUES: Record<string, boolean> = {
  true: true,
  yes: true,
  '1': true,
  false: false,
  no: false,
  '0': false,
  '': false,
};

// configuration sources deliver flags as text ('true', '0', ...)
function parseFlag(value: unknown): unknown {
  if (typeof value !== 'string') {
    return value;
  }
  const normalized = value.trim().toLowerCase();
  return Object.prototype.hasOwnProperty.call(FLAG_VALUES, normalized)
    ? FLAG_VALUES[normalized]
    : value;
}

const flag = z.preprocess(
  parseFlag,
  z.boolean({ invalid_type_error: 'must be a boolean' }).default(false),
);

const requiredText = z
  .string({ required_error: 'is required', invalid_type_error: 'must be a string' })
  .trim()
  .min(1, 'is required');

// empty input is reported once, by requiredText
const MONGO_URI_SCHEME = /^$|^mongodb(\+srv)?:\/\//;

export const mongoRepositoryOptionsSchema = z.object(
  {
    uri: requiredText.regex(
      MONGO_URI_SCHEME,
      'must use the mongodb:// or mongodb+srv:// scheme',
    ),
    databaseId: requiredText,
    ensureCreated: flag,
    dropDatabase: flag,
    seedDatabase: flag,
  },
  { invalid_type_error: 'must be an object' },
);

export type MongoRepositoryOptions = z.output<
  typeof mongoRepositoryOptionsSchema
>;

// schemas for custom options types extend mongoRepositoryOptionsSchema
export type OptionsSchema<
  O extends MongoRepositoryOptions = MongoRepositoryOptions,
> = z.ZodType<O, z.ZodTypeDef, unknown>;

// a configuration section as bound from a config file or the environment
export type ConfigurationSection = Record<string, unknown>;

/**
 * Validates a configuration section and returns frozen options. Section keys
 * bind regardless of casing style: `DatabaseId`, `databaseId` and
 * `DATABASE_ID` all set `databaseId`.
 *
 * @throws ConfigurationError listing every invalid or missing field
 */
export function parseRepositoryOptions(
  section: unknown,
): Readonly<MongoRepositoryOptions>;
export function parseRepositoryOptions<O extends MongoRepositoryOptions>(
  section: unknown,
  schema: OptionsSchema<O>,
): Readonly<O>;
export function parseRepositoryOptions(
  section: unknown,
  schema: OptionsSchema = mongoRepositoryOptionsSchema,
): Readonly<MongoRepositoryOptions> {
  const result = schema.safeParse(normalizeSection(section));
  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map(
        (issue) => `${issue.path.join('.') || 'options'} ${issue.message}`,
      ),
    );
  }
  return Object.freeze(result.data);
}

export function readEnvConfiguration(
  prefix: string = DEFAULT_ENV_PREFIX,
  env: NodeJS.ProcessEnv = process.env,
): ConfigurationSection {
  const section: ConfigurationSection = {};
  for (const [name, value] of Object.entries(env)) {
    if (value !== undefined && name.startsWith(prefix)) {
      section[name.slice(prefix.length)] = value;
    }
  }
  return section;
}

/**
 * Loads a dotenv file into `process.env` and reads the prefixed variables
 * (`MONGO_URI`, `MONGO_DATABASE_ID`, ...). Without `path`, dotenv looks for
 * `.env` in the working directory and a missing file is not an error.
 */
export function loadEnvConfiguration({
  prefix = DEFAULT_ENV_PREFIX,
  path,
}: { prefix?: string; path?: string } = {}): ConfigurationSection {
  const loaded = dotenv.config(path ? { path } : undefined);
  if (path && loaded.error) {
    throw new ConfigurationError([
      `unable to load ${path}: ${loaded.error.message}`,
    ]);
  }
  return readEnvConfiguration(prefix);
}

// log-safe view of the options; the uri may embed credentials
export function describeOptions(options: MongoRepositoryOptions) {
  return {
    databaseId: options.databaseId,
    ensureCreated: options.ensureCreated,
    dropDatabase: options.dropDatabase,
    seedDatabase: options.seedDatabase,
  };
}

function normalizeSection(section: unknown): unknown {
  if (typeof section !== 'object' || section === null || Array.isArray(section)) {
    return section;
  }
  return mapKeys(section, (_value, key) => camelCase(key));
}
