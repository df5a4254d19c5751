import { ObjectId, UUID } from 'mongodb';
import { QueryStream } from './query-stream';
import { Prettify, ScalarAtPath, ScalarPropPath } from './types';

export type Filter<T> = {
  [P in ScalarPropPath<T>]?: ScalarAtPath<T, P>;
};

export type SortDirection =
  | 1
  | -1
  | 'asc'
  | 'desc'
  | 'ascending'
  | 'descending';

// projection type: { field1: true, field2: true }
export type Projection<T> = Partial<Record<keyof T, true>>;

// mapped type for projected result
export type Projected<T, P extends Projection<T> | undefined> = Prettify<
  P extends Projection<T>
    ? { [K in keyof P]: K extends keyof T ? T[K] : never }
    : T
>;

export type OperationOptions = {
  signal?: AbortSignal;
};

// read capability: a deferred, composable view over every stored model
export type QueryableRepo<T> = {
  readonly collectionName: string;
  asQueryable(): QueryStream<T>;
};

// write capability
export type MutableRepo<T> = {
  add(model: T, options?: OperationOptions): Promise<T>;
  // resolves to the stored model as it was before the replacement
  update(model: T, options?: OperationOptions): Promise<T | undefined>;
  delete(model: T, options?: OperationOptions): Promise<void>;
};

export type CrudRepo<T> = Prettify<QueryableRepo<T> & MutableRepo<T>>;

// Runtime helper to validate filters in case callers bypass TypeScript (casts).
// Filter values must be scalars or key values; nested objects and arrays
// would turn an equality match into a whole-document comparison.
export function validateFilterRuntime(
  filter: unknown,
  context: string = 'filter',
): void {
  if (filter == null) {
    throw new Error(
      `Invalid ${context}: filter must be an object (use {} for no filter), got ${filter}`,
    );
  }
  if (typeof filter !== 'object' || Array.isArray(filter)) {
    throw new Error(
      `Invalid ${context}: filter must be an object (use {} for no filter), got value of type '${typeof filter}'`,
    );
  }

  for (const [path, value] of Object.entries(filter)) {
    if (value === undefined || value === null) continue;
    if (
      typeof value === 'object' &&
      !(value instanceof Date) &&
      !(value instanceof ObjectId) &&
      !(value instanceof UUID)
    ) {
      throw new Error(
        `Invalid ${context}: filter value for '${path}' must be a scalar or key value (string, number, bigint, boolean, Date, ObjectId, UUID, null, or undefined).`,
      );
    }
  }
}

export function isAscending(direction: SortDirection): boolean {
  return direction === 'asc' || direction === 'ascending' || direction === 1;
}
