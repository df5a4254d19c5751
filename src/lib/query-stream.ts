import { Document, Filter as MongoFilter } from 'mongodb';
import { InvalidArgumentError } from './errors';
import {
  Filter,
  isAscending,
  Projected,
  Projection,
  SortDirection,
  validateFilterRuntime,
} from './repo';
import { ScalarPropPath } from './types';

// native query issued for one enumeration
export type QueryPlan = {
  filter: MongoFilter<Document>;
  sort: Record<string, 1 | -1>;
  projection?: Record<string, 0 | 1>;
  skip?: number;
  limit?: number;
};

// where a stream gets its documents from; implemented by the repositories
export type QuerySource = {
  find(plan: QueryPlan): AsyncIterable<Document>;
  count(plan: QueryPlan): Promise<number>;
  toModel<R>(doc: Document): R;
};

export type QueryState = {
  filters: Document[];
  sort: [string, 1 | -1][];
  projection?: string[];
  skip: number;
  limit?: number;
};

const INITIAL_STATE: QueryState = { filters: [], sort: [], skip: 0 };

/**
 * Deferred query over a collection. Every operator returns a new stream;
 * nothing reaches the driver until the stream is iterated, counted or
 * collected, and every enumeration re-issues the query.
 */
export class QueryStream<T> implements AsyncIterable<T> {
  private readonly source: QuerySource;
  private readonly state: QueryState;

  constructor(source: QuerySource, state: QueryState = INITIAL_STATE) {
    this.source = source;
    this.state = state;
  }

  where(filter: Filter<T>): QueryStream<T> {
    this.assertNotWindowed('where');
    validateFilterRuntime(filter, 'where');
    const condition: Document = {};
    for (const [path, value] of Object.entries(filter)) {
      if (value !== undefined) {
        condition[path] = value;
      }
    }
    if (Object.keys(condition).length === 0) {
      return this;
    }
    return this.with({ filters: [...this.state.filters, condition] });
  }

  orderBy(
    field: ScalarPropPath<T>,
    direction: SortDirection = 'asc',
  ): QueryStream<T> {
    this.assertNotWindowed('orderBy');
    return this.with({
      sort: [
        ...this.state.sort,
        [String(field), isAscending(direction) ? 1 : -1],
      ],
    });
  }

  skip(offset: number): QueryStream<T> {
    const count = toCount(offset, 'offset');
    const { skip, limit } = this.state;
    return this.with({
      skip: skip + count,
      limit: limit === undefined ? undefined : Math.max(0, limit - count),
    });
  }

  take(limit: number): QueryStream<T> {
    const count = toCount(limit, 'limit');
    const current = this.state.limit;
    return this.with({
      limit: current === undefined ? count : Math.min(current, count),
    });
  }

  select<P extends Projection<T>>(projection: P): QueryStream<Projected<T, P>> {
    const fields = Object.entries(projection)
      .filter(([, included]) => included === true)
      .map(([field]) => field);
    return new QueryStream<Projected<T, P>>(this.source, {
      ...this.state,
      projection: fields,
    });
  }

  async toArray(): Promise<T[]> {
    const results: T[] = [];
    for await (const item of this) {
      results.push(item);
    }
    return results;
  }

  async first(): Promise<T | undefined> {
    const [item] = await this.take(1).toArray();
    return item;
  }

  async count(): Promise<number> {
    const plan = this.plan();
    if (plan.limit === 0) {
      return 0;
    }
    return this.source.count(plan);
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return this.iterate();
  }

  // the native query this stream stands for
  plan(): QueryPlan {
    const { filters, sort, projection, skip, limit } = this.state;
    const plan: QueryPlan = {
      filter: combineFilters(filters),
      // default sort by _id for deterministic ordering
      sort: sort.length > 0 ? Object.fromEntries(sort) : { _id: 1 },
    };
    if (projection) {
      const fields: Record<string, 0 | 1> = { _id: 0 };
      for (const field of projection) {
        fields[field] = 1;
      }
      plan.projection = fields;
    }
    if (skip > 0) {
      plan.skip = skip;
    }
    if (limit !== undefined) {
      plan.limit = limit;
    }
    return plan;
  }

  private async *iterate(): AsyncGenerator<T> {
    const plan = this.plan();
    // a driver limit of 0 means "no limit"
    if (plan.limit === 0) {
      return;
    }
    for await (const doc of this.source.find(plan)) {
      yield this.source.toModel<T>(doc);
    }
  }

  private with(next: Partial<QueryState>): QueryStream<T> {
    return new QueryStream<T>(this.source, { ...this.state, ...next });
  }

  private assertNotWindowed(operator: string): void {
    if (this.state.skip > 0 || this.state.limit !== undefined) {
      throw new Error(
        `${operator}() must be applied before skip() and take()`,
      );
    }
  }
}

// negative and fractional counts clamp; NaN and infinities cannot be sent
function toCount(value: number, argument: string): number {
  if (!Number.isFinite(value)) {
    throw new InvalidArgumentError(argument, 'must be a finite number');
  }
  return Math.max(0, Math.trunc(value));
}

function combineFilters(filters: Document[]): MongoFilter<Document> {
  switch (filters.length) {
    case 0:
      return {};
    case 1:
      return filters[0];
    default:
      return { $and: filters };
  }
}
