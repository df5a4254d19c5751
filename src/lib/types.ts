import { ObjectId, UUID } from 'mongodb';

// values a key field may hold
export type KeyValue = string | number | bigint | ObjectId | UUID;

// leaf values of a model; key values count as leaves even when they are objects
export type Scalar =
  | string
  | number
  | boolean
  | bigint
  | null
  | undefined
  | Date
  | ObjectId
  | UUID;

// utility type to expand complex types for better IDE tooltips
export type Prettify<T> = {
  [K in keyof T]: T[K];
} & {};

type Decrease<D> = D extends 2 ? 1 : D extends 1 ? 0 : never;

// Dotted path to all properties of scalar type, e.g. 'address.city'.
// Depth-limited (2 dots) to keep the compiler fast on wide models.
export type ScalarPropPath<
  T,
  Prefix extends string = '',
  Depth extends number = 2,
> = Depth extends never
  ? never
  : T extends Scalar
    ? never
    : T extends ReadonlyArray<unknown>
      ? never
      : T extends object
        ? {
            [K in Extract<keyof T, string>]:
              | (T[K] extends Scalar
                  ? Prefix extends ''
                    ? K
                    : `${Prefix}.${K}`
                  : never)
              | ScalarPropPath<
                  T[K],
                  Prefix extends '' ? K : `${Prefix}.${K}`,
                  Decrease<Depth>
                >;
          }[Extract<keyof T, string>]
        : never;

// Given a dotted path P, resolve the scalar type at that path in T.
// Walks the present branch of optional properties (NonNullable) while keeping
// optionality at the leaf.
export type ScalarAtPath<
  T,
  P extends string,
> = P extends `${infer K}.${infer Rest}`
  ? K extends keyof NonNullable<T>
    ? ScalarAtPath<NonNullable<T>[K], Rest>
    : never
  : P extends keyof NonNullable<T>
    ? Extract<NonNullable<T>[P], Scalar>
    : never;
