import { Document, ObjectId, UUID } from 'mongodb';
import { createRandomKey, isKeyMissing, KeyKind, KeyKindMap } from './key-utility';
import { KeyValue } from './types';

// field every filter targets, for single and composite keys alike
export const KEY_FIELD = 'Key';
export const COMPOSITE_KEY_SEPARATOR = '|';

export type SingleKeyModel<K extends KeyValue = string> = { Key: K };

export type TwoPartKeyModel<
  K1 extends KeyValue = string,
  K2 extends KeyValue = string,
> = { Key1: K1; Key2: K2 };

export type ThreePartKeyModel<
  K1 extends KeyValue = string,
  K2 extends KeyValue = string,
  K3 extends KeyValue = string,
> = { Key1: K1; Key2: K2; Key3: K3 };

/**
 * Key handling strategy of a repository: how the `Key` filter value is
 * derived from a model, whether a missing key gets generated on insert, and
 * what document gets written.
 */
export type KeyDescriptor<T> = {
  readonly arity: 1 | 2 | 3;
  keyOf(model: T): KeyValue;
  // assigns a generated key in place when the model has none (single keys only)
  ensureKey(model: T): void;
  toDocument(model: T): Document;
};

export function singleKey<K extends KeyKind>(
  kind: K,
): KeyDescriptor<SingleKeyModel<KeyKindMap[K]>> {
  return {
    arity: 1,
    keyOf: (model) => model.Key,
    ensureKey: (model) => {
      if (isKeyMissing(model.Key)) {
        model.Key = createRandomKey(kind);
      }
    },
    toDocument: (model) => ({ ...model }),
  };
}

export function twoPartKey(): KeyDescriptor<
  TwoPartKeyModel<KeyValue, KeyValue>
> {
  return compositeKey<TwoPartKeyModel<KeyValue, KeyValue>>(2, (model) => [
    model.Key1,
    model.Key2,
  ]);
}

export function threePartKey(): KeyDescriptor<
  ThreePartKeyModel<KeyValue, KeyValue, KeyValue>
> {
  return compositeKey<ThreePartKeyModel<KeyValue, KeyValue, KeyValue>>(
    3,
    (model) => [model.Key1, model.Key2, model.Key3],
  );
}

/**
 * Encodes key parts as one string: `"{Key1}|{Key2}"`. Backslashes and pipes
 * inside a part are escaped with a backslash so that distinct part lists
 * never share an encoding.
 */
export function encodeCompositeKey(parts: readonly KeyValue[]): string {
  return parts
    .map((part) => formatKeyPart(part).replace(/[\\|]/g, '\\$&'))
    .join(COMPOSITE_KEY_SEPARATOR);
}

export function formatKeyPart(part: KeyValue): string {
  if (part instanceof ObjectId || part instanceof UUID) {
    return part.toHexString();
  }
  return String(part);
}

function compositeKey<T extends Document>(
  arity: 2 | 3,
  partsOf: (model: T) => KeyValue[],
): KeyDescriptor<T> {
  const keyOf = (model: T): string => encodeCompositeKey(partsOf(model));
  return {
    arity,
    keyOf,
    // composite keys are always supplied by the caller
    ensureKey: () => undefined,
    toDocument: (model) => ({ ...model, [KEY_FIELD]: keyOf(model) }),
  };
}
