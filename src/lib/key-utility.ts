import {
  Binary,
  Decimal128,
  Double,
  Int32,
  Long,
  ObjectId,
  UUID,
} from 'mongodb';
import { v4 as uuidv4 } from 'uuid';
import { UnsupportedKeyTypeError } from './errors';

const EMPTY_OBJECT_ID = '0'.repeat(24);

export type KeyKindMap = {
  string: string;
  uuid: UUID;
  objectId: ObjectId;
  bigint: bigint;
  number: number;
};

export type KeyKind = keyof KeyKindMap;

const keyGenerators: { [K in KeyKind]: () => KeyKindMap[K] } = {
  string: () => uuidv4(),
  uuid: () => new UUID(),
  objectId: () => new ObjectId(),
  // numeric form of a v4 uuid (128 bits)
  bigint: () => BigInt(`0x${uuidv4().replace(/-/g, '')}`),
  // a 128-bit identifier does not fit in a double
  number: () => {
    throw new UnsupportedKeyTypeError('number');
  },
};

/**
 * True when `key` holds the default value of its type: `null`/`undefined`,
 * `''`, `0`, `0n`, a zero BSON number, an all-zero ObjectId or binary/UUID,
 * or a structured key whose fields are all missing.
 */
export function isKeyMissing(key: unknown): boolean {
  if (key === null || key === undefined) {
    return true;
  }
  switch (typeof key) {
    case 'string':
      return key === '';
    case 'number':
      return key === 0;
    case 'bigint':
      return key === 0n;
  }
  if (key instanceof ObjectId) {
    return key.toHexString() === EMPTY_OBJECT_ID;
  }
  if (key instanceof Binary) {
    return key.buffer.subarray(0, key.length()).every((byte) => byte === 0);
  }
  if (key instanceof Long) {
    return key.isZero();
  }
  if (key instanceof Int32 || key instanceof Double) {
    return key.valueOf() === 0;
  }
  if (key instanceof Decimal128) {
    return Number(key.toString()) === 0;
  }
  if (key instanceof Date || Array.isArray(key)) {
    return false;
  }
  // structured key, plain object or class instance; other BSON values are not
  if (typeof key === 'object' && key !== null && !('_bsontype' in key)) {
    return Object.values(key).every(isKeyMissing);
  }
  return false;
}

export function createRandomKey<K extends KeyKind>(kind: K): KeyKindMap[K] {
  if (!Object.prototype.hasOwnProperty.call(keyGenerators, kind)) {
    throw new UnsupportedKeyTypeError(String(kind));
  }
  return keyGenerators[kind]();
}
