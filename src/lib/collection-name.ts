import pluralize from 'pluralize';
import { ConfigurationError } from './errors';

// a model type is referenced by name or by its class
export type ModelType = string | { readonly name: string };

export function modelTypeName(model: ModelType): string {
  const name = typeof model === 'string' ? model : model.name;
  // simple name: drop any namespace qualifier
  return name.slice(name.lastIndexOf('.') + 1).trim();
}

/**
 * Derives the collection backing a model type from the English plural of its
 * simple name: `Person` -> `People`, `Order` -> `Orders`.
 */
export function resolveCollectionName(model: ModelType): string {
  const name = modelTypeName(model);
  if (!name) {
    throw new ConfigurationError([
      'model type name is required to resolve a collection name',
    ]);
  }
  return pluralize(name);
}
