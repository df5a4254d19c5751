import { modelTypeName, resolveCollectionName } from '../lib/collection-name';
import { ConfigurationError } from '../lib/errors';

describe('resolveCollectionName', () => {
  it.each([
    ['Person', 'People'],
    ['Order', 'Orders'],
    ['Category', 'Categories'],
    ['OrderLine', 'OrderLines'],
  ])('should map %s to %s', (model, collection) => {
    expect(resolveCollectionName(model)).toBe(collection);
  });

  it('should use the simple name of a qualified type name', () => {
    expect(resolveCollectionName('Shop.Models.Person')).toBe('People');
  });

  it('should accept a class', () => {
    class Category {}

    expect(resolveCollectionName(Category)).toBe('Categories');
  });

  it('should be deterministic', () => {
    expect(resolveCollectionName('Person')).toBe(resolveCollectionName('Person'));
  });

  it('should reject an empty type name', () => {
    expect(() => resolveCollectionName({ name: '' })).toThrow(
      ConfigurationError,
    );
    expect(() => resolveCollectionName('Shop.')).toThrow(ConfigurationError);
  });
});

describe('modelTypeName', () => {
  it('should drop the namespace qualifier', () => {
    expect(modelTypeName('Shop.Models.OrderLine')).toBe('OrderLine');
    expect(modelTypeName('OrderLine')).toBe('OrderLine');
  });
});
