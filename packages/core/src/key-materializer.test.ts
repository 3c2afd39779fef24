import { describe, expect, it } from 'vitest';
import { emptyCatalog, toJson } from './catalog.js';
import { createEntry } from './entry.js';
import { buildKeyPath, materialize, unescapeKeyPath, type KeyPathOptions } from './key-materializer.js';

const options: KeyPathOptions = { keySeparator: '.', defaultNamespace: 'translation', defaultValue: '' };

describe('buildKeyPath', () => {
  it('prefixes the default namespace', () => {
    expect(buildKeyPath(createEntry('a.b'), undefined, options)).toBe('translation.a.b');
  });

  it('uses the entry namespace and appends the plural suffix', () => {
    expect(buildKeyPath(createEntry('apple', { namespace: 'shop' }), '_one', options)).toBe('shop.apple_one');
  });

  it('drops one trailing separator', () => {
    expect(buildKeyPath(createEntry('a.'), undefined, options)).toBe('translation.a');
  });

  it('unescapes line break and tab sequences', () => {
    expect(unescapeKeyPath('a\\tb\\nc')).toBe('a\tb\nc');
    expect(unescapeKeyPath('a\\\\b')).toBe('a\\b');
    expect(unescapeKeyPath('a\\xb')).toBe('a\\xb');
  });
});

describe('materialize', () => {
  it('writes a nested leaf', () => {
    const result = materialize(createEntry('a.b', { value: 'Hello' }), emptyCatalog(), undefined, options);

    expect(toJson(result.target)).toEqual({ translation: { a: { b: 'Hello' } } });
    expect(result.path).toBe('translation.a.b');
    expect(result.conflict).toBeUndefined();
    expect(result.priorValue).toBeUndefined();
  });

  it('never mutates the input tree', () => {
    const target = emptyCatalog();
    materialize(createEntry('a', { value: 'x' }), target, undefined, options);

    expect(target.children.size).toBe(0);
  });

  it('returns the tree unchanged for an empty key', () => {
    const target = emptyCatalog();
    const result = materialize(createEntry(''), target, undefined, options);

    expect(result.target).toBe(target);
    expect(result.path).toBeUndefined();
  });

  it('uses the default value and trims claimed values', () => {
    const withDefault = materialize(createEntry('a'), emptyCatalog(), undefined, { ...options, defaultValue: 'TODO' });
    const trimmed = materialize(createEntry('b', { value: '  Hi  ' }), emptyCatalog(), undefined, options);

    expect(toJson(withDefault.target)).toEqual({ translation: { a: 'TODO' } });
    expect(toJson(trimmed.target)).toEqual({ translation: { b: 'Hi' } });
  });

  it('reports a value conflict and keeps the newer value', () => {
    const first = materialize(createEntry('a', { value: 'Hello' }), emptyCatalog(), undefined, options);
    const second = materialize(createEntry('a', { value: 'Hi' }), first.target, undefined, options);

    expect(second.conflict).toEqual({ kind: 'value', oldValue: 'Hello', newValue: 'Hi' });
    expect(second.priorValue).toBe('Hello');
    expect(toJson(second.target)).toEqual({ translation: { a: 'Hi' } });
  });

  it('keeps a non-empty prior value when the new one is empty', () => {
    const first = materialize(createEntry('a', { value: 'Hello' }), emptyCatalog(), undefined, options);
    const second = materialize(createEntry('a'), first.target, undefined, options);

    expect(second.conflict).toBeUndefined();
    expect(toJson(second.target)).toEqual({ translation: { a: 'Hello' } });
  });

  it('fills an empty prior value without conflict', () => {
    const first = materialize(createEntry('a'), emptyCatalog(), undefined, options);
    const second = materialize(createEntry('a', { value: 'Hello' }), first.target, undefined, options);

    expect(second.conflict).toBeUndefined();
    expect(second.priorValue).toBe('');
    expect(toJson(second.target)).toEqual({ translation: { a: 'Hello' } });
  });

  it('reports a key conflict when a parent segment holds a value', () => {
    const first = materialize(createEntry('a', { value: 'x' }), emptyCatalog(), undefined, options);
    const second = materialize(createEntry('a.b', { value: 'y' }), first.target, undefined, options);

    expect(second.conflict).toEqual({ kind: 'key', segment: 'a' });
    expect(toJson(second.target)).toEqual({ translation: { a: { b: 'y' } } });
  });

  it('reports a key conflict when the leaf position holds a branch', () => {
    const first = materialize(createEntry('a.b', { value: 'y' }), emptyCatalog(), undefined, options);
    const second = materialize(createEntry('a', { value: 'x' }), first.target, undefined, options);

    expect(second.conflict).toEqual({ kind: 'key', segment: 'a' });
    expect(toJson(second.target)).toEqual({ translation: { a: 'x' } });
  });

  it('skips empty intermediate segments', () => {
    const result = materialize(createEntry('a..b', { value: 'v' }), emptyCatalog(), undefined, options);

    expect(toJson(result.target)).toEqual({ translation: { a: { b: 'v' } } });
  });

  it('appends plural suffixes to the leaf', () => {
    const result = materialize(createEntry('apple', { hasCount: true }), emptyCatalog(), '_one', options);

    expect(toJson(result.target)).toEqual({ translation: { apple_one: '' } });
  });
});
