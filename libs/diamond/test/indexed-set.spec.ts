import {
  addToIndexedSet,
  createIndexedSet,
  indexedSetHas,
  indexedSetValues,
  removeFromIndexedSet,
} from '../src/storage/indexed-set';

describe('IndexedSet', () => {
  it('keeps insertion order and refuses duplicates', () => {
    const set = createIndexedSet(['a', 'b']);

    expect(addToIndexedSet(set, 'c')).toBe(true);
    expect(addToIndexedSet(set, 'a')).toBe(false);
    expect(indexedSetValues(set)).toEqual(['a', 'b', 'c']);
  });

  it('fills a removed slot with the last item', () => {
    const set = createIndexedSet(['a', 'b', 'c', 'd']);

    expect(removeFromIndexedSet(set, 'b')).toBe(true);

    expect(indexedSetValues(set)).toEqual(['a', 'd', 'c']);
    expect(set.positions.get('d')).toBe(1);
    expect(indexedSetHas(set, 'b')).toBe(false);
  });

  it('removes the last item without moving anything', () => {
    const set = createIndexedSet(['a', 'b']);

    expect(removeFromIndexedSet(set, 'b')).toBe(true);
    expect(removeFromIndexedSet(set, 'b')).toBe(false);

    expect(indexedSetValues(set)).toEqual(['a']);
    expect(set.positions.get('a')).toBe(0);
  });

  it('stays consistent after the only item goes', () => {
    const set = createIndexedSet(['a']);

    removeFromIndexedSet(set, 'a');
    addToIndexedSet(set, 'z');

    expect(indexedSetValues(set)).toEqual(['z']);
    expect(set.positions.get('z')).toBe(0);
  });
});
