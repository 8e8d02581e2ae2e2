import { Address } from '@Bazaar/type';

/**
 * Iterable membership set: `items` keeps enumeration order and
 * `positions` maps each member to its slot. Removal swaps the last item
 * into the freed slot, so order is insertion order except for that slot.
 */
export type IndexedSet = {
  items: Address[];
  positions: Map<Address, number>;
};

export function createIndexedSet(initial: Address[] = []): IndexedSet {
  const set: IndexedSet = { items: [], positions: new Map() };
  for (const item of initial) {
    addToIndexedSet(set, item);
  }
  return set;
}

export function indexedSetHas(set: IndexedSet, item: Address): boolean {
  return set.positions.has(item);
}

export function addToIndexedSet(set: IndexedSet, item: Address): boolean {
  if (set.positions.has(item)) {
    return false;
  }
  set.positions.set(item, set.items.length);
  set.items.push(item);
  return true;
}

export function removeFromIndexedSet(set: IndexedSet, item: Address): boolean {
  const position = set.positions.get(item);
  if (position === undefined) {
    return false;
  }
  const last = set.items.pop();
  if (last !== undefined && last !== item) {
    set.items[position] = last;
    set.positions.set(last, position);
  }
  set.positions.delete(item);
  return true;
}

export function indexedSetValues(set: IndexedSet): Address[] {
  return [...set.items];
}
