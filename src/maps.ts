import { KeyRange } from "./key-range";

/** Key/value mapping shared by the hash map and the tree map. */
export interface IKeyValueMap<TKey, TValue> extends Iterable<[TKey, TValue]> {
	/** @returns the previous value if the key was already present; undefined otherwise. */
	put(key: TKey, value: TValue): TValue | undefined;
	get(key: TKey): TValue | undefined;
	has(key: TKey): boolean;
	/** @returns the number of stored pairs */
	size(): number;
	entries(): IterableIterator<[TKey, TValue]>;
	keys(): IterableIterator<TKey>;
	values(): IterableIterator<TValue>;
	/** Number of buckets or nodes visited so far; for performance testing. */
	readonly accessCount: number;
	resetAccessCount(): void;
	/** Human readable listing of the internal structure. */
	dump(): string;
}

/** Key/value mapping with keys kept in ascending order.  Range views are snapshots. */
export interface IOrderedMap<TKey, TValue> extends IKeyValueMap<TKey, TValue> {
	firstKey(): TKey | undefined;
	lastKey(): TKey | undefined;
	/** @returns pairs with key < toKey */
	headMap(toKey: TKey): IOrderedMap<TKey, TValue>;
	/** @returns pairs with key >= fromKey */
	tailMap(fromKey: TKey): IOrderedMap<TKey, TValue>;
	/** @returns pairs with fromKey <= key < toKey */
	subMap(fromKey: TKey, toKey: TKey): IOrderedMap<TKey, TValue>;
	range(range: KeyRange<TKey>): IterableIterator<[TKey, TValue]>;
}
