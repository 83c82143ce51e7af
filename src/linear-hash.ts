import { Bucket, BucketSlots } from "./buckets";
import { ConcurrentModificationError } from "./errors";
import { EqualityFunction, HashFunction, hashKey, keysEqual } from "./hash";
import { IKeyValueMap } from "./maps";
import { ValueType, assertType } from "./value-type";

/** Number of home buckets when no initial size is given. */
export const DefaultInitialSize = 4;

/**
 * Unordered map over a hash table that grows one bucket at a time (Linear Hashing).
 * A split pointer walks the table; each overflow splits the chain under the pointer into its two next-generation homes.
 * Keys whose low-resolution home (hash % mod1) lies below the split pointer are found with the high-resolution modulus (hash % mod2).
 * Not safe for concurrent use: callers that share a map across async work must serialize access with their own lock.
 * @template TKey The type of keys.  Must be hashable by the given hash function.
 * @template TValue The type of values.
 */
export class LinearHashMap<TKey, TValue> implements IKeyValueMap<TKey, TValue> {
	private readonly _table: (Bucket<TKey, TValue> | undefined)[];
	private _mod1: number;
	private _mod2: number;
	private _split = 0;
	private _count = 0;
	private _accessCount = 0;
	private _version = 0;

	/**
	 * @param initialSize the initial number of home buckets
	 * @param [hash=hashKey] hash function for keys.  The default handles primitives and IHashable objects.
	 * @param [equals=keysEqual] key equality.  Keys with equal hashes are only matched if this returns true.
	 */
	constructor(
		readonly keyType: ValueType<TKey>,
		readonly valueType: ValueType<TValue>,
		initialSize = DefaultInitialSize,
		private readonly hash: HashFunction<TKey> = hashKey,
		private readonly equals: EqualityFunction<TKey> = keysEqual,
	) {
		if (!Number.isSafeInteger(initialSize) || initialSize < 1) {
			throw new RangeError(`Initial size must be a positive integer; got ${initialSize}`);
		}
		this._mod1 = initialSize;
		this._mod2 = 2 * initialSize;
		this._table = new Array<Bucket<TKey, TValue> | undefined>(initialSize).fill(undefined);
	}

	/** Modulus of the current generation */
	get mod1(): number {
		return this._mod1;
	}

	/** Modulus of the next generation (always twice mod1) */
	get mod2(): number {
		return this._mod2;
	}

	/** Index of the next chain to split */
	get splitPointer(): number {
		return this._split;
	}

	get accessCount(): number {
		return this._accessCount;
	}

	resetAccessCount() {
		this._accessCount = 0;
	}

	/** Chain heads, one per home bucket.  Undefined until the first insert into that bucket. */
	protected get table(): ReadonlyArray<Bucket<TKey, TValue> | undefined> {
		return this._table;
	}

	/** @returns the value stored under an equal key; undefined otherwise. */
	get(key: TKey): TValue | undefined {
		assertType(this.keyType, key, "key");
		const found = this.find(this._table[this.homeIndex(key)], key);
		return found ? found.bucket.values[found.slot] : undefined;
	}

	has(key: TKey): boolean {
		assertType(this.keyType, key, "key");
		return this.find(this._table[this.homeIndex(key)], key) !== undefined;
	}

	/**
	 * Inserts or overwrites the pair.  If a new pair overflows its chain, the chain under the split pointer is split.
	 * @returns the previous value if the key was present; undefined otherwise.
	 */
	put(key: TKey, value: TValue): TValue | undefined {
		assertType(this.keyType, key, "key");
		assertType(this.valueType, value, "value");
		const index = this.homeIndex(key);
		const head = this._table[index];
		const found = this.find(head, key);
		++this._version;
		if (found) {
			const previous = found.bucket.values[found.slot];
			found.bucket.values[found.slot] = value;
			return previous;
		}

		++this._count;
		if (!head) {
			const bucket = new Bucket<TKey, TValue>();
			bucket.add(key, value);
			this._table[index] = bucket;
			return undefined;
		}

		let last = head;
		while (last.next) {	// already counted by find
			last = last.next;
		}
		if (!last.isFull) {
			last.add(key, value);
			return undefined;
		}
		// Chain full.  Overflow, then split

		last.next = new Bucket<TKey, TValue>();
		++this._accessCount;
		last.next.add(key, value);
		this.split();
		return undefined;
	}

	/** @returns the number of stored pairs */
	size(): number {
		return this._count;
	}

	/** @returns the slot capacity of the home buckets in the current generation (overflow buckets not included) */
	capacity(): number {
		return BucketSlots * this.bucketCount();
	}

	/** @returns the number of home buckets (chains) */
	bucketCount(): number {
		return this._mod1 + this._split;
	}

	/** Iterates pairs in bucket order.
	 * WARNING: mutation during iteration will result in an exception
	 */
	*entries(): IterableIterator<[TKey, TValue]> {
		const version = this._version;
		for (let i = 0; i < this._table.length; ++i) {
			for (let bucket = this._table[i]; bucket; bucket = bucket.next) {
				for (let slot = 0; slot < bucket.count; ++slot) {
					yield [bucket.keys[slot], bucket.values[slot]];
					this.validateVersion(version);
				}
			}
		}
	}

	*keys(): IterableIterator<TKey> {
		for (const [key] of this.entries()) {
			yield key;
		}
	}

	*values(): IterableIterator<TValue> {
		for (const [, value] of this.entries()) {
			yield value;
		}
	}

	[Symbol.iterator](): IterableIterator<[TKey, TValue]> {
		return this.entries();
	}

	/** Lists each home bucket's chain, one line per bucket. */
	dump(): string {
		const lines = [`Linear hash table (mod1=${this._mod1}, mod2=${this._mod2}, split=${this._split}, size=${this._count})`];
		this._table.forEach((head, index) => {
			const buckets: string[] = [];
			for (let bucket = head; bucket; bucket = bucket.next) {
				buckets.push(describeBucket(bucket));
			}
			lines.push(`${index}: ${buckets.length ? buckets.join(" -> ") : "-"}`);
		});
		return lines.join("\n");
	}

	/** Home bucket index under the current split state. */
	protected homeIndex(key: TKey): number {
		const hash = this.hash(key) >>> 0;
		const index = hash % this._mod1;
		return index < this._split ? hash % this._mod2 : index;
	}

	private find(head: Bucket<TKey, TValue> | undefined, key: TKey): { bucket: Bucket<TKey, TValue>, slot: number } | undefined {
		for (let bucket = head; bucket; bucket = bucket.next) {
			++this._accessCount;
			const slot = bucket.keys.findIndex(k => this.equals(k, key));
			if (slot >= 0) {
				return { bucket, slot };
			}
		}
		return undefined;
	}

	/** Splits the chain under the split pointer between its own index and index + mod1, then advances the pointer. */
	private split() {
		const source = this._split;
		const chain = this._table[source];
		this._table[source] = undefined;
		this._table.push(undefined);	// source + mod1; the table grows by one chain per split
		for (let bucket = chain; bucket; bucket = bucket.next) {
			++this._accessCount;
			for (let slot = 0; slot < bucket.count; ++slot) {
				const key = bucket.keys[slot];
				this.append((this.hash(key) >>> 0) % this._mod2, key, bucket.values[slot]);
			}
		}

		if (++this._split === this._mod1) {	// Generation complete
			this._mod1 = this._mod2;
			this._mod2 *= 2;
			this._split = 0;
		}
	}

	/** Adds a pair known to be absent at the end of the given chain, without triggering a split. */
	private append(index: number, key: TKey, value: TValue) {
		let bucket = this._table[index];
		if (!bucket) {
			bucket = new Bucket<TKey, TValue>();
			this._table[index] = bucket;
		}
		while (bucket.next) {
			bucket = bucket.next;
		}
		if (bucket.isFull) {
			bucket.next = new Bucket<TKey, TValue>();
			bucket = bucket.next;
		}
		bucket.add(key, value);
	}

	private validateVersion(version: number) {
		if (version !== this._version) {
			throw new ConcurrentModificationError();
		}
	}
}

function describeBucket<TKey, TValue>(bucket: Bucket<TKey, TValue>): string {
	const pairs = bucket.keys.map((key, slot) => `${String(key)}=${String(bucket.values[slot])}`);
	return `[${pairs.join(", ")}]`;
}
