/** Number of key/value slots per bucket.  Not configurable. */
export const BucketSlots = 4;

/** A fixed-capacity run of key/value pairs, optionally chained to an overflow bucket. */
export class Bucket<TKey, TValue> {
	readonly keys: TKey[] = [];
	readonly values: TValue[] = [];

	constructor(
		public next?: Bucket<TKey, TValue>,
	) { }

	get count(): number {
		return this.keys.length;
	}

	get isFull(): boolean {
		return this.keys.length >= BucketSlots;
	}

	/** Appends to the next free slot.  Caller ensures the bucket is not full. */
	add(key: TKey, value: TValue) {
		if (this.isFull) {
			throw new Error("Bucket overflow");
		}
		this.keys.push(key);
		this.values.push(value);
	}
}
