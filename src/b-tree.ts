import { ConcurrentModificationError, DuplicateKeyError, IndexMapError } from "./errors";
import { KeyBound, KeyRange } from "./key-range";
import { IOrderedMap } from "./maps";
import { BranchNode, LeafNode, TreeNode } from "./nodes";
import { ValueType, assertType } from "./value-type";

/** Maximum fanout of a node: at most TreeOrder children and TreeOrder - 1 keys.  Not configurable. */
export const TreeOrder = 5;

/** Marks an insert that found its key already present. */
const Duplicate = Symbol("duplicate");

/**
 * B+Tree map: values at the leaves, leaves chained left to right for range scans.
 * Keys are unique; inserting an existing key is rejected and leaves the tree unchanged.
 * No deletion.
 * Not safe for concurrent use: callers that share a map across async work must serialize access with their own lock.
 * @template TKey The type of keys.  Ordered by the given comparison.
 * @template TValue The type of values.
 */
export class OrderedTreeMap<TKey, TValue> implements IOrderedMap<TKey, TValue> {
	private _root: TreeNode<TKey, TValue>;
	private _version = 0;
	private _accessCount = 0;

	/**
	 * @param [compare] a comparison function for keys; negative, zero or positive.  The default uses < and > operators.
	 */
	constructor(
		readonly keyType: ValueType<TKey>,
		readonly valueType: ValueType<TValue>,
		private readonly compare: (a: TKey, b: TKey) => number = (a, b) => a < b ? -1 : a > b ? 1 : 0,
	) {
		this._root = new LeafNode<TKey, TValue>([], []);
	}

	get accessCount(): number {
		return this._accessCount;
	}

	resetAccessCount() {
		this._accessCount = 0;
	}

	protected get root(): TreeNode<TKey, TValue> {
		return this._root;
	}

	/** @returns the value for the given key if found; undefined otherwise. */
	get(key: TKey): TValue | undefined {
		assertType(this.keyType, key, "key");
		const leaf = this.findLeaf(key);
		const [on, index] = this.indexOfEntry(leaf.keys, key);
		return on ? leaf.values[index] : undefined;
	}

	has(key: TKey): boolean {
		assertType(this.keyType, key, "key");
		return this.indexOfEntry(this.findLeaf(key).keys, key)[0];
	}

	/**
	 * Adds the pair to the tree.
	 * @throws DuplicateKeyError if the key is already present (the tree is unchanged)
	 * @returns undefined; keys are never replaced
	 */
	put(key: TKey, value: TValue): undefined {
		if (!this.insert(key, value)) {
			throw new DuplicateKeyError(key);
		}
		return undefined;
	}

	/**
	 * Adds the pair to the tree.  Be sure to check the result, as the tree does not allow duplicate keys.
	 * @returns true if inserted; false if the key was already present (the tree is unchanged).
	 */
	insert(key: TKey, value: TValue): boolean {
		assertType(this.keyType, key, "key");
		assertType(this.valueType, value, "value");
		const result = this.internalInsert(this._root, key, value);
		if (result === Duplicate) {
			return false;
		}
		if (result) {	// Split reached the root; grow a level
			this._root = new BranchNode<TKey, TValue>([result.key], [this._root, result.right]);
		}
		++this._version;
		return true;
	}

	/** @returns the smallest key; undefined if empty */
	firstKey(): TKey | undefined {
		const leaf = this.getFirst(this._root);
		return leaf.keys.length ? leaf.keys[0] : undefined;
	}

	/** @returns the largest key; undefined if empty */
	lastKey(): TKey | undefined {
		return this.getLast(this._root).keys.at(-1);
	}

	/** @returns a snapshot of the pairs with key < toKey */
	headMap(toKey: TKey): OrderedTreeMap<TKey, TValue> {
		assertType(this.keyType, toKey, "key");
		return this.snapshot(new KeyRange(undefined, new KeyBound(toKey, false)));
	}

	/** @returns a snapshot of the pairs with key >= fromKey */
	tailMap(fromKey: TKey): OrderedTreeMap<TKey, TValue> {
		assertType(this.keyType, fromKey, "key");
		return this.snapshot(new KeyRange(new KeyBound(fromKey)));
	}

	/** @returns a snapshot of the pairs with fromKey <= key < toKey; empty if fromKey > toKey */
	subMap(fromKey: TKey, toKey: TKey): OrderedTreeMap<TKey, TValue> {
		assertType(this.keyType, fromKey, "key");
		assertType(this.keyType, toKey, "key");
		return this.snapshot(new KeyRange(new KeyBound(fromKey), new KeyBound(toKey, false)));
	}

	/** Iterates, in ascending order, the pairs within the given range.
	 * Starts at the leaf holding the lower bound and follows the leaf chain until past the upper bound.
	 * WARNING: mutation during iteration will result in an exception
	 */
	*range(range: KeyRange<TKey>): IterableIterator<[TKey, TValue]> {
		const version = this._version;
		let leaf: LeafNode<TKey, TValue> | undefined;
		let index = 0;
		if (range.first) {
			leaf = this.findLeaf(range.first.key);
			const [on, at] = this.indexOfEntry(leaf.keys, range.first.key);
			index = on && !range.first.inclusive ? at + 1 : at;
		} else {
			leaf = this.getFirst(this._root);
		}

		while (leaf) {
			for (; index < leaf.keys.length; ++index) {
				const key = leaf.keys[index];
				if (range.last && this.isPast(key, range.last)) {
					return;
				}
				yield [key, leaf.values[index]];
				this.validateVersion(version);
			}
			leaf = leaf.next;
			index = 0;
			if (leaf) {
				++this._accessCount;
			}
		}
	}

	/** Iterates all pairs in ascending key order.
	 * WARNING: mutation during iteration will result in an exception
	 */
	entries(): IterableIterator<[TKey, TValue]> {
		return this.range(new KeyRange());
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

	/** Computed (not stored) count.  Sums leaf lengths along the leaf chain. */
	size(): number {
		let result = 0;
		for (let leaf: LeafNode<TKey, TValue> | undefined = this.getFirst(this._root); leaf; leaf = leaf.next) {
			result += leaf.keys.length;
		}
		return result;
	}

	/** @returns the number of levels; 1 while the root is a leaf */
	height(): number {
		let result = 1;
		for (let node = this._root; node instanceof BranchNode; node = node.nodes[0]) {
			++result;
		}
		return result;
	}

	/** Pre-order listing, one node per line, indented by level.  Branches show separators; leaves show pairs. */
	dump(): string {
		const lines: string[] = [];
		this.dumpNode(this._root, 0, lines);
		return lines.join("\n");
	}

	/**
	 * Compares two keys with the map's comparison, rejecting a comparison that orders a pair the same way in both directions.
	 * Subclasses may override to skip the reverse call.
	 */
	protected compareKeys(a: TKey, b: TKey): number {
		const result = this.compare(a, b);
		if (result !== 0 && result === this.compare(b, a)) {
			throw new IndexMapError("Inconsistent comparison function for given values");
		}
		return result;
	}

	private snapshot(range: KeyRange<TKey>): OrderedTreeMap<TKey, TValue> {
		const result = new OrderedTreeMap<TKey, TValue>(this.keyType, this.valueType, this.compare);
		for (const [key, value] of this.range(range)) {
			result.insert(key, value);
		}
		return result;
	}

	private isPast(key: TKey, bound: KeyBound<TKey>): boolean {
		const result = this.compareKeys(key, bound.key);
		return result > 0 || (result === 0 && !bound.inclusive);
	}

	private findLeaf(key: TKey): LeafNode<TKey, TValue> {
		let node = this._root;
		++this._accessCount;
		while (node instanceof BranchNode) {
			node = node.nodes[this.indexOfKey(node.partitions, key)];
			++this._accessCount;
		}
		return node;
	}

	/** @returns whether the key is present, and its index or the index it would be inserted at. */
	private indexOfEntry(keys: TKey[], key: TKey): [on: boolean, index: number] {
		let lo = 0;
		let hi = keys.length - 1;
		let split = 0;
		let result = -1;

		while (lo <= hi) {
			split = (lo + hi) >>> 1;
			result = this.compareKeys(key, keys[split]);

			if (result === 0)
				return [true, split];
			else if (result < 0)
				hi = split - 1;
			else
				lo = split + 1;
		}

		return [false, lo];
	}

	/** @returns index of the child to follow: right of the last partition <= key */
	private indexOfKey(keys: TKey[], key: TKey): number {
		let lo = 0;
		let hi = keys.length - 1;
		let split = 0;
		let result = -1;

		while (lo <= hi) {
			split = (lo + hi) >>> 1;
			result = this.compareKeys(key, keys[split]);

			if (result === 0)
				return split + 1;	// +1 because taking right partition
			else if (result < 0)
				hi = split - 1;
			else
				lo = split + 1;
		}

		return lo;
	}

	private internalInsert(node: TreeNode<TKey, TValue>, key: TKey, value: TValue): Split<TKey, TValue> | typeof Duplicate | undefined {
		++this._accessCount;
		if (node instanceof LeafNode) {
			return this.leafInsert(node, key, value);
		}
		const index = this.indexOfKey(node.partitions, key);
		const result = this.internalInsert(node.nodes[index], key, value);
		return result instanceof Split
			? this.branchInsert(node, index, result)
			: result;
	}

	private leafInsert(leaf: LeafNode<TKey, TValue>, key: TKey, value: TValue): Split<TKey, TValue> | typeof Duplicate | undefined {
		const [on, index] = this.indexOfEntry(leaf.keys, key);
		if (on) {
			return Duplicate;
		}
		// Wedge into sorted position
		leaf.keys.splice(index, 0, key);
		leaf.values.splice(index, 0, value);
		if (leaf.keys.length < TreeOrder) {  // No split needed
			return undefined;
		}
		// Over capacity. Split needed

		const midIndex = TreeOrder >>> 1;
		const newLeaf = new LeafNode(leaf.keys.splice(midIndex), leaf.values.splice(midIndex), leaf.next);
		leaf.next = newLeaf;

		return new Split<TKey, TValue>(newLeaf.keys[0], newLeaf);
	}

	private branchInsert(branch: BranchNode<TKey, TValue>, index: number, split: Split<TKey, TValue>): Split<TKey, TValue> | undefined {
		branch.partitions.splice(index, 0, split.key);
		branch.nodes.splice(index + 1, 0, split.right);
		if (branch.nodes.length <= TreeOrder) {  // no split needed
			return undefined;
		}
		// Over capacity. Split needed

		const midIndex = branch.nodes.length >>> 1;
		const movePartitions = branch.partitions.splice(midIndex);
		const newPartition = branch.partitions.pop();	// Extra partition promoted to parent
		if (newPartition === undefined) {
			throw new IndexMapError("Branch split without a partition to promote");
		}
		const moveNodes = branch.nodes.splice(midIndex);

		return new Split<TKey, TValue>(newPartition, new BranchNode(movePartitions, moveNodes));
	}

	/** Descends the first-most edge of the given node. */
	private getFirst(node: TreeNode<TKey, TValue>): LeafNode<TKey, TValue> {
		++this._accessCount;
		while (node instanceof BranchNode) {
			node = node.nodes[0];
			++this._accessCount;
		}
		return node;
	}

	/** Descends the last-most edge of the given node. */
	private getLast(node: TreeNode<TKey, TValue>): LeafNode<TKey, TValue> {
		++this._accessCount;
		while (node instanceof BranchNode) {
			node = node.nodes[node.nodes.length - 1];
			++this._accessCount;
		}
		return node;
	}

	private dumpNode(node: TreeNode<TKey, TValue>, level: number, lines: string[]) {
		const indent = "\t".repeat(level);
		if (node instanceof LeafNode) {
			const values = node.values;
			lines.push(`${indent}[${node.keys.map((key, i) => `${String(key)}=${String(values[i])}`).join(", ")}]`);
		} else {
			lines.push(`${indent}(${node.partitions.map(String).join(" | ")})`);
			for (const child of node.nodes) {
				this.dumpNode(child, level + 1, lines);
			}
		}
	}

	private validateVersion(version: number) {
		if (version !== this._version) {
			throw new ConcurrentModificationError();
		}
	}
}

/** Result of splitting a node: the separator and the new right sibling, to be wedged into the parent. */
class Split<TKey, TValue> {
	constructor(
		public key: TKey,
		public right: TreeNode<TKey, TValue>,
	) { }
}
