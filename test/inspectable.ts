import { Bucket, BucketSlots, BranchNode, LeafNode, LinearHashMap, OrderedTreeMap, TreeNode, TreeOrder } from '../src';

/** Exposes the tree's nodes for structural checks. */
export class InspectableTree<TKey, TValue> extends OrderedTreeMap<TKey, TValue> {
	get rootNode(): TreeNode<TKey, TValue> {
		return this.root;
	}

	/** Throws if any B+Tree invariant is violated. */
	checkValid() {
		const leaves: LeafNode<TKey, TValue>[] = [];
		const depths = new Set<number>();
		const visit = (node: TreeNode<TKey, TValue>, depth: number, low?: TKey, high?: TKey) => {
			if (node instanceof LeafNode) {
				if (node.keys.length !== node.values.length) {
					throw new Error("Leaf keys and values out of step");
				}
				checkKeys(node.keys, low, high);
				leaves.push(node);
				depths.add(depth);
				return;
			}
			if (node.nodes.length !== node.partitions.length + 1) {
				throw new Error("Branch must have one more node than partitions");
			}
			const partitions = node.partitions;
			checkKeys(partitions, low, high);
			node.nodes.forEach((child, i) => visit(
				child,
				depth + 1,
				i > 0 ? partitions[i - 1] : low,
				i < partitions.length ? partitions[i] : high,
			));
		};
		const checkKeys = (keys: TKey[], low?: TKey, high?: TKey) => {
			if (keys.length > TreeOrder - 1) {
				throw new Error(`Node holds ${keys.length} keys`);
			}
			keys.forEach((key, i) => {
				if (i > 0 && this.compareKeys(keys[i - 1], key) >= 0) {
					throw new Error("Keys out of order within node");
				}
				if (low !== undefined && this.compareKeys(key, low) < 0) {
					throw new Error("Key below its separator");
				}
				if (high !== undefined && this.compareKeys(key, high) >= 0) {
					throw new Error("Key at or above its separator");
				}
			});
		};
		visit(this.root, 1);

		if (depths.size > 1) {
			throw new Error(`Leaves at differing depths: ${[...depths].join(", ")}`);
		}
		leaves.forEach((leaf, i) => {
			if (leaf.next !== leaves[i + 1]) {
				throw new Error("Leaf chain does not follow key order");
			}
		});
	}
}

/** Exposes the hash table's chains for structural checks. */
export class InspectableHashMap<TKey, TValue> extends LinearHashMap<TKey, TValue> {
	chain(index: number): Bucket<TKey, TValue>[] {
		const result: Bucket<TKey, TValue>[] = [];
		for (let bucket = this.table[index]; bucket; bucket = bucket.next) {
			result.push(bucket);
		}
		return result;
	}

	/** Throws unless every stored key sits in the chain the lookup rule sends it to, exactly once. */
	checkValid() {
		if (this.table.length !== this.bucketCount()) {
			throw new Error(`Table holds ${this.table.length} chains; expected ${this.bucketCount()}`);
		}
		let count = 0;
		for (let index = 0; index < this.table.length; ++index) {
			for (const bucket of this.chain(index)) {
				if (bucket.count > BucketSlots) {
					throw new Error(`Bucket holds ${bucket.count} pairs`);
				}
				for (const key of bucket.keys) {
					if (this.homeIndex(key) !== index) {
						throw new Error(`Key ${String(key)} stored in chain ${index} but homes to ${this.homeIndex(key)}`);
					}
					++count;
				}
			}
		}
		if (count !== this.size()) {
			throw new Error(`Table holds ${count} pairs; size reports ${this.size()}`);
		}
	}
}

export function isBranch<TKey, TValue>(node: TreeNode<TKey, TValue>): node is BranchNode<TKey, TValue> {
	return node instanceof BranchNode;
}
