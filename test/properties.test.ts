import fc from 'fast-check';
import { NumberType } from '../src';
import { InspectableHashMap, InspectableTree } from './inspectable';

// Property-based checks of both maps against plain arrays and the built-in Map.

const distinctKeys = fc.uniqueArray(fc.integer({ min: -10_000, max: 10_000 }), { maxLength: 300 });

function buildTree(keys: number[]): InspectableTree<number, number> {
	const tree = new InspectableTree<number, number>(NumberType, NumberType);
	keys.forEach(key => tree.put(key, key * 3));
	return tree;
}

function ascending(keys: number[]): number[] {
	return [...keys].sort((a, b) => a - b);
}

describe('B+Tree map properties', () => {
	it('round-trips distinct keys and keeps leaves ordered and level', () => {
		fc.assert(fc.property(distinctKeys, keys => {
			const tree = buildTree(keys);
			tree.checkValid();
			expect(tree.size()).toBe(keys.length);
			for (const key of keys) {
				expect(tree.get(key)).toBe(key * 3);
			}
			expect([...tree.keys()]).toEqual(ascending(keys));
			expect(tree.firstKey()).toBe(ascending(keys)[0]);
			expect(tree.lastKey()).toBe(ascending(keys).at(-1));
		}));
	});

	it('rejects duplicates without changing the tree', () => {
		fc.assert(fc.property(distinctKeys.filter(keys => keys.length > 0), fc.nat(), (keys, pick) => {
			const tree = buildTree(keys);
			const key = keys[pick % keys.length];
			expect(tree.insert(key, -1)).toBe(false);
			expect(tree.get(key)).toBe(key * 3);
			expect(tree.size()).toBe(keys.length);
		}));
	});

	it('returns exactly the keys within range views', () => {
		fc.assert(fc.property(distinctKeys, fc.integer({ min: -11_000, max: 11_000 }), fc.integer({ min: -11_000, max: 11_000 }), (keys, a, b) => {
			const tree = buildTree(keys);
			const [from, to] = a <= b ? [a, b] : [b, a];
			const sorted = ascending(keys);
			expect([...tree.subMap(from, to).keys()]).toEqual(sorted.filter(k => from <= k && k < to));
			expect([...tree.headMap(to).keys()]).toEqual(sorted.filter(k => k < to));
			expect([...tree.tailMap(from).entries()]).toEqual(sorted.filter(k => k >= from).map(k => [k, k * 3]));
		}));
	});
});

describe('Linear hash map properties', () => {
	it('keeps every key in its home chain as the table grows', () => {
		fc.assert(fc.property(distinctKeys, fc.integer({ min: 1, max: 16 }), (keys, initialSize) => {
			const map = new InspectableHashMap<number, number>(NumberType, NumberType, initialSize);
			keys.forEach(key => map.put(key, key * 3));
			map.checkValid();
			expect(map.size()).toBe(keys.length);
			for (const key of keys) {
				expect(map.get(key)).toBe(key * 3);
			}
			expect(ascending([...map.keys()])).toEqual(ascending(keys));
		}));
	});

	it('behaves like Map under puts with repeated keys', () => {
		const puts = fc.array(fc.tuple(fc.integer({ min: 0, max: 60 }), fc.integer()), { maxLength: 200 });
		fc.assert(fc.property(puts, fc.integer({ min: 1, max: 8 }), (pairs, initialSize) => {
			const map = new InspectableHashMap<number, number>(NumberType, NumberType, initialSize, key => key % 5);
			const model = new Map<number, number>();
			for (const [key, value] of pairs) {
				expect(map.put(key, value)).toBe(model.get(key));
				model.set(key, value);
			}
			map.checkValid();
			expect(map.size()).toBe(model.size);
			for (const [key, value] of model) {
				expect(map.get(key)).toBe(value);
			}
		}));
	});
});
