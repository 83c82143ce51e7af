import { TypeMismatchError } from "./errors";
import { describeType } from "./value-type";

/** Keys that supply their own hash code (and optionally value equality). */
export interface IHashable {
	hashCode(): number;
	equals?(other: unknown): boolean;
}

export type HashFunction<TKey> = (key: TKey) => number;
export type EqualityFunction<TKey> = (a: TKey, b: TKey) => boolean;

export function isHashable(value: unknown): value is IHashable {
	return typeof value === "object" && value !== null
		&& "hashCode" in value && typeof value.hashCode === "function";
}

/** Polynomial (31x) hash over UTF-16 code units, kept in 32 bits. */
export function hashString(text: string): number {
	let hash = 0;
	for (let i = 0; i < text.length; ++i) {
		hash = (Math.imul(hash, 31) + text.charCodeAt(i)) | 0;
	}
	return hash;
}

/**
 * Default hash for map keys.  Small integers hash to themselves, so adjacent integer keys land in adjacent buckets.
 * @returns a non-negative 32-bit integer
 */
export function hashKey(key: unknown): number {
	switch (typeof key) {
		case "number":
			if (Number.isInteger(key) && key >= -0x80000000 && key <= 0x7fffffff) {
				return key >>> 0;	// also folds -0 into 0
			}
			return hashString(String(key)) >>> 0;
		case "string":
			return hashString(key) >>> 0;
		case "bigint":
			return hashString(key.toString()) >>> 0;
		case "boolean":
			return key ? 1231 : 1237;
	}
	if (isHashable(key)) {
		return key.hashCode() >>> 0;
	}
	throw new TypeMismatchError("key", "hashable", describeType(key));
}

/** Value equality for keys: SameValueZero for primitives, `equals` for hashable objects that provide it. */
export function keysEqual(a: unknown, b: unknown): boolean {
	if (a === b || (a !== a && b !== b)) {	// NaN equals NaN
		return true;
	}
	if (isHashable(a) && a.equals) {
		return a.equals(b);
	}
	return false;
}
