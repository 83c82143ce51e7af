/** Base class for errors raised by the index maps. */
export class IndexMapError extends Error {
	constructor(message: string) {
		super(message);
		this.name = new.target.name;
	}
}

/** Raised when a key is inserted into a map that does not allow duplicates and the key is already present.
 * The map is left unchanged. */
export class DuplicateKeyError<TKey = unknown> extends IndexMapError {
	constructor(
		public readonly key: TKey,
	) {
		super(`Attempt to insert duplicate key: ${String(key)}`);
	}
}

/** Raised when a key or value does not belong to the type the map was constructed with. */
export class TypeMismatchError extends IndexMapError {
	constructor(
		public readonly role: "key" | "value",
		public readonly expected: string,
		public readonly actual: string,
	) {
		super(`Expected ${role} of type ${expected} but got ${actual}`);
	}
}

/** Raised when a live iterator is advanced after the structure it iterates has been mutated. */
export class ConcurrentModificationError extends IndexMapError {
	constructor() {
		super("Map was mutated during iteration");
	}
}
