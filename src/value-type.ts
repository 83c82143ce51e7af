import { TypeMismatchError } from "./errors";

/** Runtime descriptor for the type of keys or values a map accepts. */
export interface ValueType<T> {
	readonly name: string;
	is(value: unknown): value is T;
}

export function valueType<T>(name: string, is: (value: unknown) => value is T): ValueType<T> {
	return { name, is };
}

export const NumberType = valueType("number", (value): value is number => typeof value === "number");
export const StringType = valueType("string", (value): value is string => typeof value === "string");
export const BigIntType = valueType("bigint", (value): value is bigint => typeof value === "bigint");
export const BooleanType = valueType("boolean", (value): value is boolean => typeof value === "boolean");
/** Accepts anything; use when values are not checked at runtime. */
export const UnknownType = valueType("unknown", (value): value is unknown => true);

/** @returns a type accepting instances of the given class (or its subclasses). */
export function instanceOf<T>(ctor: abstract new (...args: never[]) => T): ValueType<T> {
	return valueType(ctor.name, (value): value is T => value instanceof ctor);
}

/** Describes the runtime type of a value for error messages. */
export function describeType(value: unknown): string {
	if (value === null) {
		return "null";
	}
	if (typeof value === "object") {
		return value.constructor?.name ?? "object";
	}
	return typeof value;
}

export function assertType<T>(type: ValueType<T>, value: unknown, role: "key" | "value"): asserts value is T {
	if (!type.is(value)) {
		throw new TypeMismatchError(role, type.name, describeType(value));
	}
}
