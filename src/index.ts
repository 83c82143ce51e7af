export * from "./b-tree";
export * from "./buckets";
export * from "./errors";
export * from "./hash";
export * from "./key-range";
export * from "./linear-hash";
export * from "./maps";
export * from "./nodes";
export * from "./value-type";
