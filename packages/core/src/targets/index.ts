export * from "./_types.js";
export * from "./_registry.js";
