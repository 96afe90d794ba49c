export * from "./tools";
export * from "./runner";
export * from "./steps";
export * from "./pipeline";
export * from "./reporter";
