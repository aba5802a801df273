export * from "./call-counter";
export * from "./expectation.types";
export * from "./expectation.store";
export * from "./expectation.builder";
