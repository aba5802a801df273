export * from "./match.engine";
export * from "./mismatch.report";
