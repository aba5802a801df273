export * from "./matcher.types";
export * from "./value.matchers";
export * from "./call-count";
export * from "./path.pattern";
export * from "./request.matchers";
