export * from "./verification.tracker";
