export * from "./ws.types";
export * from "./ws.builder";
export * from "./ws.reaction-engine";
