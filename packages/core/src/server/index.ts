export * from "./server.types";
export * from "./server.config";
export * from "./http.listener";
export * from "./mock-server";
