export * from "./request.types";
export * from "./request.utils";
