export * from "./response.types";
export * from "./responder.factory";
export * from "./response.synthesizer";
