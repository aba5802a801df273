export * from "./codec.types";
export * from "./codec.registry";
export * from "./media-type";
export * from "./payload.types";
export * from "./json.codec";
export * from "./multipart.codec";
export * from "./text.codecs";
export * from "./source.codecs";
export * from "./builtin.codecs";
