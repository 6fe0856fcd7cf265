export * from "./types.js";
export * from "./logger.js";
export * from "./config/adapterConfig.js";
export * from "./graph/types.js";
export * from "./graph/endpointPair.js";
export * from "./graph/errors.js";
export * from "./graph/valueGraph.js";
export * from "./graph/converters.js";
export * from "./graph/baseAdapter.js";
export * from "./graph/immutableAdapter.js";
export * from "./graph/mutableAdapter.js";
export * from "./codec/binary.js";
export * from "./codec/valueCodecs.js";
export * from "./codec/graphCodec.js";
export * from "./codec/files.js";
