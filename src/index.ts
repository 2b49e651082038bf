export * from "./types/brands";
export * from "./types/result";
export * from "./errors";
export * from "./logging";
export * from "./config";
export * from "./codec/rlp";
export * from "./core/types";
export * from "./core/hash";
export * from "./core/consensus";
export * from "./core/block";
export * from "./core/validation";
export * from "./core/stateStore";
export * from "./core/chainTree";
export * from "./core/forkChoice";
export * from "./core/rules";
export * from "./core/subChain";
export * from "./core/producer";
export * from "./genesis";
export * from "./machines";
