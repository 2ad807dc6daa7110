export * from "./concurrency";
export * from "./connection-manager";
export * from "./container";
export * from "./directory-lister";
export * from "./event-bus";
export * from "./logger";
export * from "./operation-queue";
export * from "./operations";
export * from "./provider-registry";
export * from "./providers/local-provider";
export * from "./providers/provider";
export * from "./providers/remote-provider";
export * from "./result";
export * from "./transfer/conflict-arbiter";
export * from "./transfer/transfer-engine";
export * from "./transfer/transfer-session";
export * from "./validation";
