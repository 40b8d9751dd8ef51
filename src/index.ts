export { Registry, type RegistryOptions } from "./core/registry";
export { applyBatch, applyCommand, emptyState } from "./core/reducer";
export * as query from "./core/queries";
export { EventLog, type EventListener, type EventRecord, type EventSink } from "./core/events";
export { computeEventsRoot, computeStateRoot } from "./core/hash";
export { INTERFACE_IDS, interfaceId, selector, supportsInterface } from "./core/interfaces";
export { decEvent, encEvent, encState } from "./codec/rlp";
export { commandSchema, parseCommand } from "./schema";
export { NULL_ADDRESS, isNull, toAddress, toTokenId } from "./types/brands";
export { RegistryError, err, ok, type RegistryErrorCode, type Result } from "./errors";
export { makeLogger, type ILogger } from "./logging";
export type * from "./types";
