/**
 * Remote Module
 */

export { RemoteClient, NOT_FOUND_MARKER, parseId } from "./client.js";
export type { RemoteClientOptions } from "./client.js";
export type { StatFormat, WriteFileOptions, FileContent, ObservedAttributes } from "./types.js";
export { createRemoteClient, createRemoteClientFor } from "./factory.js";
