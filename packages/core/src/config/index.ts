/**
 * Config Module - Connection settings and manifests
 */

export { ConfigManager } from "./manager.js";
export { parseManifest, parseConnection, parseResource } from "./manifest.js";
export { resolveConnection, parseHost } from "./connection.js";
export type { ConnectionConfig, ResolvedConnection, ResourceDeclaration, Manifest } from "./types.js";
export { DEFAULT_CONNECTION, DEFAULT_SSH_PORT } from "./types.js";
