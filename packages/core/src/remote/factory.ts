/**
 * Remote client construction
 */

import { SSHManager } from "../ssh/manager.js";
import { ChannelPool } from "../pool/channel-pool.js";
import { RemoteClient } from "./client.js";
import type { ResolvedConnection } from "../config/types.js";
import type { Transport } from "../ssh/types.js";

/**
 * Build a client over an already connected transport
 */
export function createRemoteClientFor(
  transport: Transport,
  options: { sudo: boolean; maxSessions: number }
): RemoteClient {
  const pool = new ChannelPool(transport, { maxSessions: options.maxSessions });
  return new RemoteClient(pool, transport, { sudo: options.sudo });
}

/**
 * Connect over SSH and build a client with its channel pool
 */
export async function createRemoteClient(connection: ResolvedConnection): Promise<RemoteClient> {
  const transport = await SSHManager.from(connection.ssh);
  return createRemoteClientFor(transport, connection);
}
