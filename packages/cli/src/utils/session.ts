/**
 * Manifest session helper
 * Loads a manifest, connects to its host and always closes the client
 */

import {
  ConfigManager,
  Converger,
  createRemoteClient,
  resolveConnection,
  type Manifest,
  type RemoteClient,
} from '@remotefs/core';

export interface ManifestOptions {
  file?: string;
}

export async function loadManifest(options: ManifestOptions): Promise<Manifest> {
  const configManager = new ConfigManager(options.file);
  return configManager.load();
}

/**
 * Run `fn` with a converger bound to the manifest's host
 */
export async function withConverger<T>(
  manifest: Manifest,
  fn: (converger: Converger, client: RemoteClient) => Promise<T>,
  connect: typeof createRemoteClient = createRemoteClient
): Promise<T> {
  const client = await connect(resolveConnection(manifest.connection));
  try {
    return await fn(new Converger(client), client);
  } finally {
    await client.close();
  }
}
