/**
 * Connection settings resolution
 */

import os from "node:os";
import { logger } from "../utils/logger.js";
import { ConfigError } from "../errors.js";
import { DEFAULT_CONNECTION, DEFAULT_SSH_PORT } from "./types.js";
import type { ConnectionConfig, ResolvedConnection } from "./types.js";

/**
 * Split "host", "host:port" or "[v6addr]:port"
 */
export function parseHost(value: string): { host: string; port: number } {
  const trimmed = value.trim();
  if (!trimmed) {
    throw new ConfigError("connection.host must not be empty");
  }

  const bracketed = trimmed.match(/^\[([^\]]+)\](?::(\d+))?$/);
  if (bracketed) {
    return { host: bracketed[1], port: parsePort(bracketed[2], value) };
  }

  const parts = trimmed.split(":");
  if (parts.length === 1) {
    return { host: trimmed, port: DEFAULT_SSH_PORT };
  }
  if (parts.length === 2 && parts[0]) {
    return { host: parts[0], port: parsePort(parts[1], value) };
  }
  // bare IPv6 address without a port
  return { host: trimmed, port: DEFAULT_SSH_PORT };
}

function parsePort(raw: string | undefined, original: string): number {
  if (raw === undefined) {
    return DEFAULT_SSH_PORT;
  }
  const port = Number(raw);
  if (!/^\d+$/.test(raw) || port < 1 || port > 65535) {
    throw new ConfigError(`invalid port in connection.host: ${original}`);
  }
  return port;
}

/**
 * Apply defaults and pull secrets out of the environment
 */
export function resolveConnection(
  config: ConnectionConfig,
  env: NodeJS.ProcessEnv = process.env
): ResolvedConnection {
  const { host, port } = parseHost(config.host);
  const username = config.username ?? os.userInfo().username;

  let password = config.password;
  if (password === undefined && config.passwordEnvVar) {
    password = env[config.passwordEnvVar] ?? "";
    if (password === "") {
      logger.warn("Empty password environment variable", { variable: config.passwordEnvVar });
    }
  }

  let privateKey = config.privateKey;
  if (privateKey === undefined && !config.privateKeyPath && config.privateKeyEnvVar) {
    privateKey = env[config.privateKeyEnvVar];
    if (!privateKey) {
      throw new ConfigError(`environment variable ${config.privateKeyEnvVar} holds no private key`);
    }
  }

  const maxSessions = config.maxSessions ?? DEFAULT_CONNECTION.maxSessions;
  if (!Number.isInteger(maxSessions) || maxSessions < 1) {
    throw new ConfigError(`connection.maxSessions must be a positive integer, got ${maxSessions}`);
  }

  return {
    ssh: {
      host,
      port,
      username,
      password,
      privateKey,
      privateKeyPath: privateKey === undefined ? config.privateKeyPath : undefined,
      passphrase: config.passphrase,
    },
    sudo: config.sudo ?? DEFAULT_CONNECTION.sudo,
    maxSessions,
  };
}
