/**
 * Manifest parsing
 * Turns a loaded YAML document into validated connection settings and
 * desired resource attributes
 */

import { ConfigError } from "../errors.js";
import { fromOptional, unset } from "../resources/attribute.js";
import { normalizePermissions } from "../resources/reconciler.js";
import { ResourceKind } from "../resources/types.js";
import type { DesiredAttributes } from "../resources/types.js";
import type { ConnectionConfig, Manifest, ResourceDeclaration } from "./types.js";

type RawObject = Record<string, unknown>;

const PERMISSIONS_PATTERN = /^[0-7]{3,4}$/;

function isObject(value: unknown): value is RawObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(source: RawObject, key: string, where: string): string | undefined {
  const value = source[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new ConfigError(`${where}.${key} must be a string`);
  }
  return value;
}

function optionalBoolean(source: RawObject, key: string, where: string): boolean | undefined {
  const value = source[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== "boolean") {
    throw new ConfigError(`${where}.${key} must be true or false`);
  }
  return value;
}

function optionalInteger(source: RawObject, key: string, where: string): number | undefined {
  const value = source[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
    throw new ConfigError(`${where}.${key} must be a non-negative integer`);
  }
  return value;
}

/**
 * Octal mode; quoted ("0644") or a bare number made of octal digits (644)
 */
function optionalPermissions(source: RawObject, where: string): string | undefined {
  const value = source.permissions;
  if (value === undefined || value === null) {
    return undefined;
  }
  const text = typeof value === "number" ? String(value) : value;
  if (typeof text !== "string" || !PERMISSIONS_PATTERN.test(text)) {
    throw new ConfigError(`${where}.permissions must be an octal mode such as "0644"`);
  }
  return normalizePermissions(text);
}

export function parseConnection(raw: unknown): ConnectionConfig {
  if (!isObject(raw)) {
    throw new ConfigError("connection must be a mapping");
  }
  const host = optionalString(raw, "host", "connection");
  if (!host) {
    throw new ConfigError("connection.host is required");
  }

  return {
    host,
    username: optionalString(raw, "username", "connection"),
    password: optionalString(raw, "password", "connection"),
    passwordEnvVar: optionalString(raw, "passwordEnvVar", "connection"),
    privateKey: optionalString(raw, "privateKey", "connection"),
    privateKeyPath: optionalString(raw, "privateKeyPath", "connection"),
    privateKeyEnvVar: optionalString(raw, "privateKeyEnvVar", "connection"),
    passphrase: optionalString(raw, "passphrase", "connection"),
    sudo: optionalBoolean(raw, "sudo", "connection"),
    maxSessions: optionalInteger(raw, "maxSessions", "connection"),
  };
}

/**
 * Fields left out of the manifest are computed: the host decides them
 */
function parseDesiredAttributes(raw: RawObject, where: string): DesiredAttributes {
  const path = optionalString(raw, "path", where);
  if (!path) {
    throw new ConfigError(`${where}.path is required`);
  }
  if (!path.startsWith("/")) {
    throw new ConfigError(`${where}.path must be absolute, got ${path}`);
  }

  return {
    path,
    owner: fromOptional(optionalInteger(raw, "owner", where)),
    ownerName: fromOptional(optionalString(raw, "ownerName", where)),
    group: fromOptional(optionalInteger(raw, "group", where)),
    groupName: fromOptional(optionalString(raw, "groupName", where)),
    permissions: fromOptional(optionalPermissions(raw, where)),
  };
}

export function parseResource(raw: unknown, index: number): ResourceDeclaration {
  const where = `resources[${index}]`;
  if (!isObject(raw)) {
    throw new ConfigError(`${where} must be a mapping`);
  }

  const attributes = parseDesiredAttributes(raw, where);

  switch (raw.type) {
    case ResourceKind.FILE: {
      const content = optionalString(raw, "content", where);
      if (content === undefined) {
        throw new ConfigError(`${where}.content is required for files`);
      }
      return {
        kind: ResourceKind.FILE,
        desired: {
          ...attributes,
          content,
          ensureDir: fromOptional(optionalBoolean(raw, "ensureDir", where), unset()),
        },
      };
    }
    case ResourceKind.FOLDER:
      return { kind: ResourceKind.FOLDER, desired: attributes };
    default:
      throw new ConfigError(`${where}.type must be "file" or "folder"`);
  }
}

/**
 * Validate a whole manifest document
 */
export function parseManifest(doc: unknown): Manifest {
  if (!isObject(doc)) {
    throw new ConfigError("manifest must be a mapping with connection and resources");
  }

  const connection = parseConnection(doc.connection);
  const rawResources = doc.resources ?? [];
  if (!Array.isArray(rawResources)) {
    throw new ConfigError("resources must be a list");
  }

  const resources = rawResources.map((entry: unknown, index) => parseResource(entry, index));

  const seen = new Set<string>();
  for (const resource of resources) {
    if (seen.has(resource.desired.path)) {
      throw new ConfigError(`duplicate resource path ${resource.desired.path}`);
    }
    seen.add(resource.desired.path);
  }

  return { connection, resources };
}
