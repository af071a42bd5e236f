/**
 * Configuration Manager
 * Loads and saves manifest files
 */

import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import yaml from "js-yaml";
import { logger } from "../utils/logger.js";
import { ConfigError, RemoteFsError, describeError } from "../errors.js";
import { parseManifest } from "./manifest.js";
import type { Manifest } from "./types.js";

/**
 * Configuration Manager class
 */
export class ConfigManager {
  private configPath: string;

  /**
   * @param configPath Manifest location; defaults to ~/.remotefs/manifest.yaml
   */
  constructor(configPath?: string) {
    this.configPath = configPath ? path.resolve(configPath) : ConfigManager.getDefaultConfigPath();
  }

  public static getDefaultConfigPath(): string {
    return path.join(os.homedir(), ".remotefs", "manifest.yaml");
  }

  public getConfigPath(): string {
    return this.configPath;
  }

  /**
   * Read, parse and validate the manifest
   */
  public async load(): Promise<Manifest> {
    let fileContent: string;
    try {
      fileContent = await fs.readFile(this.configPath, "utf-8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        throw new ConfigError(`Manifest not found: ${this.configPath}`, { cause: error });
      }
      logger.error("Failed to read manifest", { path: this.configPath, error: describeError(error) });
      throw new ConfigError(`Failed to read manifest: ${describeError(error)}`, { cause: error });
    }

    return this.parse(fileContent);
  }

  /**
   * Parse manifest text; exposed for callers that already hold the YAML
   */
  public parse(fileContent: string): Manifest {
    try {
      const manifest = parseManifest(yaml.load(fileContent));
      logger.info("Manifest loaded successfully", {
        path: this.configPath,
        resources: manifest.resources.length,
      });
      return manifest;
    } catch (error) {
      if (error instanceof RemoteFsError) {
        throw error;
      }
      // js-yaml syntax errors
      throw new ConfigError(`Invalid manifest ${this.configPath}: ${describeError(error)}`, { cause: error });
    }
  }

  /**
   * Write a manifest document as YAML
   */
  public async save(document: Record<string, unknown>): Promise<void> {
    try {
      await fs.mkdir(path.dirname(this.configPath), { recursive: true });

      const yamlContent = yaml.dump(document, {
        indent: 2,
        lineWidth: 100,
        noRefs: true,
      });

      await fs.writeFile(this.configPath, yamlContent, "utf-8");
      logger.info("Manifest saved successfully", { path: this.configPath });
    } catch (error) {
      logger.error("Failed to save manifest", { path: this.configPath, error: describeError(error) });
      throw new ConfigError(`Failed to save manifest: ${describeError(error)}`, { cause: error });
    }
  }
}
