/**
 * Init Command
 * Write a starter manifest
 */

import chalk from 'chalk';
import fs from 'node:fs/promises';
import { ConfigManager, logger, describeError } from '@remotefs/core';

interface InitOptions {
  file?: string;
  host: string;
  username?: string;
  sudo?: boolean;
  force?: boolean;
}

/**
 * Starter document: one folder and one file inside it. Resources are applied
 * concurrently, so the file creates its own parent directory.
 */
export function starterManifest(options: InitOptions): Record<string, unknown> {
  return {
    connection: {
      host: options.host,
      ...(options.username ? { username: options.username } : {}),
      passwordEnvVar: 'REMOTEFS_PASSWORD',
      sudo: options.sudo ?? false,
      maxSessions: 10,
    },
    resources: [
      { type: 'folder', path: '/tmp/remotefs' },
      { type: 'file', path: '/tmp/remotefs/hello.txt', content: 'hello\n', ensureDir: true, permissions: '0644' },
    ],
  };
}

export async function initCommand(options: InitOptions): Promise<void> {
  try {
    const configManager = new ConfigManager(options.file);
    const target = configManager.getConfigPath();

    if (!options.force) {
      const exists = await fs
        .access(target)
        .then(() => true)
        .catch(() => false);
      if (exists) {
        console.log(chalk.yellow(`\n⚠️  ${target} already exists (use --force to overwrite)\n`));
        process.exitCode = 1;
        return;
      }
    }

    await configManager.save(starterManifest(options));
    console.log(chalk.green(`\n✅ Manifest written to ${target}\n`));
  } catch (error) {
    logger.error('Init failed', { error: describeError(error) });
    console.log(chalk.red(`\n❌ ${describeError(error)}\n`));
    process.exitCode = 1;
  }
}
