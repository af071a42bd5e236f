/**
 * Show Command
 * Print the observed owner, group and mode of every declared resource
 */

import chalk from 'chalk';
import { logger, describeError } from '@remotefs/core';
import { loadManifest, withConverger, type ManifestOptions } from '../utils/session.js';
import { formatOutcomes, hasFailures } from '../utils/output.js';

export async function showCommand(options: ManifestOptions): Promise<void> {
  try {
    const manifest = await loadManifest(options);
    const outcomes = await withConverger(manifest, (converger) => converger.inspect(manifest.resources));

    console.log(chalk.bold.cyan(`\n📂 ${manifest.connection.host}\n`));
    console.log(formatOutcomes(outcomes));

    if (hasFailures(outcomes)) {
      process.exitCode = 1;
    }
  } catch (error) {
    logger.error('Show failed', { error: describeError(error) });
    console.log(chalk.red(`\n❌ ${describeError(error)}\n`));
    process.exitCode = 1;
  }
}
