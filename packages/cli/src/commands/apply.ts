/**
 * Apply Command
 * Create missing resources and update drifted ones
 */

import ora from 'ora';
import chalk from 'chalk';
import { logger, describeError } from '@remotefs/core';
import { loadManifest, withConverger, type ManifestOptions } from '../utils/session.js';
import { formatOutcomes, hasFailures, summarize } from '../utils/output.js';

export async function applyCommand(options: ManifestOptions): Promise<void> {
  try {
    const manifest = await loadManifest(options);

    const spinner = ora(`Reconciling ${manifest.resources.length} resource(s) on ${manifest.connection.host}...`).start();
    const outcomes = await withConverger(manifest, (converger) => converger.apply(manifest.resources)).catch(
      (error: unknown) => {
        spinner.fail(chalk.red(`Could not reach ${manifest.connection.host}`));
        throw error;
      }
    );

    if (hasFailures(outcomes)) {
      spinner.warn(chalk.yellow(`Apply finished with errors: ${summarize(outcomes)}`));
      process.exitCode = 1;
    } else {
      spinner.succeed(chalk.green(`Apply complete: ${summarize(outcomes)}`));
    }

    console.log(formatOutcomes(outcomes));
  } catch (error) {
    logger.error('Apply failed', { error: describeError(error) });
    console.log(chalk.red(`\n❌ ${describeError(error)}\n`));
    process.exitCode = 1;
  }
}
