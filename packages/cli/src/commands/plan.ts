/**
 * Plan Command
 * Show what apply would change without touching the host
 */

import ora from 'ora';
import chalk from 'chalk';
import { logger, describeError } from '@remotefs/core';
import { loadManifest, withConverger, type ManifestOptions } from '../utils/session.js';
import { formatOutcomes, hasFailures, summarize } from '../utils/output.js';

export async function planCommand(options: ManifestOptions): Promise<void> {
  try {
    const manifest = await loadManifest(options);

    const spinner = ora(`Reading ${manifest.resources.length} resource(s) from ${manifest.connection.host}...`).start();
    const outcomes = await withConverger(manifest, (converger) => converger.plan(manifest.resources)).catch(
      (error: unknown) => {
        spinner.fail(chalk.red(`Could not reach ${manifest.connection.host}`));
        throw error;
      }
    );

    if (hasFailures(outcomes)) {
      spinner.warn(chalk.yellow(`Plan incomplete: ${summarize(outcomes)}`));
      process.exitCode = 1;
    } else {
      spinner.succeed(chalk.cyan(`Plan: ${summarize(outcomes)}`));
    }

    console.log(formatOutcomes(outcomes));
  } catch (error) {
    logger.error('Plan failed', { error: describeError(error) });
    console.log(chalk.red(`\n❌ ${describeError(error)}\n`));
    process.exitCode = 1;
  }
}
