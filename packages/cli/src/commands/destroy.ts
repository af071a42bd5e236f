/**
 * Destroy Command
 * Remove every declared resource from the host
 */

import ora from 'ora';
import chalk from 'chalk';
import inquirer from 'inquirer';
import { logger, describeError, ResourceKind } from '@remotefs/core';
import { loadManifest, withConverger, type ManifestOptions } from '../utils/session.js';
import { formatOutcomes, hasFailures, summarize } from '../utils/output.js';

interface DestroyOptions extends ManifestOptions {
  yes?: boolean;
}

export async function destroyCommand(options: DestroyOptions): Promise<void> {
  try {
    const manifest = await loadManifest(options);

    if (!options.yes) {
      const folders = manifest.resources.filter((resource) => resource.kind === ResourceKind.FOLDER).length;
      const { confirm } = await inquirer.prompt<{ confirm: boolean }>([
        {
          type: 'confirm',
          name: 'confirm',
          message: chalk.red(
            `Remove ${manifest.resources.length} resource(s) from ${manifest.connection.host}` +
              (folders > 0 ? ` (${folders} folder(s) recursively)` : '') +
              '? This action cannot be undone.'
          ),
          default: false,
        },
      ]);

      if (!confirm) {
        console.log(chalk.yellow('\n⚠️  Destroy cancelled\n'));
        return;
      }
    }

    const spinner = ora(`Removing ${manifest.resources.length} resource(s)...`).start();
    const outcomes = await withConverger(manifest, (converger) => converger.destroy(manifest.resources)).catch(
      (error: unknown) => {
        spinner.fail(chalk.red(`Could not reach ${manifest.connection.host}`));
        throw error;
      }
    );

    if (hasFailures(outcomes)) {
      spinner.warn(chalk.yellow(`Destroy finished with errors: ${summarize(outcomes)}`));
      process.exitCode = 1;
    } else {
      spinner.succeed(chalk.green(`Destroy complete: ${summarize(outcomes)}`));
    }

    console.log(formatOutcomes(outcomes));
  } catch (error) {
    logger.error('Destroy failed', { error: describeError(error) });
    console.log(chalk.red(`\n❌ ${describeError(error)}\n`));
    process.exitCode = 1;
  }
}
