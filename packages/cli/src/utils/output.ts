/**
 * Output formatting for reconciliation outcomes
 */

import chalk from 'chalk';
import { OutcomeStatus, type PlannedChange, type ResourceOutcome } from '@remotefs/core';

const STATUS_COLORS: Record<OutcomeStatus, (text: string) => string> = {
  [OutcomeStatus.CREATED]: chalk.green,
  [OutcomeStatus.UPDATED]: chalk.yellow,
  [OutcomeStatus.UNCHANGED]: chalk.gray,
  [OutcomeStatus.DELETED]: chalk.red,
  [OutcomeStatus.PRESENT]: chalk.green,
  [OutcomeStatus.ABSENT]: chalk.gray,
  [OutcomeStatus.WILL_CREATE]: chalk.green,
  [OutcomeStatus.WILL_UPDATE]: chalk.yellow,
  [OutcomeStatus.FAILED]: chalk.red,
};

/**
 * One line per planned mutation; file content is summarised by size
 */
export function describeChange(change: PlannedChange): string {
  if (change.attribute === 'content') {
    return `content: ${Buffer.byteLength(change.from)} -> ${Buffer.byteLength(change.to)} bytes`;
  }
  return `${change.attribute}: ${change.from} -> ${change.to}`;
}

/**
 * Render outcomes as an indented report
 */
export function formatOutcomes(outcomes: ResourceOutcome[]): string {
  const lines: string[] = [];

  for (const outcome of outcomes) {
    const color = STATUS_COLORS[outcome.status];
    lines.push(`${color(outcome.status.padEnd(12))}${outcome.kind.padEnd(8)}${outcome.path}`);

    for (const change of outcome.changes ?? []) {
      lines.push(chalk.gray(`    ${describeChange(change)}`));
    }

    if (outcome.state && (outcome.status === OutcomeStatus.PRESENT || outcome.status === OutcomeStatus.CREATED)) {
      const { owner, ownerName, group, groupName, permissions } = outcome.state;
      lines.push(chalk.gray(`    owner ${ownerName} (${owner})  group ${groupName} (${group})  mode ${permissions}`));
    }

    if (outcome.error) {
      for (const errorLine of outcome.error.split('\n')) {
        lines.push(chalk.red(`    ${errorLine}`));
      }
    }
  }

  return lines.join('\n');
}

/**
 * Count outcomes per status, e.g. "2 created, 1 failed"
 */
export function summarize(outcomes: ResourceOutcome[]): string {
  const counts = new Map<OutcomeStatus, number>();
  for (const outcome of outcomes) {
    counts.set(outcome.status, (counts.get(outcome.status) ?? 0) + 1);
  }
  if (counts.size === 0) {
    return 'no resources';
  }
  return [...counts.entries()].map(([status, count]) => `${count} ${status}`).join(', ');
}

export function hasFailures(outcomes: ResourceOutcome[]): boolean {
  return outcomes.some((outcome) => outcome.status === OutcomeStatus.FAILED);
}
