/**
 * CLI Dashboard Renderer
 *
 * Renders scan results, warnings and the unified catalog as coloured text.
 */

import chalk from 'chalk';
import type { ScanWarning, WarningKind } from '../errors.js';
import type { MachineSummary, UnifiedEntry } from '../sync/aggregator.js';

const WARNING_LABELS: Record<WarningKind, string> = {
  'invalid-declaration': 'Invalid declaration',
  'unreadable-directory': 'Unreadable directory',
  'duplicate-id': 'Duplicate id',
  'missing-root': 'Missing root',
  'missing-screenshot': 'Missing screenshot',
  'unparsable-remote': 'Unparsable remote',
  'invalid-state-document': 'Invalid state document',
  'invalid-activity-log': 'Invalid activity log',
  'remote-unavailable': 'Remote unavailable',
};

/**
 * Format a date for display
 */
export function formatDate(isoDate: string | null, now: Date = new Date()): string {
  if (!isoDate) return '';

  const date = new Date(isoDate);
  const diffMs = now.getTime() - date.getTime();
  const diffMins = Math.floor(diffMs / 60000);
  const diffHours = Math.floor(diffMs / 3600000);
  const diffDays = Math.floor(diffMs / 86400000);

  if (diffMins < 1) return 'just now';
  if (diffMins < 60) return `${diffMins}m ago`;
  if (diffHours < 24) return `${diffHours}h ago`;
  if (diffDays < 7) return `${diffDays}d ago`;

  // Format as date
  return date.toLocaleDateString('en-US', { month: 'short', day: 'numeric', timeZone: 'UTC' });
}

/**
 * Truncate text to fit width
 */
export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  return text.slice(0, maxLength - 3) + '...';
}

/**
 * Render warnings. Missing screenshots are only counted.
 */
export function renderWarnings(warnings: readonly ScanWarning[]): string {
  if (warnings.length === 0) return '';

  const lines: string[] = [''];
  const screenshots = warnings.filter(warning => warning.kind === 'missing-screenshot').length;

  for (const warning of warnings) {
    if (warning.kind === 'missing-screenshot') continue;
    lines.push(chalk.yellow(`  ⚠ ${WARNING_LABELS[warning.kind]}: `) + chalk.gray(warning.path));
    lines.push(chalk.gray(`    ${truncate(warning.message, 100)}`));
  }

  if (screenshots > 0) {
    lines.push(chalk.gray(`  ${screenshots} project(s) without a screenshot`));
  }

  lines.push('');
  return lines.join('\n');
}

/**
 * Render scan results
 */
export function renderScanResults(discovered: number, scanned: number, skipped: number): string {
  const lines: string[] = [];

  lines.push('');
  lines.push(chalk.cyan.bold('Scan Complete'));
  lines.push('');
  lines.push(chalk.white(`  Directories scanned: ${scanned}`));
  lines.push(chalk.gray(`  Directories skipped: ${skipped}`));
  lines.push(chalk.green(`  Projects discovered: ${discovered}`));
  lines.push('');

  return lines.join('\n');
}

function renderEntry(entry: UnifiedEntry, now: Date): string {
  const marker = entry.presence === 'cloned' ? chalk.green.bold('●') : chalk.blue('○');
  const title = chalk.white.bold(truncate(entry.title, 28).padEnd(28));
  const where = entry.identity
    ? chalk.gray(truncate(`${entry.identity.owner}/${entry.identity.name}`, 30).padEnd(30))
    : chalk.gray('(local only)'.padEnd(30));
  const activity = chalk.gray(formatDate(entry.mostRecentActivity, now));
  const stale = entry.stale ? chalk.yellow(' stale') : '';

  return `  ${marker} ${title} ${where} ${activity}${stale}`;
}

/**
 * Render the unified catalog
 */
export function renderCatalog(
  entries: readonly UnifiedEntry[],
  machines: readonly MachineSummary[],
  now: Date = new Date()
): string {
  const lines: string[] = [];

  lines.push('');
  lines.push(chalk.cyan.bold('DEVSHELF'));
  lines.push(
    chalk.gray(
      '  Machines: ' +
        machines
          .map(machine => `${machine.machineName}${machine.isLocal ? ' (this)' : ''}${machine.stale ? ' ⚠ stale' : ''}`)
          .join(', ')
    )
  );
  lines.push('');

  if (entries.length === 0) {
    lines.push(chalk.yellow('  No projects found.'));
    lines.push(chalk.gray('  Add a catalogue.json to a project folder under one of your roots.'));
    lines.push('');
    return lines.join('\n');
  }

  for (const entry of entries) {
    lines.push(renderEntry(entry, now));
  }

  const cloned = entries.filter(entry => entry.presence === 'cloned').length;
  lines.push('');
  lines.push(chalk.gray(`  ${cloned} cloned, ${entries.length - cloned} available on remote`));
  lines.push('');

  return lines.join('\n');
}

/**
 * Render the generation summary
 */
export function renderGenerateSummary(outputPath: string, entries: readonly UnifiedEntry[]): string {
  const local = entries.filter(entry => entry.localPath !== null).length;
  const lines = [
    '',
    chalk.green(`✓ Dashboard generated: ${outputPath}`),
    chalk.gray(`  ${local} local project(s), ${entries.length} catalog entries`),
    '',
  ];
  return lines.join('\n');
}
