/**
 * CLI output utilities
 * Handles formatted output, spinners, and progress display
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';

import type {
  BranchResult,
  ReleaseDecision,
  ReleaseRecord,
  RunReport,
  TargetSpec,
} from '../pipeline/types.js';

/**
 * Output theme colors
 */
const theme = {
  primary: chalk.cyan,
  secondary: chalk.gray,
  success: chalk.green,
  warning: chalk.yellow,
  error: chalk.red,
  info: chalk.blue,
  highlight: chalk.bold.white,
  dim: chalk.dim,
};

/**
 * Spinner instance for progress display
 */
let spinner: Ora | null = null;

/**
 * Start a spinner with a message
 */
export function startSpinner(message: string): Ora {
  if (spinner) {
    spinner.stop();
  }
  spinner = ora({
    text: message,
    spinner: 'dots',
  }).start();
  return spinner;
}

export function updateSpinner(message: string): void {
  if (spinner) {
    spinner.text = message;
  }
}

export function succeedSpinner(message?: string): void {
  if (spinner) {
    spinner.succeed(message);
    spinner = null;
  }
}

export function failSpinner(message?: string): void {
  if (spinner) {
    spinner.fail(message);
    spinner = null;
  }
}

export function stopSpinner(): void {
  if (spinner) {
    spinner.stop();
    spinner = null;
  }
}

export function printHeader(title: string): void {
  console.log();
  console.log(theme.primary.bold(`=== ${title} ===`));
  console.log();
}

export function printSection(title: string): void {
  console.log();
  console.log(theme.highlight(`--- ${title} ---`));
}

export function printSuccess(message: string): void {
  console.log(theme.success(`[OK] ${message}`));
}

export function printWarning(message: string): void {
  console.log(theme.warning(`[WARN] ${message}`));
}

export function printError(message: string): void {
  console.log(theme.error(`[ERROR] ${message}`));
}

export function printInfo(message: string): void {
  console.log(theme.info(`[INFO] ${message}`));
}

export function printKeyValue(key: string, value: string | number | boolean): void {
  console.log(`  ${theme.secondary(key + ':')} ${value}`);
}

/**
 * Print a list item
 *
 * @param indent - Indentation level
 */
export function printListItem(item: string, indent: number = 0): void {
  const prefix = '  '.repeat(indent) + '- ';
  console.log(theme.secondary(prefix) + item);
}

/**
 * Print machine-readable output
 */
export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

/**
 * Print a table
 */
export function printTable(headers: string[], rows: string[][]): void {
  // Calculate column widths
  const widths = headers.map((h, i) => {
    const maxRow = Math.max(0, ...rows.map((r) => (r[i] || '').length));
    return Math.max(h.length, maxRow);
  });

  const headerLine = headers.map((h, i) => h.padEnd(widths[i])).join('  ');
  console.log(theme.highlight(headerLine));
  console.log(theme.dim('-'.repeat(headerLine.length)));

  for (const row of rows) {
    const rowLine = row.map((cell, i) => (cell || '').padEnd(widths[i])).join('  ');
    console.log(rowLine);
  }
}

// ─── Pipeline Output ─────────────────────────────────────

export function printDecision(decision: ReleaseDecision): void {
  printSection('Version Check');
  printKeyValue('Tip', decision.tipRevision);
  if (decision.parentRevision) printKeyValue('Parent', decision.parentRevision);
  printKeyValue('Version', decision.version || '(none)');
  printKeyValue('Previous', decision.previousVersion || '(none)');

  if (decision.shouldRelease) {
    printSuccess(`Release ${decision.version} will be cut`);
  } else {
    printInfo(`No release: ${decision.reason ?? 'version unchanged'}`);
  }
}

export function printReleaseRecord(record: ReleaseRecord): void {
  printSection('Release');
  printKeyValue('Tag', record.tag);
  printKeyValue('Title', record.title);
  if (record.htmlUrl) printKeyValue('URL', record.htmlUrl);
}

export function printTargets(targets: readonly TargetSpec[], assetName: (t: TargetSpec) => string): void {
  printTable(
    ['TRIPLE', 'STRATEGY', 'HOST', 'ASSET', 'AUX'],
    targets.map((t) => [
      t.triple,
      t.buildStrategy,
      t.host,
      assetName(t),
      t.auxDependencies.map((d) => `${d.library}:${d.architecture}`).join(', ') || '-',
    ]),
  );
}

function branchIcon(status: BranchResult['status']): string {
  return status === 'published' ? theme.success('[OK]') : theme.error('[X]');
}

export function printBranchResult(branch: BranchResult): void {
  const detail = branch.status === 'published'
    ? theme.dim(branch.assetName)
    : theme.error(`${branch.failedStage ?? 'failed'}: ${branch.error ?? 'unknown error'}`);
  console.log(`  ${branchIcon(branch.status)} ${branch.triple} ${detail}`);

  for (const candidate of branch.build.diagnostics) {
    printListItem(`found ${candidate}`, 3);
  }
}

export function printRunReport(report: RunReport): void {
  if (!report.decision.shouldRelease) {
    printInfo(`Nothing to release: ${report.decision.reason ?? 'version unchanged'}`);
    return;
  }

  if (report.release) printReleaseRecord(report.release);

  printSection('Targets');
  for (const branch of report.branches) {
    printBranchResult(branch);
  }

  const failed = report.branches.filter((b) => b.status === 'failed').length;
  console.log();
  if (report.success) {
    printSuccess(`Published ${report.artifacts.length} artifact(s)`);
  } else {
    printError(`${failed} of ${report.branches.length} target(s) failed; the release is partially published`);
  }
}
