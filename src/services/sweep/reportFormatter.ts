import { ActionSummary, RunReport } from './types.js';

/**
 * Plain-text rendering of a run report for the terminal
 */
export function formatReport(report: RunReport): string {
  const lines: string[] = [];
  const mode = `${report.mode.runMode}, ${report.mode.dryRun ? 'dry run' : 'live'}`;

  lines.push(`Run finished (${mode}) in ${((report.finishedAt - report.startedAt) / 1000).toFixed(1)}s`);
  if (report.repair) {
    const { repair } = report;
    lines.push(
      `Store repaired: ${repair.problems.join('; ')} ` +
        `(${repair.restoredShows} shows restored, ${repair.removedRecords} records removed` +
        `${repair.invalidated.length > 0 ? `, ${repair.invalidated.join(', ')} cache cleared` : ''})`
    );
  }
  if (report.scan) {
    lines.push(`Library: ${report.scan.shows} shows from ${report.scan.source}, ${report.scan.deactivated} gone`);
  }

  section(lines, report.mode.dryRun ? 'Would act on' : 'Acted on', report.acted.map(describeAction));
  section(lines, 'Kept', report.kept.map((entry) => `${entry.title} (${entry.outcome})`));
  section(
    lines,
    'Failed',
    report.failed.map((entry) => {
      const line = `${entry.title}: ${entry.requestedAction} failed: ${entry.error ?? 'unknown error'}`;
      return entry.completedSteps.length > 0 ? `${line} (already done: ${entry.completedSteps.join('; ')})` : line;
    })
  );
  section(lines, 'Skipped', report.skipped.map((entry) => `${entry.title}: ${entry.error}`));
  section(lines, 'Excluded', report.excluded.map((entry) => `${entry.title}: ${entry.reasons.join(', ')}`));
  section(
    lines,
    'Unresolved identities',
    report.unresolved.map((entry) => `${entry.sourceName}:${entry.sourceId} ${entry.title ?? ''}`.trimEnd())
  );

  const { totals } = report;
  lines.push(
    `Totals: ${totals.shows} shows, ${totals.eligible} eligible, ${totals.acted} acted, ${totals.kept} kept, ` +
      `${totals.failed} failed, ${totals.skipped} skipped, ${totals.excluded} excluded, ${totals.unresolved} unresolved`
  );

  if (report.cancelled) {
    lines.push('Run was cancelled; remaining shows were not processed');
  }
  if (report.fatalError) {
    lines.push(`Run aborted: ${report.fatalError}`);
  }

  return lines.join('\n');
}

function describeAction(entry: ActionSummary): string {
  return `${entry.title}: ${entry.action}${entry.steps.length > 0 ? ` (${entry.steps.length} steps)` : ''}`;
}

function section(lines: string[], title: string, entries: string[]): void {
  if (entries.length === 0) {
    return;
  }
  lines.push(`${title} (${entries.length}):`);
  for (const entry of entries) {
    lines.push(`  - ${entry}`);
  }
}
