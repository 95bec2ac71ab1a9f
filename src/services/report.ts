/**
 * Human-readable rendering of a run report
 */

import type { BuildOutcome, EventRecord, RunRecord, RunReport } from '../models/index.js';

const STATUS_LABEL: Record<BuildOutcome['status'], string> = {
  success: 'ok',
  provisionFailed: 'PROVISION FAILED',
  buildFailed: 'BUILD FAILED',
  artifactMissing: 'ARTIFACT MISSING',
  uploadFailed: 'UPLOAD FAILED',
  cancelled: 'cancelled',
};

function pad(value: string, width: number): string {
  return value.length >= width ? value : value + ' '.repeat(width - value.length);
}

function firstLine(text: string | undefined): string {
  return text?.split(/\r?\n/).find((line) => line.trim().length > 0)?.trim() ?? '';
}

export function formatReport(report: RunReport): string {
  const outcomes = Object.values(report.outcomes);
  const nameWidth = Math.max(8, ...outcomes.map((outcome) => outcome.artifactName.length));
  const lines: string[] = [];

  lines.push(`Release ${report.tagRef} (run ${report.runId}, ${report.policy})`);
  for (const outcome of outcomes) {
    const target = `${outcome.platformOS}/${outcome.architecture}`;
    let line = `  ${pad(outcome.artifactName, nameWidth)}  ${pad(target, 14)}  ${STATUS_LABEL[outcome.status]}`;
    if (outcome.status !== 'success') {
      line += ` at ${outcome.stage}`;
      const detail = firstLine(outcome.diagnostics);
      if (detail) {
        line += `: ${detail}`;
      }
    }
    lines.push(line);
  }

  const failed = outcomes.filter((outcome) => outcome.status !== 'success').length;
  lines.push(
    report.succeeded
      ? `All ${outcomes.length} target(s) published.`
      : `${failed} of ${outcomes.length} target(s) did not publish.`
  );
  if (report.releaseAssets) {
    lines.push(`Release assets: ${report.releaseAssets.join(', ')}`);
  }
  return lines.join('\n');
}

export function formatHistory(records: readonly RunRecord[]): string {
  if (records.length === 0) {
    return 'No runs recorded.';
  }
  return records
    .map((record) => {
      const state = record.succeeded === null ? 'running' : record.succeeded ? 'succeeded' : 'failed';
      const when = new Date(record.startedAt).toISOString();
      const targets = record.report ? Object.keys(record.report.outcomes).length : 0;
      return `${record.id}  ${when}  ${record.tagRef}  ${record.policy}  ${state}  ${targets} target(s)`;
    })
    .join('\n');
}

export function formatEvents(events: readonly EventRecord[]): string {
  return events
    .map((event) => {
      const when = new Date(event.ts).toISOString();
      return `${when}  ${event.artifactName}  ${event.fromState} -> ${event.toState}`;
    })
    .join('\n');
}
