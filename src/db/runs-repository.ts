/**
 * Runs repository - one row per orchestrated release run
 */

import type { Database } from 'better-sqlite3';
import type { FailurePolicy, RunId, RunRecord, RunReport, TagRef } from '../models/index.js';
import { RunRecordSchema } from '../models/index.js';
import { type Result, Ok, Err, errorMessage } from '../models/index.js';

export interface RunRow {
  id: string;
  tag_ref: string;
  policy: string;
  started_at: number;
  finished_at: number | null;
  succeeded: number | null;
  report_json: string | null;
}

function rowToRecord(row: RunRow): Result<RunRecord, string> {
  try {
    const parsed = RunRecordSchema.safeParse({
      id: row.id,
      tagRef: row.tag_ref,
      policy: row.policy,
      startedAt: row.started_at,
      finishedAt: row.finished_at,
      succeeded: row.succeeded === null ? null : row.succeeded === 1,
      report: row.report_json ? JSON.parse(row.report_json) : null,
    });
    if (!parsed.success) {
      return Err(`Invalid run record: ${parsed.error.message}`);
    }
    return Ok(parsed.data);
  } catch (error) {
    return Err(`Failed to parse run row: ${errorMessage(error)}`);
  }
}

export interface CreateRunParams {
  id: RunId;
  tagRef: TagRef;
  policy: FailurePolicy;
  startedAt: number;
}

export class RunsRepository {
  constructor(private readonly db: Database) {}

  create(params: CreateRunParams): Result<void, string> {
    try {
      this.db
        .prepare(
          `INSERT INTO runs (id, tag_ref, policy, started_at)
           VALUES (@id, @tagRef, @policy, @startedAt)`
        )
        .run(params);
      return Ok(undefined);
    } catch (error) {
      return Err(`Failed to create run: ${errorMessage(error)}`);
    }
  }

  complete(report: RunReport): Result<void, string> {
    try {
      const result = this.db
        .prepare(
          `UPDATE runs
           SET finished_at = @finishedAt, succeeded = @succeeded, report_json = @reportJson
           WHERE id = @id`
        )
        .run({
          id: report.runId,
          finishedAt: report.finishedAt,
          succeeded: report.succeeded ? 1 : 0,
          reportJson: JSON.stringify(report),
        });
      if (result.changes === 0) {
        return Err(`Run not found: ${report.runId}`);
      }
      return Ok(undefined);
    } catch (error) {
      return Err(`Failed to complete run: ${errorMessage(error)}`);
    }
  }

  getById(id: string): Result<RunRecord | null, string> {
    const row = this.db.prepare('SELECT * FROM runs WHERE id = ?').get(id) as RunRow | undefined;
    return row ? rowToRecord(row) : Ok(null);
  }

  listRecent(limit: number = 20, tagRef?: string): Result<RunRecord[], string> {
    const rows = (
      tagRef === undefined
        ? this.db.prepare('SELECT * FROM runs ORDER BY started_at DESC LIMIT ?').all(limit)
        : this.db.prepare('SELECT * FROM runs WHERE tag_ref = ? ORDER BY started_at DESC LIMIT ?').all(tagRef, limit)
    ) as RunRow[];

    const records: RunRecord[] = [];
    for (const row of rows) {
      const result = rowToRecord(row);
      if (!result.ok) {
        return Err(result.error);
      }
      records.push(result.value);
    }
    return Ok(records);
  }
}
