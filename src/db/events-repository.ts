/**
 * Events repository - audit log of every target state transition
 */

import type { Database } from 'better-sqlite3';
import type { EventRecord, PipelineState, RunId } from '../models/index.js';
import { EventRecordSchema } from '../models/index.js';
import { type Result, Ok, Err, errorMessage } from '../models/index.js';

export interface EventRow {
  id: number;
  run_id: string;
  artifact_name: string;
  ts: number;
  from_state: string;
  to_state: string;
  payload_json: string;
}

function rowToRecord(row: EventRow): Result<EventRecord, string> {
  try {
    const parsed = EventRecordSchema.safeParse({
      id: row.id,
      runId: row.run_id,
      artifactName: row.artifact_name,
      ts: row.ts,
      fromState: row.from_state,
      toState: row.to_state,
      payload: JSON.parse(row.payload_json),
    });
    if (!parsed.success) {
      return Err(`Invalid event record: ${parsed.error.message}`);
    }
    return Ok(parsed.data);
  } catch (error) {
    return Err(`Failed to parse event row: ${errorMessage(error)}`);
  }
}

export interface CreateEventParams {
  runId: RunId;
  artifactName: string;
  fromState: PipelineState;
  toState: PipelineState;
  payload: Record<string, unknown>;
}

export class EventsRepository {
  constructor(private readonly db: Database) {}

  create(params: CreateEventParams): Result<number, string> {
    try {
      const result = this.db
        .prepare(
          `INSERT INTO events (run_id, artifact_name, ts, from_state, to_state, payload_json)
           VALUES (@runId, @artifactName, @ts, @fromState, @toState, @payloadJson)`
        )
        .run({
          runId: params.runId,
          artifactName: params.artifactName,
          ts: Date.now(),
          fromState: params.fromState,
          toState: params.toState,
          payloadJson: JSON.stringify(params.payload),
        });
      return Ok(Number(result.lastInsertRowid));
    } catch (error) {
      return Err(`Failed to create event: ${errorMessage(error)}`);
    }
  }

  listByRun(runId: RunId, artifactName?: string): Result<EventRecord[], string> {
    let query = 'SELECT * FROM events WHERE run_id = ?';
    const params: unknown[] = [runId];

    if (artifactName !== undefined) {
      query += ' AND artifact_name = ?';
      params.push(artifactName);
    }
    query += ' ORDER BY id ASC';

    const rows = this.db.prepare(query).all(...params) as EventRow[];

    const records: EventRecord[] = [];
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
