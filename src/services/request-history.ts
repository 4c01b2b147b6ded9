import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import type { OrchestrationQueue } from '../core/orchestration-queue.js';
import type { DelegateResult } from '../delegates/types.js';
import type {
  DelegateCall,
  ProgressEvent,
  RequestError,
  RequestStatus,
  RequestSnapshot,
  Turn,
} from '../types/orchestration.js';
import { toErrorMessage } from '../core/errors.js';

interface RequestRow {
  id: string;
  text: string;
  metadata_json: string | null;
  status: RequestStatus;
  result: string | null;
  error_code: string | null;
  error_reason: string | null;
  created_at: string;
  started_at: string | null;
  finished_at: string | null;
  last_seq: number;
}

interface TurnRow {
  request_id: string;
  turn_index: number;
  action: 'tool' | 'answer';
  observation: string;
  plan_json: string;
  thought: string | null;
  response_json: string;
  result_json: string | null;
  duration_ms: number | null;
  produced_at: string;
}

export type StoredRequest = RequestSnapshot;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS requests (
    id TEXT PRIMARY KEY,
    text TEXT NOT NULL,
    metadata_json TEXT,
    status TEXT NOT NULL,
    result TEXT,
    error_code TEXT,
    error_reason TEXT,
    created_at TEXT NOT NULL,
    started_at TEXT,
    finished_at TEXT,
    last_seq INTEGER NOT NULL DEFAULT 0
  );

  CREATE TABLE IF NOT EXISTS turns (
    request_id TEXT NOT NULL,
    turn_index INTEGER NOT NULL,
    action TEXT NOT NULL,
    observation TEXT NOT NULL,
    plan_json TEXT NOT NULL,
    thought TEXT,
    response_json TEXT NOT NULL,
    result_json TEXT,
    duration_ms INTEGER,
    produced_at TEXT NOT NULL,
    PRIMARY KEY (request_id, turn_index),
    FOREIGN KEY (request_id) REFERENCES requests(id) ON DELETE CASCADE
  );

  CREATE INDEX IF NOT EXISTS idx_requests_created_at ON requests(created_at);
`;

function openDatabase(location: string): Database.Database {
  if (location !== ':memory:') {
    const dir = path.dirname(path.resolve(location));
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }
  const db = new Database(location);
  db.pragma('foreign_keys = ON');
  db.exec(SCHEMA);
  return db;
}

function decodeCall(json: string): DelegateCall {
  const parsed: unknown = JSON.parse(json);
  if (typeof parsed === 'object' && parsed !== null && 'delegate' in parsed && typeof parsed.delegate === 'string') {
    const args: unknown = 'args' in parsed ? parsed.args : {};
    return {
      delegate: parsed.delegate,
      args: typeof args === 'object' && args !== null && !Array.isArray(args) ? { ...args } : {},
    };
  }
  return { delegate: 'unknown', args: {} };
}

function decodeResult(json: string | null): DelegateResult {
  const parsed: unknown = json ? JSON.parse(json) : null;
  if (typeof parsed === 'object' && parsed !== null && 'ok' in parsed) {
    if (parsed.ok === true && 'output' in parsed && typeof parsed.output === 'string') {
      return { ok: true, output: parsed.output };
    }
    if ('code' in parsed && 'message' in parsed) {
      return { ok: false, code: String(parsed.code), message: String(parsed.message) };
    }
  }
  return { ok: false, code: 'unknown', message: 'Result was not recorded.' };
}

function decodePlan(json: string): string[] {
  const parsed: unknown = JSON.parse(json);
  return Array.isArray(parsed) ? parsed.filter((step): step is string => typeof step === 'string') : [];
}

function decodeMetadata(json: string | null): Record<string, unknown> | undefined {
  if (!json) {
    return undefined;
  }
  const parsed: unknown = JSON.parse(json);
  return typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed) ? { ...parsed } : undefined;
}

function toTurn(row: TurnRow): Turn {
  const base = {
    index: row.turn_index,
    observation: row.observation,
    plan: decodePlan(row.plan_json),
    ...(row.thought ? { thought: row.thought } : {}),
    producedAt: row.produced_at,
  };
  if (row.action === 'tool') {
    return {
      ...base,
      action: 'tool',
      response: decodeCall(row.response_json),
      result: decodeResult(row.result_json),
      durationMs: row.duration_ms ?? 0,
    };
  }
  const response: unknown = JSON.parse(row.response_json);
  return { ...base, action: 'answer', response: typeof response === 'string' ? response : String(response) };
}

/**
 * SQLite-backed history of requests and their turns, fed by queue progress events.
 *
 * Writes are upserts keyed by request id and turn index, and status events carrying a `seq`
 * at or below the last stored one are ignored, so redelivered events are harmless.
 */
export class RequestHistoryStore {
  readonly #db: Database.Database;

  constructor(location = ':memory:') {
    this.#db = openDatabase(location);
  }

  /** Persist every progress event of `queue` from now on. Returns the unsubscribe function. */
  attach(queue: OrchestrationQueue): () => void {
    return queue.subscribe((event) => {
      try {
        this.record(event, queue.get(event.requestId));
      } catch (error) {
        console.error(`[RequestHistory] Failed to persist ${event.type} for ${event.requestId}: ${toErrorMessage(error)}`);
      }
    });
  }

  /** Apply one progress event. `snapshot` supplies the request input the first time it is seen. */
  record(event: ProgressEvent, snapshot?: RequestSnapshot): void {
    if (event.type === 'request.turn') {
      this.#ensureRequest(event.requestId, snapshot);
      this.#upsertTurn(event.requestId, event.turn);
      return;
    }

    this.#ensureRequest(event.requestId, snapshot);
    const row = this.#db
      .prepare<[string], Pick<RequestRow, 'last_seq'>>('SELECT last_seq FROM requests WHERE id = ?')
      .get(event.requestId);
    if (row && row.last_seq >= event.seq) {
      return;
    }

    const error: RequestError | undefined = event.error;
    this.#db
      .prepare(
        `UPDATE requests SET
           status = @status,
           result = COALESCE(@result, result),
           error_code = COALESCE(@errorCode, error_code),
           error_reason = COALESCE(@errorReason, error_reason),
           started_at = CASE WHEN @status = 'running' THEN @at ELSE started_at END,
           finished_at = CASE WHEN @status IN ('succeeded', 'failed', 'cancelled') THEN @at ELSE finished_at END,
           last_seq = @seq
         WHERE id = @id`,
      )
      .run({
        id: event.requestId,
        status: event.status,
        result: event.result ?? null,
        errorCode: error?.code ?? null,
        errorReason: error?.reason ?? null,
        at: event.at,
        seq: event.seq,
      });
  }

  getRequest(requestId: string): StoredRequest | undefined {
    const row = this.#db
      .prepare<[string], RequestRow>('SELECT * FROM requests WHERE id = ?')
      .get(requestId);
    return row ? this.#toRequest(row) : undefined;
  }

  /** Most recent first. */
  listRecent(limit = 20): StoredRequest[] {
    const rows = this.#db
      .prepare<[number], RequestRow>('SELECT * FROM requests ORDER BY created_at DESC, rowid DESC LIMIT ?')
      .all(Math.max(1, Math.floor(limit)));
    return rows.map((row) => this.#toRequest(row));
  }

  close(): void {
    this.#db.close();
  }

  #ensureRequest(requestId: string, snapshot?: RequestSnapshot): void {
    this.#db
      .prepare(
        `INSERT OR IGNORE INTO requests (id, text, metadata_json, status, created_at)
         VALUES (?, ?, ?, 'queued', ?)`,
      )
      .run(
        requestId,
        snapshot?.input.text ?? '',
        snapshot?.input.metadata ? JSON.stringify(snapshot.input.metadata) : null,
        snapshot?.createdAt ?? new Date().toISOString(),
      );
  }

  #upsertTurn(requestId: string, turn: Turn): void {
    this.#db
      .prepare(
        `INSERT OR REPLACE INTO turns
           (request_id, turn_index, action, observation, plan_json, thought, response_json, result_json, duration_ms, produced_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        requestId,
        turn.index,
        turn.action,
        turn.observation,
        JSON.stringify(turn.plan),
        turn.thought ?? null,
        JSON.stringify(turn.response),
        turn.action === 'tool' ? JSON.stringify(turn.result) : null,
        turn.action === 'tool' ? turn.durationMs : null,
        turn.producedAt,
      );
  }

  #toRequest(row: RequestRow): StoredRequest {
    const turns = this.#db
      .prepare<[string], TurnRow>('SELECT * FROM turns WHERE request_id = ? ORDER BY turn_index ASC')
      .all(row.id);
    const metadata = decodeMetadata(row.metadata_json);

    return {
      id: row.id,
      input: { text: row.text, ...(metadata ? { metadata } : {}) },
      status: row.status,
      trace: turns.map(toTurn),
      createdAt: row.created_at,
      ...(row.started_at ? { startedAt: row.started_at } : {}),
      ...(row.finished_at ? { finishedAt: row.finished_at } : {}),
      ...(row.result !== null ? { result: row.result } : {}),
      ...(row.error_code !== null
        ? { error: { code: row.error_code, reason: row.error_reason ?? '' } }
        : {}),
    };
  }
}
