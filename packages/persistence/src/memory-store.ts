import Database from "better-sqlite3";
import { WayfarerError } from "@wayfarer/types";
import type {
  AgentOutputRecord,
  JsonObject,
  JsonValue,
  Logger,
  MemoryStore,
  MessageMetadata,
  MessageRecord,
  MessageRole,
  OutputKind,
  SessionCreateOutcome,
  SessionId,
  SessionStats,
  Timestamp,
} from "@wayfarer/types";

const DAY_MS = 24 * 60 * 60 * 1000;

export interface SQLiteMemoryStoreOptions {
  logger: Logger;
  /** Clock for every stored timestamp. Defaults to the system clock. */
  now?: () => Date;
}

/**
 * SQLite-backed implementation of MemoryStore.
 *
 * Three append-only tables: `sessions`, `messages` and `agent_outputs`.
 * Rows are never updated except `sessions.last_activity`. Row ids are
 * insertion order, and every listing is ordered by them.
 *
 * better-sqlite3 is synchronous, so each call runs to completion before
 * another can touch the handle; compound writes use a transaction.
 */
export class SQLiteMemoryStore implements MemoryStore {
  private readonly db: Database.Database;
  private readonly log: Logger;
  private readonly now: () => Date;

  /** @throws WayfarerError STORAGE_UNAVAILABLE when the database cannot be opened. */
  constructor(dbPath: string, options: SQLiteMemoryStoreOptions) {
    this.log = options.logger;
    this.now = options.now ?? (() => new Date());
    this.db = openDatabase(dbPath);
    this.log.info("Memory store opened", { dbPath });
  }

  createSession(id: SessionId, metadata: JsonObject = {}): SessionCreateOutcome {
    try {
      const ts = this.timestamp();
      const info = this.db
        .prepare<[string, string, string, string]>(`
          INSERT OR IGNORE INTO sessions (session_id, created_at, last_activity, metadata)
          VALUES (?, ?, ?, ?)
        `)
        .run(id, ts, ts, JSON.stringify(metadata));

      if (info.changes === 0) {
        this.log.debug("Session already exists", { sessionId: id });
        return "existing";
      }
      this.log.info("Session created", { sessionId: id });
      return "created";
    } catch (err) {
      this.fault("createSession", err, { sessionId: id });
      return "failed";
    }
  }

  appendMessage(
    sessionId: SessionId,
    role: MessageRole,
    content: string,
    metadata?: MessageMetadata
  ): boolean {
    try {
      const ts = this.timestamp();
      const insert = this.db.prepare<[string, string, string, string | null, string]>(`
        INSERT INTO messages (session_id, role, content, metadata, timestamp)
        VALUES (?, ?, ?, ?, ?)
      `);
      const newest = this.db.prepare<[string], { ts: string | null }>(
        "SELECT MAX(timestamp) AS ts FROM messages WHERE session_id = ?"
      );
      // MAX keeps last_activity monotonic even if the clock steps back.
      const touch = this.db.prepare<[string, string]>(`
        UPDATE sessions SET last_activity = MAX(last_activity, ?)
        WHERE session_id = ?
      `);

      this.db.transaction(() => {
        // Message timestamps never decrease within a session.
        const latest = newest.get(sessionId)?.ts ?? null;
        const stamp = latest !== null && latest > ts ? latest : ts;
        insert.run(sessionId, role, content, metadata ? JSON.stringify(metadata) : null, stamp);
        touch.run(stamp, sessionId);
      })();

      this.log.debug("Message added", { sessionId, role });
      return true;
    } catch (err) {
      this.fault("appendMessage", err, { sessionId, role });
      return false;
    }
  }

  appendAgentOutput(
    sessionId: SessionId,
    agentName: string,
    taskName: string,
    payload: unknown,
    kindHint: OutputKind = "json"
  ): boolean {
    try {
      const { kind, text } = encodePayload(payload, kindHint);
      this.db
        .prepare<[string, string, string, OutputKind, string, string]>(`
          INSERT INTO agent_outputs
            (session_id, agent_name, task_name, output_type, output_data, timestamp)
          VALUES (?, ?, ?, ?, ?, ?)
        `)
        .run(sessionId, agentName, taskName, kind, text, this.timestamp());

      this.log.debug("Agent output stored", { sessionId, agentName, taskName, kind });
      return true;
    } catch (err) {
      this.fault("appendAgentOutput", err, { sessionId, agentName, taskName });
      return false;
    }
  }

  listAgentOutputs(sessionId: SessionId, agentName?: string): AgentOutputRecord[] {
    try {
      const rows =
        agentName === undefined
          ? this.db
              .prepare<[string], AgentOutputRow>(`
                SELECT agent_name, task_name, output_type, output_data, timestamp
                FROM agent_outputs
                WHERE session_id = ?
                ORDER BY id ASC
              `)
              .all(sessionId)
          : this.db
              .prepare<[string, string], AgentOutputRow>(`
                SELECT agent_name, task_name, output_type, output_data, timestamp
                FROM agent_outputs
                WHERE session_id = ? AND agent_name = ?
                ORDER BY id ASC
              `)
              .all(sessionId, agentName);

      return rows.map((row) => this.decodeOutput(row));
    } catch (err) {
      this.fault("listAgentOutputs", err, { sessionId, agentName });
      return [];
    }
  }

  latestAgentOutput(sessionId: SessionId, agentName: string): AgentOutputRecord | null {
    try {
      const row = this.db
        .prepare<[string, string], AgentOutputRow>(`
          SELECT agent_name, task_name, output_type, output_data, timestamp
          FROM agent_outputs
          WHERE session_id = ? AND agent_name = ?
          ORDER BY id DESC
          LIMIT 1
        `)
        .get(sessionId, agentName);

      return row ? this.decodeOutput(row) : null;
    } catch (err) {
      this.fault("latestAgentOutput", err, { sessionId, agentName });
      return null;
    }
  }

  listMessages(sessionId: SessionId, limit: number): MessageRecord[] {
    // SQLite treats a negative LIMIT as "no limit".
    const bound = Number.isFinite(limit) ? Math.max(0, Math.floor(limit)) : -1;
    try {
      const rows = this.db
        .prepare<[string, number], MessageRow>(`
          SELECT role, content, metadata, timestamp
          FROM messages
          WHERE session_id = ?
          ORDER BY id DESC
          LIMIT ?
        `)
        .all(sessionId, bound);

      // Newest N were fetched; hand them back oldest first.
      return rows.reverse().map((row): MessageRecord => ({
        role: row.role === "assistant" ? "assistant" : "user",
        content: row.content,
        metadata: parseMetadata(row.metadata),
        timestamp: row.timestamp,
      }));
    } catch (err) {
      this.fault("listMessages", err, { sessionId, limit });
      return [];
    }
  }

  deleteSession(sessionId: SessionId): boolean {
    try {
      const existed = this.cascadeDelete(sessionId);
      this.log.info("Session cleared", { sessionId, existed });
      return existed;
    } catch (err) {
      this.fault("deleteSession", err, { sessionId });
      return false;
    }
  }

  sessionStats(sessionId: SessionId): SessionStats | null {
    try {
      const messageCount =
        this.db
          .prepare<[string], CountRow>("SELECT COUNT(*) AS count FROM messages WHERE session_id = ?")
          .get(sessionId)?.count ?? 0;
      const agentOutputCount =
        this.db
          .prepare<[string], CountRow>("SELECT COUNT(*) AS count FROM agent_outputs WHERE session_id = ?")
          .get(sessionId)?.count ?? 0;
      const session = this.db
        .prepare<[string], SessionRow>(
          "SELECT created_at, last_activity FROM sessions WHERE session_id = ?"
        )
        .get(sessionId);

      return {
        sessionId,
        messageCount,
        agentOutputCount,
        createdAt: session?.created_at ?? null,
        lastActivity: session?.last_activity ?? null,
      };
    } catch (err) {
      this.fault("sessionStats", err, { sessionId });
      return null;
    }
  }

  purgeOlderThan(days: number): number {
    try {
      const cutoff = new Date(this.now().getTime() - days * DAY_MS).toISOString();
      const stale = this.db
        .prepare<[string], { session_id: string }>(
          "SELECT session_id FROM sessions WHERE last_activity < ?"
        )
        .all(cutoff)
        .map((row) => row.session_id);

      this.db.transaction(() => {
        for (const sessionId of stale) this.cascadeDelete(sessionId);
      })();

      this.log.info("Cleaned up old sessions", { days, cutoff, removed: stale.length });
      return stale.length;
    } catch (err) {
      this.fault("purgeOlderThan", err, { days });
      return 0;
    }
  }

  /** Close the database connection. Idempotent. */
  close(): void {
    if (!this.db.open) return;
    this.db.close();
    this.log.info("Memory store closed");
  }

  private cascadeDelete(sessionId: SessionId): boolean {
    return this.db.transaction(() => {
      this.db.prepare<[string]>("DELETE FROM messages WHERE session_id = ?").run(sessionId);
      this.db.prepare<[string]>("DELETE FROM agent_outputs WHERE session_id = ?").run(sessionId);
      const info = this.db
        .prepare<[string]>("DELETE FROM sessions WHERE session_id = ?")
        .run(sessionId);
      return info.changes > 0;
    })();
  }

  private decodeOutput(row: AgentOutputRow): AgentOutputRecord {
    const base = {
      agentName: row.agent_name,
      taskName: row.task_name,
      timestamp: row.timestamp,
    };
    if (row.output_type !== "json") {
      return { ...base, kind: "text", data: row.output_data };
    }
    try {
      const data: JsonValue = JSON.parse(row.output_data);
      return { ...base, kind: "json", data };
    } catch {
      this.log.warn("Stored json output failed to parse; returning raw text", {
        agentName: row.agent_name,
      });
      return { ...base, kind: "text", data: row.output_data };
    }
  }

  private timestamp(): Timestamp {
    return this.now().toISOString();
  }

  private fault(operation: string, err: unknown, data: Record<string, unknown>): void {
    this.log.error(`Memory store ${operation} failed`, {
      ...data,
      error: err instanceof Error ? err.message : String(err),
    });
  }
}

/** Open the database and run schema migrations. Idempotent. */
function openDatabase(dbPath: string): Database.Database {
  let db: Database.Database | undefined;
  try {
    db = new Database(dbPath);
    db.pragma("journal_mode = WAL");
    db.pragma("foreign_keys = ON");
    db.exec(`
      CREATE TABLE IF NOT EXISTS sessions (
        session_id    TEXT PRIMARY KEY,
        created_at    TEXT NOT NULL,
        last_activity TEXT NOT NULL,
        metadata      TEXT NOT NULL DEFAULT '{}'
      );

      CREATE TABLE IF NOT EXISTS messages (
        id          INTEGER PRIMARY KEY AUTOINCREMENT,
        session_id  TEXT NOT NULL,
        role        TEXT NOT NULL CHECK (role IN ('user', 'assistant')),
        content     TEXT NOT NULL,
        metadata    TEXT,
        timestamp   TEXT NOT NULL,
        FOREIGN KEY (session_id) REFERENCES sessions(session_id)
      );

      CREATE TABLE IF NOT EXISTS agent_outputs (
        id          INTEGER PRIMARY KEY AUTOINCREMENT,
        session_id  TEXT NOT NULL,
        agent_name  TEXT NOT NULL,
        task_name   TEXT NOT NULL,
        output_type TEXT NOT NULL CHECK (output_type IN ('json', 'text')),
        output_data TEXT NOT NULL,
        timestamp   TEXT NOT NULL,
        FOREIGN KEY (session_id) REFERENCES sessions(session_id)
      );

      CREATE INDEX IF NOT EXISTS idx_messages_session
        ON messages(session_id, timestamp);
      CREATE INDEX IF NOT EXISTS idx_agent_outputs_session
        ON agent_outputs(session_id);
      CREATE INDEX IF NOT EXISTS idx_agent_outputs_agent
        ON agent_outputs(session_id, agent_name);
    `);
    return db;
  } catch (err) {
    db?.close();
    throw new WayfarerError(
      "STORAGE_UNAVAILABLE",
      `Could not open memory database at ${dbPath}`,
      err
    );
  }
}

/**
 * Structured values are always stored as json. Anything else is stored
 * as json only when asked to and when it actually parses; otherwise the
 * raw string is kept as text.
 */
export function encodePayload(
  payload: unknown,
  kindHint: OutputKind
): { kind: OutputKind; text: string } {
  if (typeof payload === "object" && payload !== null) {
    return { kind: "json", text: JSON.stringify(payload) };
  }
  const text = String(payload);
  return { kind: kindHint === "json" && parsesAsJson(text) ? "json" : "text", text };
}

function parsesAsJson(text: string): boolean {
  try {
    JSON.parse(text);
    return true;
  } catch {
    return false;
  }
}

function parseMetadata(raw: string | null): MessageMetadata {
  if (!raw) return {};
  try {
    const value: JsonValue = JSON.parse(raw);
    return typeof value === "object" && value !== null && !Array.isArray(value) ? value : {};
  } catch {
    return {};
  }
}

// ─── Internal row types ─────────────────────────────────────────────

interface AgentOutputRow {
  agent_name: string;
  task_name: string;
  output_type: string;
  output_data: string;
  timestamp: string;
}

interface MessageRow {
  role: string;
  content: string;
  metadata: string | null;
  timestamp: string;
}

interface SessionRow {
  created_at: string;
  last_activity: string;
}

interface CountRow {
  count: number;
}
