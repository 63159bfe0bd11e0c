import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { createRequire } from "node:module";
import * as sqlJs from "sql.js";
import type { Database } from "sql.js";
import { EnsembleError, errorMessage } from "../errors.js";
import { logWarning } from "../log.js";
import type { Message } from "../state/types.js";
import { messageSchema, type HistoryStore } from "./types.js";

export const IN_MEMORY_DB = ":memory:";

/**
 * Attempts to locate sql-wasm.wasm in multiple candidate locations.
 * Order:
 *   1. Adjacent to the running JS (dist/)
 *   2. Via require.resolve from this file's directory
 *   3. node_modules/sql.js/dist/ relative to cwd
 */
function locateSqlWasm(filename: string): string {
  const here = path.dirname(fileURLToPath(import.meta.url));
  const localCandidate = path.join(here, filename);
  if (fs.existsSync(localCandidate)) return localCandidate;

  try {
    const require = createRequire(import.meta.url);
    const resolved = require.resolve(`sql.js/dist/${filename}`);
    if (fs.existsSync(resolved)) return resolved;
  } catch (err) {
    logWarning(`sql.js wasm not resolvable from ${here}: ${errorMessage(err)}`);
  }

  // sql.js reports its own error if this one is missing too
  return path.resolve(process.cwd(), "node_modules", "sql.js", "dist", filename);
}

async function openDb(dbPath: string): Promise<Database> {
  const SQL = await sqlJs.default({
    locateFile: (filename: string) => locateSqlWasm(filename)
  }).catch((err: unknown) => {
    throw new EnsembleError("HISTORY_STORE", "Failed to initialize sql.js (missing/invalid wasm?)", {
      err: errorMessage(err)
    });
  });
  if (dbPath !== IN_MEMORY_DB && fs.existsSync(dbPath)) {
    return new SQL.Database(fs.readFileSync(dbPath));
  }
  return new SQL.Database();
}

function migrate(db: Database): void {
  db.run(`
    CREATE TABLE IF NOT EXISTS messages (
      seq INTEGER PRIMARY KEY AUTOINCREMENT,
      role TEXT NOT NULL,
      content TEXT NOT NULL,
      agent TEXT,
      timestamp TEXT NOT NULL,
      pinned INTEGER NOT NULL DEFAULT 0
    );
  `);
}

function rowToMessage(row: Record<string, unknown>): Message {
  const parsed = messageSchema.parse({
    role: row.role,
    content: row.content,
    timestamp: row.timestamp,
    ...(typeof row.agent === "string" && { agent: row.agent }),
    ...(row.pinned === 1 && { pinned: true })
  });
  const message: Message = { role: parsed.role, content: parsed.content, timestamp: parsed.timestamp };
  if (parsed.agent !== undefined) message.agent = parsed.agent;
  if (parsed.pinned !== undefined) message.pinned = parsed.pinned;
  return message;
}

/**
 * History store persisted in a SQLite file through sql.js.
 *
 * If sql.js cannot start, the store enters degraded mode and keeps
 * messages in memory for the rest of the process.
 */
export class SqliteHistoryStore implements HistoryStore {
  private readonly dbPath: string;
  private db: Database | null = null;
  private fallback: Message[] = [];
  private _degraded = false;
  private _degradedReason?: string;

  constructor(dbPath: string = IN_MEMORY_DB) {
    this.dbPath = dbPath;
  }

  static async open(dbPath: string = IN_MEMORY_DB): Promise<SqliteHistoryStore> {
    const store = new SqliteHistoryStore(dbPath);
    await store.init();
    return store;
  }

  get isDegraded(): boolean {
    return this._degraded;
  }

  get degradedReason(): string | undefined {
    return this._degradedReason;
  }

  /**
   * Returns true on success, false on degraded mode.
   */
  async init(): Promise<boolean> {
    try {
      if (this.dbPath !== IN_MEMORY_DB) {
        fs.mkdirSync(path.dirname(this.dbPath), { recursive: true });
      }
      this.db = await openDb(this.dbPath);
      migrate(this.db);
      this.flush();
      this._degraded = false;
      return true;
    } catch (err) {
      this._degraded = true;
      this._degradedReason = errorMessage(err);
      logWarning(`history store init failed (degraded mode): ${this._degradedReason}`);
      return false;
    }
  }

  async append(message: Message): Promise<void> {
    if (this._degraded) {
      this.fallback.push({ ...message });
      return;
    }
    const db = this.requireDb();
    db.run(
      `INSERT INTO messages (role, content, agent, timestamp, pinned) VALUES (?, ?, ?, ?, ?)`,
      [message.role, message.content, message.agent ?? null, message.timestamp, message.pinned ? 1 : 0]
    );
    this.flush();
  }

  async load(): Promise<Message[]> {
    if (this._degraded) {
      return this.fallback.map((m) => ({ ...m }));
    }
    const db = this.requireDb();
    const stmt = db.prepare(`SELECT role, content, agent, timestamp, pinned FROM messages ORDER BY seq ASC`);
    const messages: Message[] = [];
    try {
      while (stmt.step()) {
        messages.push(rowToMessage(stmt.getAsObject()));
      }
    } finally {
      stmt.free();
    }
    return messages;
  }

  async clear(): Promise<void> {
    if (this._degraded) {
      this.fallback = [];
      return;
    }
    this.requireDb().run(`DELETE FROM messages`);
    this.flush();
  }

  close(): void {
    this.db?.close();
    this.db = null;
  }

  private requireDb(): Database {
    if (!this.db) {
      throw new EnsembleError("HISTORY_STORE", "SqliteHistoryStore not initialized");
    }
    return this.db;
  }

  private flush(): void {
    if (!this.db || this.dbPath === IN_MEMORY_DB) return;
    fs.writeFileSync(this.dbPath, Buffer.from(this.db.export()));
  }
}
