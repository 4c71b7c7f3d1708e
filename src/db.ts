import Database from 'better-sqlite3';
import path from 'path';
import type { MessageStorage, PushNotificationConfigStorage, TaskQueryOptions, TaskStorage } from './storage.js';
import { applyTaskEvent, viewTask } from './storage.js';
import { InvalidAgentResponseError } from './errors.js';
import { taskIdOf, type Message, type PushNotificationConfig, type Task, type TaskEvent } from './types.js';

let db: Database.Database | undefined;

export function getDb(): Database.Database {
  if (!db) {
    const dbPath = process.env.AGENT_HUB_DB || path.join(process.cwd(), 'agent-hub.db');
    db = openDb(dbPath);
  }
  return db;
}

export function initDb(dbPath?: string): Database.Database {
  db = openDb(dbPath || ':memory:');
  return db;
}

export function closeDb(): void {
  if (db) {
    db.close();
    db = undefined;
  }
}

function openDb(dbPath: string): Database.Database {
  const d = new Database(dbPath);
  d.pragma('journal_mode = WAL');
  d.pragma('foreign_keys = ON');
  initSchema(d);
  return d;
}

function initSchema(d: Database.Database): void {
  d.exec(`
    CREATE TABLE IF NOT EXISTS tasks (
      id TEXT PRIMARY KEY,
      context_id TEXT NOT NULL,
      state TEXT NOT NULL,
      task_json TEXT NOT NULL,
      created_at INTEGER NOT NULL,
      updated_at INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS messages (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      context_id TEXT NOT NULL,
      message_id TEXT NOT NULL,
      message_json TEXT NOT NULL,
      created_at INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS push_configs (
      task_id TEXT NOT NULL,
      config_id TEXT NOT NULL,
      config_json TEXT NOT NULL,
      created_at INTEGER NOT NULL,
      PRIMARY KEY (task_id, config_id)
    );

    CREATE INDEX IF NOT EXISTS idx_tasks_context ON tasks(context_id);
    CREATE INDEX IF NOT EXISTS idx_messages_context ON messages(context_id, id);
  `);
}

interface TaskRow {
  id: string;
  context_id: string;
  state: string;
  task_json: string;
  created_at: number;
  updated_at: number;
}

interface JsonRow {
  json: string;
}

function rowToTask(row: TaskRow): Task {
  return JSON.parse(row.task_json) as Task;
}

/** One JSON document per task. Each event is merged inside a transaction. */
export class SqliteTaskStorage implements TaskStorage {
  constructor(private readonly d: Database.Database = getDb()) {}

  async get(taskId: string, options?: TaskQueryOptions): Promise<Task | null> {
    const row = this.d.prepare<[string], TaskRow>('SELECT * FROM tasks WHERE id = ?').get(taskId);
    return row ? viewTask(rowToTask(row), options) : null;
  }

  async getAll(taskIds: readonly string[], options?: TaskQueryOptions): Promise<Task[]> {
    if (taskIds.length === 0) return [];
    const placeholders = taskIds.map(() => '?').join(',');
    const rows = this.d
      .prepare<string[], TaskRow>(`SELECT * FROM tasks WHERE id IN (${placeholders}) ORDER BY created_at ASC, id ASC`)
      .all(...taskIds);
    return rows.map((row) => viewTask(rowToTask(row), options));
  }

  async getByContext(contextId: string, options?: TaskQueryOptions): Promise<Task[]> {
    const rows = this.d
      .prepare<[string], TaskRow>('SELECT * FROM tasks WHERE context_id = ? ORDER BY created_at ASC, id ASC')
      .all(contextId);
    return rows.map((row) => viewTask(rowToTask(row), options));
  }

  async update(event: TaskEvent): Promise<void> {
    const taskId = taskIdOf(event);
    const tx = this.d.transaction(() => {
      const row = this.d.prepare<[string], TaskRow>('SELECT * FROM tasks WHERE id = ?').get(taskId);
      const next = applyTaskEvent(row ? rowToTask(row) : null, event);
      const now = Date.now();
      this.d.prepare(`
        INSERT INTO tasks (id, context_id, state, task_json, created_at, updated_at)
        VALUES (?, ?, ?, ?, ?, ?)
        ON CONFLICT(id) DO UPDATE SET
          context_id = excluded.context_id,
          state = excluded.state,
          task_json = excluded.task_json,
          updated_at = excluded.updated_at
      `).run(next.id, next.contextId, next.status.state, JSON.stringify(next), now, now);
    });
    tx();
  }

  async delete(taskId: string): Promise<void> {
    this.d.prepare('DELETE FROM tasks WHERE id = ?').run(taskId);
  }
}

export class SqliteMessageStorage implements MessageStorage {
  constructor(private readonly d: Database.Database = getDb()) {}

  async save(message: Message): Promise<void> {
    if (!message.contextId) {
      throw new InvalidAgentResponseError('Message must carry a contextId to be stored');
    }
    this.insert(message.contextId, message);
  }

  async getByContext(contextId: string): Promise<Message[]> {
    return this.d
      .prepare<[string], JsonRow>('SELECT message_json AS json FROM messages WHERE context_id = ? ORDER BY id ASC')
      .all(contextId)
      .map((row) => JSON.parse(row.json) as Message);
  }

  async deleteByContext(contextId: string): Promise<void> {
    this.d.prepare('DELETE FROM messages WHERE context_id = ?').run(contextId);
  }

  async replaceByContext(contextId: string, messages: readonly Message[]): Promise<void> {
    const tx = this.d.transaction(() => {
      this.d.prepare('DELETE FROM messages WHERE context_id = ?').run(contextId);
      for (const message of messages) this.insert(contextId, message);
    });
    tx();
  }

  private insert(contextId: string, message: Message): void {
    this.d.prepare(`
      INSERT INTO messages (context_id, message_id, message_json, created_at)
      VALUES (?, ?, ?, ?)
    `).run(contextId, message.messageId, JSON.stringify(message), Date.now());
  }
}

export class SqlitePushNotificationConfigStorage implements PushNotificationConfigStorage {
  constructor(private readonly d: Database.Database = getDb()) {}

  async save(taskId: string, config: PushNotificationConfig): Promise<PushNotificationConfig> {
    const stored: PushNotificationConfig = { ...config, id: config.id ?? taskId };
    this.d.prepare(`
      INSERT INTO push_configs (task_id, config_id, config_json, created_at)
      VALUES (?, ?, ?, ?)
      ON CONFLICT(task_id, config_id) DO UPDATE SET config_json = excluded.config_json
    `).run(taskId, stored.id, JSON.stringify(stored), Date.now());
    return stored;
  }

  async getAll(taskId: string): Promise<PushNotificationConfig[]> {
    return this.d
      .prepare<[string], JsonRow>('SELECT config_json AS json FROM push_configs WHERE task_id = ? ORDER BY created_at ASC, rowid ASC')
      .all(taskId)
      .map((row) => JSON.parse(row.json) as PushNotificationConfig);
  }

  async delete(taskId: string, configId?: string): Promise<void> {
    if (configId === undefined) {
      this.d.prepare('DELETE FROM push_configs WHERE task_id = ?').run(taskId);
      return;
    }
    this.d.prepare('DELETE FROM push_configs WHERE task_id = ? AND config_id = ?').run(taskId, configId);
  }
}
