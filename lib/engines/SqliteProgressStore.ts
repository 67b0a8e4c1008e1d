/**
 * Backend SQLite (WAL) del registro de progreso, para quien gestiona muchas tareas
 * desde un mismo proceso y prefiere una base de datos a archivos sueltos.
 *
 * Tablas: tasks (geometría de la tarea), done_chunks (un row por chunk escrito) y
 * attempts (historial de intentos fallidos por chunk). save() reemplaza el conjunto
 * de chunks done dentro de una transacción.
 *
 * @module engines/SqliteProgressStore
 */

import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { logger } from '../utils';
import type { AttemptEntry, ProgressStore } from './ProgressStore';
import type { ProgressRecord, TaskKey } from './types';

const log = logger.child('SqliteProgressStore');

const CREATE_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS tasks (
    task_id TEXT PRIMARY KEY,
    url TEXT NOT NULL,
    destination TEXT NOT NULL,
    total_size INTEGER NOT NULL,
    chunk_size INTEGER NOT NULL,
    updated_at INTEGER NOT NULL
);
CREATE TABLE IF NOT EXISTS done_chunks (
    task_id TEXT NOT NULL,
    chunk_index INTEGER NOT NULL,
    PRIMARY KEY (task_id, chunk_index),
    FOREIGN KEY (task_id) REFERENCES tasks(task_id) ON DELETE CASCADE
);
CREATE TABLE IF NOT EXISTS attempts (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    task_id TEXT NOT NULL,
    chunk_index INTEGER NOT NULL,
    attempt_number INTEGER NOT NULL,
    timestamp INTEGER NOT NULL,
    error TEXT
);
CREATE INDEX IF NOT EXISTS idx_attempts_task ON attempts(task_id);
`;

interface TaskRow {
  task_id: string;
  url: string;
  destination: string;
  total_size: number;
  chunk_size: number;
  updated_at: number;
}

interface AttemptRow {
  chunk_index: number;
  attempt_number: number;
  timestamp: number;
  error: string | null;
}

export interface StoredAttempt {
  chunkIndex: number;
  attempt: number;
  timestamp: number;
  error: string | null;
}

function prepareStatements(db: Database.Database) {
  return {
    getTask: db.prepare<[string], TaskRow>('SELECT * FROM tasks WHERE task_id = ?'),
    getDone: db.prepare<[string], { chunk_index: number }>(
      'SELECT chunk_index FROM done_chunks WHERE task_id = ? ORDER BY chunk_index'
    ),
    upsertTask: db.prepare<[TaskRow]>(`
      INSERT INTO tasks (task_id, url, destination, total_size, chunk_size, updated_at)
      VALUES (@task_id, @url, @destination, @total_size, @chunk_size, @updated_at)
      ON CONFLICT(task_id) DO UPDATE SET
        url = excluded.url,
        destination = excluded.destination,
        total_size = excluded.total_size,
        chunk_size = excluded.chunk_size,
        updated_at = excluded.updated_at
    `),
    clearDone: db.prepare<[string]>('DELETE FROM done_chunks WHERE task_id = ?'),
    insertDone: db.prepare<[string, number]>(
      'INSERT OR IGNORE INTO done_chunks (task_id, chunk_index) VALUES (?, ?)'
    ),
    deleteTask: db.prepare<[string]>('DELETE FROM tasks WHERE task_id = ?'),
    deleteAttempts: db.prepare<[string]>('DELETE FROM attempts WHERE task_id = ?'),
    insertAttempt: db.prepare<[string, number, number, number, string]>(
      'INSERT INTO attempts (task_id, chunk_index, attempt_number, timestamp, error) VALUES (?, ?, ?, ?, ?)'
    ),
    getAttempts: db.prepare<[string], AttemptRow>(
      'SELECT chunk_index, attempt_number, timestamp, error FROM attempts WHERE task_id = ? ORDER BY id'
    ),
  };
}

export class SqliteProgressStore implements ProgressStore {
  private readonly db: Database.Database;
  private readonly statements: ReturnType<typeof prepareStatements>;

  /** dbPath ':memory:' abre una base de datos en memoria (tests). */
  constructor(dbPath: string, private readonly now: () => number = Date.now) {
    if (dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');
    this.db.pragma('foreign_keys = ON');
    this.db.exec(CREATE_SCHEMA_SQL);

    this.statements = prepareStatements(this.db);
    log.debug(`SqliteProgressStore abierto en ${dbPath}`);
  }

  async load(key: TaskKey): Promise<ProgressRecord | null> {
    const row = this.statements.getTask.get(key.id);
    if (!row) return null;
    const done = this.statements.getDone.all(key.id).map(r => r.chunk_index);
    return {
      version: 1,
      taskId: row.task_id,
      url: row.url,
      destination: row.destination,
      totalSize: row.total_size,
      chunkSize: row.chunk_size,
      done,
      updatedAt: row.updated_at,
    };
  }

  async save(record: ProgressRecord): Promise<void> {
    this.db.transaction((r: ProgressRecord) => {
      this.statements.upsertTask.run({
        task_id: r.taskId,
        url: r.url,
        destination: r.destination,
        total_size: r.totalSize,
        chunk_size: r.chunkSize,
        updated_at: r.updatedAt,
      });
      this.statements.clearDone.run(r.taskId);
      for (const index of r.done) {
        this.statements.insertDone.run(r.taskId, index);
      }
    })(record);
  }

  async remove(key: TaskKey): Promise<void> {
    this.db.transaction((id: string) => {
      this.statements.deleteTask.run(id);
      this.statements.deleteAttempts.run(id);
    })(key.id);
  }

  recordAttempt(key: TaskKey, entry: AttemptEntry): void {
    this.statements.insertAttempt.run(key.id, entry.chunkIndex, entry.attempt, this.now(), entry.error);
  }

  getAttempts(key: TaskKey): StoredAttempt[] {
    return this.statements.getAttempts.all(key.id).map(row => ({
      chunkIndex: row.chunk_index,
      attempt: row.attempt_number,
      timestamp: row.timestamp,
      error: row.error,
    }));
  }

  close(): void {
    this.db.close();
  }
}
