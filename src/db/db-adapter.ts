/**
 * Database Adapter
 * Uses Turso (libSQL) when configured and reachable, falls back to a local
 * SQLite file through sql.js. Both speak the same SQL, so callers only see
 * the DbClient interface.
 */

import { createClient, type Client, type Transaction } from '@libsql/client';
import initSqlJs, { type Database as SqlJsDatabase, type SqlJsStatic } from 'sql.js';
import fs from 'fs';
import path from 'path';
import type { AppConfig } from '../config/env.js';

export type SqlParam = string | number | null;
export type Row = Record<string, unknown>;

export interface ExecuteResult {
  changes: number;
  lastId?: number;
}

export interface DbExecutor {
  query(sql: string, params?: SqlParam[]): Promise<Row[]>;
  execute(sql: string, params?: SqlParam[]): Promise<ExecuteResult>;
}

export interface DbClient extends DbExecutor {
  readonly kind: 'sqlite' | 'turso';
  /** Run several statements separated by semicolons (schema creation). */
  executeRaw(sql: string): Promise<void>;
  /**
   * Run `work` inside one write transaction. Commits when it resolves,
   * rolls back and rethrows when it rejects.
   */
  transaction<T>(work: (tx: DbExecutor) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}

// ============================================
// SQLite (sql.js)
// ============================================

let sqlJs: Promise<SqlJsStatic> | null = null;

function loadSqlJs(): Promise<SqlJsStatic> {
  if (!sqlJs) {
    sqlJs = initSqlJs();
  }
  return sqlJs;
}

class SqliteClient implements DbClient {
  readonly kind = 'sqlite';
  private inTransaction = false;

  constructor(
    private readonly db: SqlJsDatabase,
    private readonly filePath: string | null
  ) {}

  async query(sql: string, params: SqlParam[] = []): Promise<Row[]> {
    const stmt = this.db.prepare(sql);
    try {
      if (params.length > 0) {
        stmt.bind(params);
      }
      const rows: Row[] = [];
      while (stmt.step()) {
        rows.push(stmt.getAsObject());
      }
      return rows;
    } finally {
      stmt.free();
    }
  }

  async execute(sql: string, params: SqlParam[] = []): Promise<ExecuteResult> {
    this.db.run(sql, params);
    const changes = this.db.getRowsModified();
    const lastIdResult = this.db.exec('SELECT last_insert_rowid() AS id');
    const lastId = lastIdResult[0]?.values[0]?.[0];

    if (!this.inTransaction) this.save();
    return { changes, lastId: typeof lastId === 'number' ? lastId : undefined };
  }

  async executeRaw(sql: string): Promise<void> {
    this.db.exec(sql);
    if (!this.inTransaction) this.save();
  }

  async transaction<T>(work: (tx: DbExecutor) => Promise<T>): Promise<T> {
    if (this.inTransaction) {
      throw new Error('Nested transactions are not supported');
    }

    this.db.run('BEGIN');
    this.inTransaction = true;
    try {
      const result = await work(this);
      this.db.run('COMMIT');
      this.inTransaction = false;
      this.save();
      return result;
    } catch (error) {
      this.inTransaction = false;
      this.db.run('ROLLBACK');
      throw error;
    }
  }

  async close(): Promise<void> {
    this.save();
    this.db.close();
  }

  /**
   * Save SQLite database to file (no-op for in-memory databases)
   */
  private save(): void {
    if (!this.filePath) return;

    const dataDir = path.dirname(this.filePath);
    if (!fs.existsSync(dataDir)) {
      fs.mkdirSync(dataDir, { recursive: true });
    }
    fs.writeFileSync(this.filePath, Buffer.from(this.db.export()));
  }
}

/**
 * Open a sql.js database. Without a path the database lives in memory only.
 */
export async function createSqliteClient(filePath?: string): Promise<DbClient> {
  const SQL = await loadSqlJs();
  const resolved = filePath ? path.resolve(filePath) : null;

  const db = resolved && fs.existsSync(resolved)
    ? new SQL.Database(fs.readFileSync(resolved))
    : new SQL.Database();
  db.run('PRAGMA foreign_keys = ON');

  return new SqliteClient(db, resolved);
}

// ============================================
// Turso (libSQL)
// ============================================

class TursoExecutor implements DbExecutor {
  constructor(private readonly target: Client | Transaction) {}

  async query(sql: string, params: SqlParam[] = []): Promise<Row[]> {
    const result = await this.target.execute({ sql, args: params });
    return result.rows;
  }

  async execute(sql: string, params: SqlParam[] = []): Promise<ExecuteResult> {
    const result = await this.target.execute({ sql, args: params });
    const lastId = result.lastInsertRowid === undefined ? undefined : Number(result.lastInsertRowid);
    return { changes: result.rowsAffected, lastId };
  }
}

class TursoClient extends TursoExecutor implements DbClient {
  readonly kind = 'turso';

  constructor(private readonly client: Client) {
    super(client);
  }

  async executeRaw(sql: string): Promise<void> {
    await this.client.executeMultiple(sql);
  }

  async transaction<T>(work: (tx: DbExecutor) => Promise<T>): Promise<T> {
    const tx = await this.client.transaction('write');
    try {
      const result = await work(new TursoExecutor(tx));
      await tx.commit();
      return result;
    } catch (error) {
      await tx.rollback();
      throw error;
    } finally {
      tx.close();
    }
  }

  async close(): Promise<void> {
    this.client.close();
  }
}

export function createTursoClient(url: string, authToken?: string): DbClient {
  return new TursoClient(createClient({ url, authToken }));
}

// ============================================
// Selection
// ============================================

/**
 * Prefer Turso when a URL is configured and answers; otherwise use the
 * local SQLite file.
 */
export async function openDatabase(config: Pick<AppConfig, 'databasePath' | 'turso'>): Promise<DbClient> {
  if (config.turso) {
    const turso = createTursoClient(config.turso.url, config.turso.authToken);
    try {
      console.log('Attempting to use Turso...');
      await turso.query('SELECT 1');
      await turso.execute('PRAGMA foreign_keys = ON');
      console.log('Using Turso successfully');
      return turso;
    } catch (error) {
      console.warn('Turso connection failed, falling back to SQLite:', error);
      await turso.close();
    }
  }

  console.log(`Using SQLite at ${config.databasePath}`);
  return createSqliteClient(config.databasePath);
}
