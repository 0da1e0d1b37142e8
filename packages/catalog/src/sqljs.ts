// packages/catalog/src/sqljs.ts
// Kysely's SqliteDialect over sql.js (SQLite compiled to wasm, in process).
// A file is read into memory once; nothing is ever written back, so the
// catalog stays read-only whatever the queries do.
import { readFile } from 'node:fs/promises';
import initSqlJs, { type Database, type SqlValue } from 'sql.js';
import type { SqliteDatabase, SqliteStatement } from 'kysely';

export function toSqlValue(v: unknown): SqlValue {
  if (v === null || v === undefined) return null;
  if (typeof v === 'number' || typeof v === 'string' || v instanceof Uint8Array) return v;
  if (typeof v === 'boolean') return v ? 1 : 0;
  if (typeof v === 'bigint') return Number(v);
  if (v instanceof Date) return v.toISOString();
  throw new TypeError(`unsupported SQLite parameter of type ${typeof v}`);
}

class SqlJsStatement implements SqliteStatement {
  readonly reader: boolean;

  constructor(private readonly db: Database, private readonly sql: string) {
    const shape = db.prepare(sql);
    try {
      this.reader = shape.getColumnNames().length > 0;
    } finally {
      shape.free();
    }
  }

  all(parameters: ReadonlyArray<unknown>): unknown[] {
    return [...this.iterate(parameters)];
  }

  *iterate(parameters: ReadonlyArray<unknown>): IterableIterator<unknown> {
    const stmt = this.db.prepare(this.sql);
    try {
      stmt.bind(parameters.map(toSqlValue));
      while (stmt.step()) yield stmt.getAsObject();
    } finally {
      stmt.free();
    }
  }

  run(parameters: ReadonlyArray<unknown>): { changes: number; lastInsertRowid: number } {
    const stmt = this.db.prepare(this.sql);
    try {
      stmt.run(parameters.map(toSqlValue));
    } finally {
      stmt.free();
    }
    const changes = this.db.getRowsModified();
    const rowid = this.db.exec('SELECT last_insert_rowid()')[0]?.values[0]?.[0];
    return { changes, lastInsertRowid: typeof rowid === 'number' ? rowid : 0 };
  }
}

export class SqlJsDatabase implements SqliteDatabase {
  constructor(readonly db: Database) {}

  prepare(sql: string): SqliteStatement {
    return new SqlJsStatement(this.db, sql);
  }

  close(): void {
    this.db.close();
  }
}

/** Opens `path` (or an empty database for ':memory:'). A missing file is an error. */
export async function openSqlJs(path: string): Promise<Database> {
  const SQL = await initSqlJs();
  const data = path === ':memory:' ? null : await readFile(path);
  return new SQL.Database(data);
}
