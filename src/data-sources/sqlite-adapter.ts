/**
 * sql.js (WASM SQLite) behind a small synchronous API. The whole database
 * lives in memory; file-backed databases are written out by `persist()`.
 */
import initSqlJs, {
  type Database as SqlJsDatabase,
  type SqlJsStatic,
  type SqlValue,
  type Statement,
} from "sql.js";
import fs from "fs";
import path from "path";

export type Row = Record<string, SqlValue>;

const SQLITE_MAGIC = "SQLite format 3";
const MIN_FILE_BYTES = 100;

let loading: Promise<SqlJsStatic> | null = null;
let loaded: SqlJsStatic | null = null;

/** Load the WASM module once; concurrent callers share the same load. */
export function ensureSqlJs(): Promise<SqlJsStatic> {
  loading ??= initSqlJs().then((mod) => {
    loaded = mod;
    return mod;
  });
  return loading;
}

function requireSqlJs(): SqlJsStatic {
  if (!loaded) throw new Error("Call ensureSqlJs() before opening a database");
  return loaded;
}

/** Refuse to open anything that is not a SQLite file, so it is never overwritten. */
function assertSqliteFile(filePath: string, bytes: Buffer): void {
  if (bytes.length < MIN_FILE_BYTES) {
    throw new Error(
      `Database file too small to be valid SQLite: ${filePath} (${bytes.length} bytes)`,
    );
  }
  if (bytes.toString("utf8", 0, SQLITE_MAGIC.length) !== SQLITE_MAGIC) {
    throw new Error(`Not a valid SQLite database (bad header): ${filePath}`);
  }
}

function writeAtomically(filePath: string, data: Uint8Array): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const tmpPath = `${filePath}.tmp`;
  fs.writeFileSync(tmpPath, data);
  fs.renameSync(tmpPath, filePath);
}

export class PreparedStatement {
  constructor(
    private readonly owner: SqliteDatabase,
    private readonly stmt: Statement,
  ) {}

  private with<T>(params: SqlValue[], body: (stmt: Statement) => T): T {
    try {
      if (params.length > 0) this.stmt.bind(params);
      return body(this.stmt);
    } finally {
      this.stmt.reset();
    }
  }

  /** INSERT/UPDATE/DELETE. */
  run(...params: SqlValue[]): { changes: number } {
    this.with(params, (stmt) => stmt.step());
    this.owner.markDirty();
    return { changes: this.owner.rowsModified() };
  }

  get(...params: SqlValue[]): Row | undefined {
    return this.with(params, (stmt) => (stmt.step() ? stmt.getAsObject() : undefined));
  }

  all(...params: SqlValue[]): Row[] {
    return this.with(params, (stmt) => {
      const rows: Row[] = [];
      while (stmt.step()) rows.push(stmt.getAsObject());
      return rows;
    });
  }
}

export class SqliteDatabase {
  private readonly statements = new Map<string, Statement>();
  private dirty = false;

  private constructor(
    private readonly db: SqlJsDatabase,
    private readonly filePath: string | null,
  ) {}

  /** Open `filePath`, or start an empty database there if it does not exist yet. */
  static open(filePath: string): SqliteDatabase {
    const SQL = requireSqlJs();
    if (!fs.existsSync(filePath)) {
      return new SqliteDatabase(new SQL.Database(), filePath);
    }
    const bytes = fs.readFileSync(filePath);
    assertSqliteFile(filePath, bytes);
    return new SqliteDatabase(new SQL.Database(new Uint8Array(bytes)), filePath);
  }

  static inMemory(): SqliteDatabase {
    const SQL = requireSqlJs();
    return new SqliteDatabase(new SQL.Database(), null);
  }

  /** Schema version recorded in `PRAGMA user_version`. */
  get userVersion(): number {
    const row = this.prepare("PRAGMA user_version").get();
    return typeof row?.user_version === "number" ? row.user_version : 0;
  }

  /**
   * Apply the migrations past the recorded schema version, in order, as one
   * transaction. Migration `i` brings the schema to version `i + 1`.
   * Returns how many ran.
   */
  migrate(migrations: readonly string[]): number {
    const from = this.userVersion;
    const pending = migrations.slice(from);
    if (pending.length === 0) return 0;

    this.transaction<void>(() => {
      for (const sql of pending) this.db.run(sql);
      this.db.run(`PRAGMA user_version = ${migrations.length}`);
    })();
    return pending.length;
  }

  /** Run DDL or several statements at once. */
  sqlExec(sql: string): void {
    this.db.run(sql);
    this.dirty = true;
  }

  /** Compiled statements are cached per SQL text until `close()`. */
  prepare(sql: string): PreparedStatement {
    let stmt = this.statements.get(sql);
    if (!stmt) {
      stmt = this.db.prepare(sql);
      this.statements.set(sql, stmt);
    }
    return new PreparedStatement(this, stmt);
  }

  /** Wrap `fn` in BEGIN/COMMIT; any throw rolls the whole batch back. */
  transaction<T>(fn: (args: T) => void): (args: T) => void {
    return (args: T) => {
      this.db.run("BEGIN");
      try {
        fn(args);
      } catch (err) {
        this.db.run("ROLLBACK");
        throw err;
      }
      this.db.run("COMMIT");
      this.dirty = true;
    };
  }

  rowsModified(): number {
    return this.db.getRowsModified();
  }

  markDirty(): void {
    this.dirty = true;
  }

  private dropStatements(): void {
    for (const stmt of this.statements.values()) stmt.free();
    this.statements.clear();
  }

  /** Write to disk via a temp file and rename. No-op in memory or when clean. */
  persist(): void {
    if (this.filePath === null || !this.dirty) return;
    // export() reopens the connection, invalidating compiled statements
    this.dropStatements();
    writeAtomically(this.filePath, this.db.export());
    this.dirty = false;
  }

  close(): void {
    this.persist();
    this.dropStatements();
    this.db.close();
  }
}
