import { Inject, Injectable } from "@tsed/di";
import { $log } from "@tsed/logger";
import { SQL, sql } from "drizzle-orm";
import { DatabaseService } from "./DatabaseService";

interface ColumnInfo {
  name: string;
}

interface IndexInfo {
  name: string;
  unique: number;
  origin: string;
}

interface ColumnMigration {
  column: string;
  statement: SQL;
}

// Files written by the single-user version have neither column.
const MOVIES_TABLE = sql`
  CREATE TABLE IF NOT EXISTS movies (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    title TEXT NOT NULL,
    year INTEGER NOT NULL,
    rating REAL NOT NULL,
    poster_url TEXT,
    user_id INTEGER REFERENCES users(id)
  )
`;

const MOVIE_COLUMN_MIGRATIONS: ColumnMigration[] = [
  { column: "poster_url", statement: sql`ALTER TABLE movies ADD COLUMN poster_url TEXT` },
  { column: "user_id", statement: sql`ALTER TABLE movies ADD COLUMN user_id INTEGER REFERENCES users(id)` },
];

@Injectable()
export class SchemaService {
  @Inject()
  private databaseService!: DatabaseService;

  /**
   * Creates missing tables and applies additive migrations. Safe to call on
   * every start: existing rows are never dropped or rewritten.
   *
   * @returns the migration steps applied, empty when the file was current
   */
  initialize(): string[] {
    const db = this.databaseService.getDb();
    const applied: string[] = [];

    db.run(sql`
      CREATE TABLE IF NOT EXISTS users (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT UNIQUE NOT NULL
      )
    `);

    db.run(MOVIES_TABLE);

    const existing = new Set(this.getColumns("movies"));
    for (const migration of MOVIE_COLUMN_MIGRATIONS) {
      if (!existing.has(migration.column)) {
        db.run(migration.statement);
        applied.push(`add movies.${migration.column}`);
      }
    }

    if (this.hasTableUniqueConstraint("movies")) {
      this.rebuildMovies();
      applied.push("rebuild movies without UNIQUE(title)");
    }

    if (!this.hasIndex("movies_title_user_id_unique")) {
      db.run(sql`CREATE UNIQUE INDEX movies_title_user_id_unique ON movies(title, user_id)`);
      applied.push("create movies_title_user_id_unique");
    }

    for (const step of applied) {
      $log.info(`Schema migration applied: ${step}`);
    }
    return applied;
  }

  /**
   * Single-user files declare `title UNIQUE` on the table, which would make a
   * title global across users. SQLite cannot drop a table constraint, so the
   * rows are copied into a table without it, ids included.
   */
  private rebuildMovies(): void {
    const db = this.databaseService.getDb();
    this.databaseService.transaction(() => {
      db.run(sql`ALTER TABLE movies RENAME TO movies_legacy`);
      db.run(MOVIES_TABLE);
      db.run(sql`
        INSERT INTO movies (id, title, year, rating, poster_url, user_id)
        SELECT id, title, year, rating, poster_url, user_id FROM movies_legacy
      `);
      db.run(sql`DROP TABLE movies_legacy`);
    });
  }

  /** True when the table carries a UNIQUE constraint in its definition. */
  hasTableUniqueConstraint(table: "users" | "movies"): boolean {
    const indexes = this.databaseService.getDb().all<IndexInfo>(sql.raw(`PRAGMA index_list(${table})`));
    return indexes.some((index) => index.unique === 1 && index.origin === "u");
  }

  getColumns(table: "users" | "movies"): string[] {
    const rows = this.databaseService.getDb().all<ColumnInfo>(sql.raw(`PRAGMA table_info(${table})`));
    return rows.map((r) => r.name);
  }

  hasIndex(name: string): boolean {
    const row = this.databaseService.getDb().get<{ n: number }>(
      sql`SELECT COUNT(*) AS n FROM sqlite_master WHERE type = 'index' AND name = ${name}`
    );
    return (row?.n ?? 0) > 0;
  }
}
