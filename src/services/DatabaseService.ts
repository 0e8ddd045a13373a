import { Injectable, ProviderScope } from "@tsed/di";
import { $log } from "@tsed/logger";
import { BetterSQLite3Database, drizzle } from "drizzle-orm/better-sqlite3";
import fs from "fs";
import path from "path";
import Database from "better-sqlite3";
import * as schema from "../db/schema";
import { DB_PATH, IN_MEMORY_DB } from "../config";

export type MoviesDatabase = BetterSQLite3Database<typeof schema>;

/**
 * Owns the single SQLite connection of the process. The connection opens on
 * first use and is closed by the injector on shutdown.
 */
@Injectable({
  scope: ProviderScope.SINGLETON
})
export class DatabaseService {
    private readonly DB_PATH = DB_PATH;

    private dbInstance: MoviesDatabase | null = null;
    private dbConnection: Database.Database | null = null;

    getRawDb(): Database.Database {
        if (!this.dbConnection) {
            if (!IN_MEMORY_DB) {
                fs.mkdirSync(path.dirname(this.DB_PATH), { recursive: true });
            }
            this.dbConnection = new Database(this.DB_PATH);
            this.dbConnection.pragma("foreign_keys = ON");
            $log.debug(`Opened database ${this.DB_PATH}`);
        }
        return this.dbConnection;
    }

    getDb(): MoviesDatabase {
        if (!this.dbInstance) {
            this.dbInstance = drizzle(this.getRawDb(), { schema });
        }
        return this.dbInstance;
    }

    /**
     * Runs `work` inside BEGIN/COMMIT, rolling back when it throws.
     */
    transaction<T>(work: () => T): T {
        const db = this.getRawDb();
        db.exec("BEGIN");
        try {
            const result = work();
            db.exec("COMMIT");
            return result;
        } catch (e) {
            db.exec("ROLLBACK");
            throw e;
        }
    }

    closeConnections(): void {
        if (this.dbConnection) {
            this.dbConnection.close();
            this.dbConnection = null;
            this.dbInstance = null;
            $log.debug(`Closed database ${this.DB_PATH}`);
        }
    }

    $onDestroy(): void {
        this.closeConnections();
    }
}
