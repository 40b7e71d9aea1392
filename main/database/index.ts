import Database from "better-sqlite3";
import { drizzle } from "drizzle-orm/better-sqlite3";
import type { BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import path from "node:path";
import fs from "node:fs";
import { ErrorCode, ServiceError } from "@shared/errors";
import { getLogger } from "../services/logger";
import * as schema from "./schema";

export type DrizzleDB = BetterSQLite3Database<typeof schema>;

const IN_MEMORY = ":memory:";

/**
 * Owns the SQLite connection and the Drizzle instance on top of it.
 */
export class DatabaseService {
  private readonly logger = getLogger("database");
  private db: DrizzleDB | null = null;
  private sqlite: Database.Database | null = null;

  constructor(private readonly dbPath: string) {}

  /**
   * Open the connection and create missing tables.
   * Calling it again returns the open instance.
   */
  initialize(): DrizzleDB {
    if (this.db) {
      return this.db;
    }

    this.logger.info({ dbPath: this.dbPath }, "Initializing database");

    let db: DrizzleDB;
    try {
      if (this.dbPath !== IN_MEMORY) {
        fs.mkdirSync(path.dirname(this.dbPath), { recursive: true });
      }

      const sqlite = new Database(this.dbPath);
      if (this.dbPath !== IN_MEMORY) {
        sqlite.pragma("journal_mode = WAL");
      }
      sqlite.pragma("foreign_keys = ON");
      sqlite.exec(schema.BOOTSTRAP_SQL);

      db = drizzle(sqlite, { schema });
      this.sqlite = sqlite;
    } catch (error) {
      throw new ServiceError(ErrorCode.STORAGE_ERROR, "Failed to open session database", error);
    }

    this.db = db;
    this.logger.info("Database initialized successfully");
    return db;
  }

  close(): void {
    if (this.sqlite) {
      this.logger.info("Closing database connection");
      this.sqlite.close();
      this.sqlite = null;
      this.db = null;
    }
  }
}

export * from "./schema";
